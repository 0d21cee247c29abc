/**
 * Typed errors raised by handle operations
 */

export type RefholdErrorCode =
  | 'ALLOCATION_FAILED'
  | 'EMPTY_HANDLE'
  | 'LIFECYCLE'
  | 'INVALID_CONFIG';

export class RefholdError extends Error {
  readonly code: RefholdErrorCode;
  readonly op: string;
  readonly reason: string;

  constructor(code: RefholdErrorCode, op: string, reason: string) {
    super(`${op}: ${reason}`);
    this.name = new.target.name;
    this.code = code;
    this.op = op;
    this.reason = reason;
  }
}

/**
 * The block heap refused to reserve a new ownership block.
 */
export class AllocationError extends RefholdError {
  readonly limit: number;

  constructor(op: string, limit: number) {
    super('ALLOCATION_FAILED', op, `live block limit of ${String(limit)} reached`);
    this.limit = limit;
  }
}

export class EmptyHandleError extends RefholdError {
  constructor(op: string) {
    super('EMPTY_HANDLE', op, 'handle does not address a value');
  }
}

/**
 * Count operation on a block in the wrong phase. Indicates a bug in this
 * package, never a caller mistake.
 */
export class LifecycleError extends RefholdError {
  constructor(op: string, reason: string) {
    super('LIFECYCLE', op, reason);
  }
}

export class ConfigError extends RefholdError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', 'configure', issues.join('; '));
    this.issues = issues;
  }
}
