/**
 * Lifecycle logger.
 *
 * Two log functions:
 * 1. logBlock — allocation, disposal and deallocation of an ownership block
 * 2. logFailure — a constructing operation that failed and cleaned up
 *
 * Zero runtime cost when the log flag is false (returns no-op logger).
 */

import { currentConfig, type DebugConfig } from './config';
import { LOG_PREFIX } from './internal/constants';
import type { OwnershipBlock } from './internal/types';

// ---------------------------------------------------------------------------
// Logger types
// ---------------------------------------------------------------------------

export type BlockEvent = 'allocate' | 'dispose' | 'free';

export interface RefholdLogger {
  logBlock: (event: BlockEvent, block: OwnershipBlock) => void;
  logFailure: (op: string, error: unknown) => void;
}

// ---------------------------------------------------------------------------
// No-op singleton
// ---------------------------------------------------------------------------

const noop = () => {
  // no-op
};

const NOOP_LOGGER: RefholdLogger = {
  logBlock: noop,
  logFailure: noop,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Compact block summary for console output. @internal */
export const summarizeBlock = (block: OwnershipBlock): Record<string, unknown> => ({
  kind: block.kind,
  strong: block.strong,
  weak: block.weak,
  phase: block.phase,
});

const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a lifecycle logger.
 * Returns no-op when the log flag is disabled.
 */
export const createLogger = (config: DebugConfig): RefholdLogger => {
  const { log = false } = config;

  if (!log) return NOOP_LOGGER;

  return {
    logBlock: (event, block) => {
      console.debug(`${LOG_PREFIX}:${event} | block#${String(block.id)}`, summarizeBlock(block));
    },

    logFailure: (op, error) => {
      console.debug(`${LOG_PREFIX}:failure | ${op}`, describeError(error));
    },
  };
};

let cached: { flag: boolean; logger: RefholdLogger } | null = null;

/** Logger for the current configuration. @internal */
export const getLogger = (): RefholdLogger => {
  const flag = currentConfig().debug.log;
  if (!cached || cached.flag !== flag) {
    cached = { flag, logger: createLogger({ log: flag }) };
  }
  return cached.logger;
};
