/**
 * Core constants for refhold handles
 */

// Symbol for internal (block, address) state access
export const HANDLE_STATE = Symbol('HANDLE_STATE');

// Block variants
export const KIND_DEFAULT = 'default';
export const KIND_DISPOSER = 'disposer';
export const KIND_IN_PLACE = 'in-place';

// Block lifecycle phases
export const PHASE_LIVE = 'live';
export const PHASE_DISPOSING = 'disposing';
export const PHASE_EXPIRING = 'expiring';
export const PHASE_GONE = 'gone';

// No bound on live blocks
export const UNLIMITED_BLOCKS = Infinity;

export const LOG_PREFIX = 'refhold';
