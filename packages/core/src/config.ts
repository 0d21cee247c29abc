/**
 * Process-wide configuration
 *
 * - configure({ maxLiveBlocks }) → bound the block heap
 * - configure({ debug: { log } }) → lifecycle logging to console
 */

import { z } from 'zod';

import { ConfigError } from './errors';
import { UNLIMITED_BLOCKS } from './internal/constants';

export interface DebugConfig {
  /** Log block allocation, disposal and deallocation (default: false) */
  log?: boolean;
}

export interface RefholdConfig {
  /** Max blocks alive at once before allocation fails (default: Infinity) */
  maxLiveBlocks?: number;
  debug?: DebugConfig;
}

export interface ResolvedConfig {
  maxLiveBlocks: number;
  debug: Required<DebugConfig>;
}

export const DEFAULT_CONFIG: Readonly<{
  maxLiveBlocks: number;
  debug: Readonly<Required<DebugConfig>>;
}> = Object.freeze({
  maxLiveBlocks: UNLIMITED_BLOCKS,
  debug: Object.freeze({
    log: false,
  }),
});

const configSchema = z
  .object({
    maxLiveBlocks: z
      .union([z.number().int().positive(), z.literal(UNLIMITED_BLOCKS)])
      .optional(),
    debug: z
      .object({
        log: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

let current: ResolvedConfig = cloneConfig(DEFAULT_CONFIG);

function cloneConfig(config: Readonly<ResolvedConfig>): ResolvedConfig {
  return { maxLiveBlocks: config.maxLiveBlocks, debug: { ...config.debug } };
}

/**
 * Merge options into the current configuration.
 * Throws ConfigError (and changes nothing) when the options are invalid.
 */
export function configure(options: RefholdConfig): ResolvedConfig {
  const parsed = configSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }

  const { maxLiveBlocks, debug } = parsed.data;
  current = {
    maxLiveBlocks: maxLiveBlocks ?? current.maxLiveBlocks,
    debug: {
      log: debug?.log ?? current.debug.log,
    },
  };
  return getConfig();
}

export function getConfig(): ResolvedConfig {
  return cloneConfig(current);
}

export function resetConfig(): void {
  current = cloneConfig(DEFAULT_CONFIG);
}

/** @internal – read without copying, for hot paths */
export function currentConfig(): Readonly<ResolvedConfig> {
  return current;
}
