/**
 * chunkframe — configuration
 *
 * Zod schemas validate configuration from code and from the environment.
 * Invalid input fails fast with a ConfigError listing every issue.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_ROW_GROUP_SIZE } from './constants';

// ─── Schema ───────────────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const ChunkframeConfigSchema = z.object({
  /** Rows per record batch (row group) when an engine writer splits a table. */
  rowGroupSize: z.number().int().positive().default(DEFAULT_ROW_GROUP_SIZE),
  /** Run the generation check in column accessors. */
  checkLifetimes: z.boolean().default(true),
  /** Minimum level for loggers built from this configuration. */
  logLevel: LogLevelSchema.default('warn'),
}).strict();

export type ChunkframeConfig = z.infer<typeof ChunkframeConfigSchema>;
export type ChunkframeConfigInput = z.input<typeof ChunkframeConfigSchema>;

// ─── Resolution ───────────────────────────────────────────────────────────────

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/** Validate `input` and fill defaults. Throws ConfigError on invalid input. */
export function resolveConfig(input: unknown = {}): ChunkframeConfig {
  const result = ChunkframeConfigSchema.safeParse(input);
  if (!result.success) throw new ConfigError(issuesOf(result.error));
  return result.data;
}

const EnvSchema = z.object({
  CHUNKFRAME_ROW_GROUP_SIZE:  z.coerce.number().int().positive().optional(),
  CHUNKFRAME_CHECK_LIFETIMES: z.enum(['true', 'false', '1', '0']).optional(),
  CHUNKFRAME_LOG_LEVEL:       LogLevelSchema.optional(),
});

/**
 * Read configuration from environment variables:
 *
 *   CHUNKFRAME_ROW_GROUP_SIZE   positive integer
 *   CHUNKFRAME_CHECK_LIFETIMES  true | false | 1 | 0
 *   CHUNKFRAME_LOG_LEVEL        debug | info | warn | error
 *
 * Unset variables fall back to the schema defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ChunkframeConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) throw new ConfigError(issuesOf(result.error));

  const vars = result.data;
  const input: ChunkframeConfigInput = {};
  if (vars.CHUNKFRAME_ROW_GROUP_SIZE !== undefined) {
    input.rowGroupSize = vars.CHUNKFRAME_ROW_GROUP_SIZE;
  }
  if (vars.CHUNKFRAME_CHECK_LIFETIMES !== undefined) {
    input.checkLifetimes = vars.CHUNKFRAME_CHECK_LIFETIMES === 'true' || vars.CHUNKFRAME_CHECK_LIFETIMES === '1';
  }
  if (vars.CHUNKFRAME_LOG_LEVEL !== undefined) {
    input.logLevel = vars.CHUNKFRAME_LOG_LEVEL;
  }
  return resolveConfig(input);
}
