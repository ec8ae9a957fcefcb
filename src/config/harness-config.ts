import { z } from 'zod';
import { ConfigError } from '../errors/harness-error';

// ------------------------------------------------------------------
// Schema
// ------------------------------------------------------------------

export const DeviceKindSchema = z.enum(['reference', 'webgpu']);
export type DeviceKind = z.infer<typeof DeviceKindSchema>;

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const HarnessConfigSchema = z.object({
  device: DeviceKindSchema.default('reference'),
  // null waits forever on the completion signal
  waitTimeoutMs: z.number().int().positive().nullable().default(10_000),
  logLevel: LogLevelSchema.default('warn'),
  checkLeaks: z.boolean().default(true),
  reference: z.object({
    latencyMs: z.number().nonnegative().default(0),
    maxMemoryBytes: z.number().int().positive().optional(),
  }).default({}),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

export const DEFAULT_CONFIG: HarnessConfig = HarnessConfigSchema.parse({});

// ------------------------------------------------------------------
// Loading
// ------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

export function parseHarnessConfig(input: unknown): HarnessConfig {
  const result = HarnessConfigSchema.safeParse(input);
  if (!result.success) throw new ConfigError(formatIssues(result.error));
  return result.data;
}

function parseTimeout(raw: string): number | null | string {
  const value = raw.trim().toLowerCase();
  if (value === 'none' || value === 'infinite') return null;
  const n = Number(value);
  // Leave junk as a string so the schema reports it
  return Number.isFinite(n) ? n : raw;
}

function parseBoolean(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  return raw;
}

/**
 * Reads `KCT_*` variables from the environment; explicit overrides win.
 */
export function loadHarnessConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: HarnessConfigInput = {},
): HarnessConfig {
  const fromEnv: Record<string, unknown> = {};
  if (env.KCT_DEVICE !== undefined) fromEnv.device = env.KCT_DEVICE;
  if (env.KCT_WAIT_TIMEOUT_MS !== undefined) fromEnv.waitTimeoutMs = parseTimeout(env.KCT_WAIT_TIMEOUT_MS);
  if (env.KCT_LOG_LEVEL !== undefined) fromEnv.logLevel = env.KCT_LOG_LEVEL;
  if (env.KCT_CHECK_LEAKS !== undefined) fromEnv.checkLeaks = parseBoolean(env.KCT_CHECK_LEAKS);

  return parseHarnessConfig({ ...fromEnv, ...overrides });
}
