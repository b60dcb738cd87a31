/**
 * Scheduler Configuration
 *
 * Single source of truth for admission tuning values.
 * Values are resolved in this order (later wins):
 *   1. Defaults below
 *   2. Environment variables (ADMISSION_*)
 *   3. Explicit overrides passed by the host
 *
 * A manual-trigger frequency <= 0 is a valid value meaning "manual triggers
 * disabled". Anything else that fails validation throws SchedulerConfigError.
 */

import { z } from 'zod';

// ============================================================================
// DEFAULTS
// ============================================================================

/** Period of the scheduler tick (poll + countdown decrement). */
const TICK_INTERVAL_MS = 1000;

/** Quiet period after an interruption closes. */
const COOLDOWN_AFTER_CLOSE_MS = 3 * 1000;

/** Extra window after the cooldown during which a "0s left" timer is distrusted. */
const STALE_TIMER_GRACE_MS = 1000;

/** Seconds-until value at or below which the natural timer counts as "just fired". */
const STALE_TIMER_THRESHOLD_SEC = 0.1;

/** Warning countdown shown before a natural interruption (3-2-1). */
const COUNTDOWN_DURATION_SEC = 3;

/** Every Nth manual request admits an interruption. */
const MANUAL_TRIGGER_FREQUENCY = 2;

/** How long to wait for the platform's "opened" after a show request. */
const SHOW_REQUEST_TIMEOUT_MS = 15 * 1000;

// ============================================================================
// SCHEMA
// ============================================================================

export const manualTriggerModes = ['immediate', 'countdown'] as const;
export type ManualTriggerMode = (typeof manualTriggerModes)[number];

export const schedulerConfigSchema = z.object({
  tickIntervalMs: z.number().int().positive().default(TICK_INTERVAL_MS),
  cooldownAfterCloseMs: z.number().int().nonnegative().default(COOLDOWN_AFTER_CLOSE_MS),
  staleTimerGraceMs: z.number().int().nonnegative().default(STALE_TIMER_GRACE_MS),
  staleTimerThresholdSec: z.number().nonnegative().default(STALE_TIMER_THRESHOLD_SEC),
  countdownWarningEnabled: z.boolean().default(true),
  countdownDurationSec: z.number().nonnegative().default(COUNTDOWN_DURATION_SEC),
  manualTriggerFrequency: z.number().int().default(MANUAL_TRIGGER_FREQUENCY),
  manualTriggerMode: z.enum(manualTriggerModes).default('immediate'),
  manualCounterKey: z.string().min(1).default('manualTriggerCounter'),
  /** null = every zone admits. */
  allowedZones: z.array(z.string().min(1)).nullable().default(null),
  blockUntilReady: z.boolean().default(false),
  resetBlocksOnZoneReturn: z.boolean().default(false),
  showRequestTimeoutMs: z.number().int().positive().default(SHOW_REQUEST_TIMEOUT_MS),
  debugLogs: z.boolean().default(false),
});

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof schedulerConfigSchema>;

export class SchedulerConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scheduler configuration: ${issues.join('; ')}`);
    this.name = 'SchedulerConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn('[Scheduler Config] Ignoring non-numeric environment value', { name, raw });
    return undefined;
  }
  return value;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (raw === '1' || raw === 'true' || raw === 'yes') {
    return true;
  }
  if (raw === '0' || raw === 'false' || raw === 'no') {
    return false;
  }
  console.warn('[Scheduler Config] Ignoring non-boolean environment value', { name, raw });
  return undefined;
}

function envList(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Read the ADMISSION_* variables. Unset variables are omitted so that schema
 * defaults apply.
 */
export function readConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {
    tickIntervalMs: envNumber(env, 'ADMISSION_TICK_INTERVAL_MS'),
    cooldownAfterCloseMs: envNumber(env, 'ADMISSION_COOLDOWN_MS'),
    countdownDurationSec: envNumber(env, 'ADMISSION_COUNTDOWN_SEC'),
    countdownWarningEnabled: envBoolean(env, 'ADMISSION_COUNTDOWN_ENABLED'),
    manualTriggerFrequency: envNumber(env, 'ADMISSION_MANUAL_FREQUENCY'),
    manualTriggerMode: env.ADMISSION_MANUAL_MODE?.trim() || undefined,
    allowedZones: envList(env, 'ADMISSION_ALLOWED_ZONES'),
    debugLogs: envBoolean(env, 'ADMISSION_DEBUG'),
  };
  return withoutUndefined(values);
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Resolve the scheduler configuration.
 *
 * @param overrides - Host-provided values; win over the environment
 * @param env - Environment to read ADMISSION_* variables from
 * @throws SchedulerConfigError when a value fails validation
 */
export function loadSchedulerConfig(
  overrides: SchedulerConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): SchedulerConfig {
  const merged = {
    ...readConfigFromEnv(env),
    ...withoutUndefined({ ...overrides }),
  };

  const result = schedulerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    console.error('[Scheduler Config] ❌ Invalid configuration', { issues });
    throw new SchedulerConfigError(issues);
  }

  if (result.data.manualTriggerFrequency <= 0) {
    console.log('[Scheduler Config] Manual triggers disabled', {
      manualTriggerFrequency: result.data.manualTriggerFrequency,
    });
  }

  return result.data;
}

/**
 * Default configuration, ignoring the environment. Used by tests and hosts that
 * build their config in code.
 */
export function defaultSchedulerConfig(overrides: SchedulerConfigInput = {}): SchedulerConfig {
  return loadSchedulerConfig(overrides, {});
}
