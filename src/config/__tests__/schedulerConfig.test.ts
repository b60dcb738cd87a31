import { beforeEach, describe, expect, it } from 'vitest';
import {
  defaultSchedulerConfig,
  loadSchedulerConfig,
  readConfigFromEnv,
  SchedulerConfigError,
} from '../schedulerConfig';
import { silenceConsole } from '../../admission/__tests__/fakes';

describe('schedulerConfig', () => {
  beforeEach(() => {
    silenceConsole();
  });

  it('provides the documented defaults', () => {
    expect(defaultSchedulerConfig()).toEqual({
      tickIntervalMs: 1000,
      cooldownAfterCloseMs: 3000,
      staleTimerGraceMs: 1000,
      staleTimerThresholdSec: 0.1,
      countdownWarningEnabled: true,
      countdownDurationSec: 3,
      manualTriggerFrequency: 2,
      manualTriggerMode: 'immediate',
      manualCounterKey: 'manualTriggerCounter',
      allowedZones: null,
      blockUntilReady: false,
      resetBlocksOnZoneReturn: false,
      showRequestTimeoutMs: 15000,
      debugLogs: false,
    });
  });

  it('reads ADMISSION_* variables and omits unset ones', () => {
    expect(
      readConfigFromEnv({
        ADMISSION_COOLDOWN_MS: '5000',
        ADMISSION_ALLOWED_ZONES: 'arena, city ,',
        ADMISSION_DEBUG: 'yes',
        ADMISSION_COUNTDOWN_ENABLED: '0',
        ADMISSION_MANUAL_MODE: ' countdown ',
      })
    ).toEqual({
      cooldownAfterCloseMs: 5000,
      allowedZones: ['arena', 'city'],
      debugLogs: true,
      countdownWarningEnabled: false,
      manualTriggerMode: 'countdown',
    });
  });

  it('ignores unparseable environment values with a warning', () => {
    expect(readConfigFromEnv({ ADMISSION_TICK_INTERVAL_MS: 'fast', ADMISSION_DEBUG: 'maybe' })).toEqual({});
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadSchedulerConfig(
      { cooldownAfterCloseMs: 1000 },
      { ADMISSION_COOLDOWN_MS: '5000', ADMISSION_COUNTDOWN_SEC: '5' }
    );

    expect(config.cooldownAfterCloseMs).toBe(1000);
    expect(config.countdownDurationSec).toBe(5);
  });

  it('ignores undefined overrides', () => {
    const config = loadSchedulerConfig({ cooldownAfterCloseMs: undefined }, { ADMISSION_COOLDOWN_MS: '5000' });
    expect(config.cooldownAfterCloseMs).toBe(5000);
  });

  it('accepts a non-positive manual frequency as "disabled"', () => {
    expect(defaultSchedulerConfig({ manualTriggerFrequency: 0 }).manualTriggerFrequency).toBe(0);
    expect(defaultSchedulerConfig({ manualTriggerFrequency: -1 }).manualTriggerFrequency).toBe(-1);
  });

  it('throws SchedulerConfigError listing each invalid field', () => {
    let caught: unknown;
    try {
      defaultSchedulerConfig({ tickIntervalMs: 0, cooldownAfterCloseMs: -5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchedulerConfigError);
    if (!(caught instanceof SchedulerConfigError)) {
      return;
    }
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^tickIntervalMs: /);
    expect(caught.issues[1]).toMatch(/^cooldownAfterCloseMs: /);
  });

  it('rejects an unknown manual trigger mode from the environment', () => {
    expect(() => loadSchedulerConfig({}, { ADMISSION_MANUAL_MODE: 'sometimes' })).toThrow(SchedulerConfigError);
  });
});
