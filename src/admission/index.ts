/**
 * Admission Runtime Bootstrap
 *
 * Wires configuration, collaborators and controllers into a running
 * AdmissionScheduler.
 *
 * Lifecycle:
 * - Config is resolved once (overrides > environment > defaults)
 * - Missing collaborators are reported, never fatal
 * - The scheduler is started before it is returned
 */

import { loadSchedulerConfig, type SchedulerConfigInput } from '../config/schedulerConfig';
import type { PlatformAdapter } from '../platform/platformAdapter';
import type { CounterStore } from '../storage/counterStore';
import { AdmissionScheduler } from './admissionScheduler';
import { checkCollaborators } from './collaboratorCheck';
import type { SuspendableController } from './controllerSuspension';
import type { ZoneSource } from './zoneGate';

export interface CreateAdmissionSchedulerOptions {
  config?: SchedulerConfigInput;
  env?: NodeJS.ProcessEnv;
  platform?: PlatformAdapter | null;
  zones?: ZoneSource | null;
  counterStore?: CounterStore | null;
  controllers?: SuspendableController[];
  now?: () => number;
}

export async function createAdmissionScheduler(
  options: CreateAdmissionSchedulerOptions = {}
): Promise<AdmissionScheduler> {
  console.log('[Admission] Initializing...');

  const config = loadSchedulerConfig(options.config, options.env);
  checkCollaborators({
    platform: options.platform,
    zones: options.zones,
    counterStore: options.counterStore,
    config,
  });

  const scheduler = new AdmissionScheduler({
    config,
    platform: options.platform,
    zones: options.zones,
    counterStore: options.counterStore,
    now: options.now,
  });
  for (const controller of options.controllers ?? []) {
    scheduler.registerController(controller);
  }

  try {
    await scheduler.start();
    console.log('[Admission] ✅ Initialization complete');
  } catch (error) {
    console.error('[Admission] ❌ Initialization failed:', error);
    scheduler.stop();
    throw error;
  }
  return scheduler;
}

export { AdmissionScheduler } from './admissionScheduler';
export type { AdmissionSchedulerOptions, SchedulerSnapshot } from './admissionScheduler';
export { BlockCounter } from './blockCounter';
export { CooldownGuard } from './cooldownGuard';
export type { CooldownGuardOptions } from './cooldownGuard';
export { ManualTriggerPolicy } from './manualTriggerPolicy';
export type { ManualTriggerPolicyOptions } from './manualTriggerPolicy';
export { ZoneGate } from './zoneGate';
export type { ZoneId, ZoneSource, ZoneTransition, Unsubscribe } from './zoneGate';
export { ControllerRegistry } from './controllerSuspension';
export type { SuspendableController, PriorState, RestoreResult } from './controllerSuspension';
export { CountdownController } from './countdownController';
export type { CountdownListener, CountdownOutcome, CountdownState } from './countdownController';
export { decideNaturalAdmission, precheckManualTrigger } from './decisionEngine';
export type { AdmissionDecision, ManualTriggerOutcome, SkipReason } from './decisionEngine';
export { checkCollaborators } from './collaboratorCheck';
export type { CollaboratorReport } from './collaboratorCheck';
export { PHASE_TRANSITIONS, nextPhase } from './schedulerEvents';
export type {
  PhaseTransition,
  SchedulerEventMap,
  SchedulerEventName,
  SchedulerPhase,
  TriggerSource,
} from './schedulerEvents';
