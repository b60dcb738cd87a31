/**
 * Admission Decision Engine
 *
 * Architectural Invariant:
 * This is the ONLY place where admission decisions are made. The scheduler
 * gathers facts, this module decides, the scheduler acts.
 *
 * Natural admission priority chain (first failing gate wins):
 * 1. Scheduler busy (countdown, awaiting open, showing) → SKIP
 * 2. Natural polling stopped (left the allowed zones)  → SKIP
 * 3. Current zone not allowed                           → SKIP
 * 4. Block count > 0                                    → SKIP
 * 5. Cooldown since last close not elapsed              → SKIP
 * 6. No platform collaborator                           → SKIP
 * 7. No counter store                                   → SKIP
 * 8. Platform natural timer not ready                   → SKIP
 * 9. Timer ready but reading is stale after a close     → SKIP
 * 10. Default                                           → ADMIT
 *
 * Probes are functions so that later gates (platform calls included) are
 * never evaluated once an earlier gate has rejected.
 */

import type { ManualTriggerMode } from '../config/schedulerConfig';
import type { SchedulerPhase } from './schedulerEvents';

// ============================================================================
// Natural admission
// ============================================================================

export type SkipReason =
  | 'BUSY'
  | 'POLLING_STOPPED'
  | 'ZONE_NOT_ALLOWED'
  | 'BLOCKED'
  | 'COOLDOWN'
  | 'PLATFORM_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'TIMER_NOT_READY'
  | 'STALE_TIMER';

export type AdmissionDecision =
  | { type: 'ADMIT' }
  | { type: 'SKIP'; reason: SkipReason };

export interface NaturalAdmissionProbe {
  phase: SchedulerPhase;
  pollingActive: boolean;
  zoneAllowed: () => boolean;
  blockCount: () => number;
  cooldownReady: () => boolean;
  platformAvailable: boolean;
  storeAvailable: boolean;
  timerReady: () => boolean;
  timerStale: () => boolean;
}

const skip = (reason: SkipReason): AdmissionDecision => ({ type: 'SKIP', reason });

export function decideNaturalAdmission(probe: NaturalAdmissionProbe): AdmissionDecision {
  if (probe.phase !== 'IDLE') {
    return skip('BUSY');
  }
  if (!probe.pollingActive) {
    return skip('POLLING_STOPPED');
  }
  if (!probe.zoneAllowed()) {
    return skip('ZONE_NOT_ALLOWED');
  }
  if (probe.blockCount() > 0) {
    return skip('BLOCKED');
  }
  if (!probe.cooldownReady()) {
    return skip('COOLDOWN');
  }
  if (!probe.platformAvailable) {
    return skip('PLATFORM_UNAVAILABLE');
  }
  if (!probe.storeAvailable) {
    return skip('STORE_UNAVAILABLE');
  }
  if (!probe.timerReady()) {
    return skip('TIMER_NOT_READY');
  }
  if (probe.timerStale()) {
    return skip('STALE_TIMER');
  }
  return { type: 'ADMIT' };
}

// ============================================================================
// Manual triggers
// ============================================================================

/**
 * Result of requestManualTrigger().
 *
 * Everything except ADMITTED and SKIPPED_BY_FREQUENCY is decided before the
 * frequency policy runs, so those requests do not advance the counter.
 */
export type ManualTriggerOutcome =
  | 'ADMITTED'
  | 'SKIPPED_BY_FREQUENCY'
  | 'DISABLED'
  | 'NOT_STARTED'
  | 'EVENT_ACTIVE'
  | 'BUSY'
  | 'BLOCKED'
  | 'PLATFORM_UNAVAILABLE';

export interface ManualTriggerProbe {
  started: boolean;
  phase: SchedulerPhase;
  mode: ManualTriggerMode;
  blocked: boolean;
  platformAvailable: boolean;
  frequencyEnabled: boolean;
}

/**
 * @returns A rejection outcome, or null when the request may go on to the
 *          frequency policy
 */
export function precheckManualTrigger(probe: ManualTriggerProbe): ManualTriggerOutcome | null {
  if (!probe.started) {
    return 'NOT_STARTED';
  }
  if (probe.phase === 'SHOWING' || probe.phase === 'AWAITING_OPEN') {
    return 'EVENT_ACTIVE';
  }
  // Immediate mode pre-empts a running countdown; countdown mode would start a second one.
  if (probe.mode === 'countdown' && probe.phase === 'COUNTING_DOWN') {
    return 'BUSY';
  }
  if (probe.blocked) {
    return 'BLOCKED';
  }
  if (!probe.platformAvailable) {
    return 'PLATFORM_UNAVAILABLE';
  }
  if (!probe.frequencyEnabled) {
    return 'DISABLED';
  }
  return null;
}
