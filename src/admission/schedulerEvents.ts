/**
 * Scheduler Events
 *
 * The scheduler is a single state machine:
 *   - `SchedulerPhase` is the only "what is happening now" state
 *   - every phase change goes through PHASE_TRANSITIONS
 *   - a (phase, transition) pair missing from the table is a no-op, which is
 *     how duplicate open/close notifications are absorbed
 *
 * Outward-facing notifications (countdown display, analytics) are emitted on
 * a typed wrapper around node:events.
 */

import { EventEmitter } from 'node:events';
import type { CountdownOutcome } from './countdownController';
import type { InterruptionKind } from '../platform/platformAdapter';

// ============================================================================
// Phases & transition table
// ============================================================================

export type SchedulerPhase =
  | 'IDLE'            // Polling for the next admission
  | 'COUNTING_DOWN'   // Warning countdown running (isWaiting)
  | 'AWAITING_OPEN'   // Show requested, platform has not confirmed yet
  | 'SHOWING';        // Platform reported "opened" (isEventShowing)

export type PhaseTransition =
  | 'COUNTDOWN_STARTED'
  | 'COUNTDOWN_CANCELLED'
  | 'SHOW_REQUESTED'
  | 'SHOW_TIMED_OUT'
  | 'OPENED'
  | 'CLOSED';

export const PHASE_TRANSITIONS: Readonly<
  Record<SchedulerPhase, Readonly<Partial<Record<PhaseTransition, SchedulerPhase>>>>
> = {
  IDLE: {
    COUNTDOWN_STARTED: 'COUNTING_DOWN',
    SHOW_REQUESTED: 'AWAITING_OPEN',
    OPENED: 'SHOWING',
  },
  COUNTING_DOWN: {
    COUNTDOWN_CANCELLED: 'IDLE',
    SHOW_REQUESTED: 'AWAITING_OPEN',
    OPENED: 'SHOWING',
  },
  AWAITING_OPEN: {
    OPENED: 'SHOWING',
    CLOSED: 'IDLE',
    SHOW_TIMED_OUT: 'IDLE',
  },
  SHOWING: {
    CLOSED: 'IDLE',
  },
};

/**
 * @returns The next phase, or null if the transition is not allowed from `phase`
 */
export function nextPhase(phase: SchedulerPhase, transition: PhaseTransition): SchedulerPhase | null {
  return PHASE_TRANSITIONS[phase][transition] ?? null;
}

// ============================================================================
// Outward events
// ============================================================================

/** What started a cycle. */
export type TriggerSource = 'natural' | 'manual' | 'reward';

export interface SchedulerEventMap {
  countdownStarted: { countdownId: number; remainingSec: number; trigger: TriggerSource };
  countdownTick: { countdownId: number; remainingSec: number };
  countdownEnded: { countdownId: number; outcome: CountdownOutcome };
  eventRequested: { trigger: TriggerSource; kind: InterruptionKind };
  eventOpened: { kind: InterruptionKind };
  eventClosed: { kind: InterruptionKind; closedAt: number };
  rewardGranted: { rewardId: string };
  phaseChanged: { from: SchedulerPhase; to: SchedulerPhase; transition: PhaseTransition };
}

export type SchedulerEventName = keyof SchedulerEventMap;

export type SchedulerEventListener<K extends SchedulerEventName> = (payload: SchedulerEventMap[K]) => void;

export class SchedulerEventEmitter {
  private readonly emitter = new EventEmitter();

  /**
   * @returns Function that removes the listener
   */
  on<K extends SchedulerEventName>(event: K, listener: SchedulerEventListener<K>): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  /**
   * Listener errors are logged and never reach the scheduler.
   */
  emit<K extends SchedulerEventName>(event: K, payload: SchedulerEventMap[K]): void {
    for (const listener of this.emitter.listeners(event)) {
      try {
        listener(payload);
      } catch (error) {
        console.error('[Scheduler Events] ❌ Listener failed', { event, error });
      }
    }
  }

  listenerCount(event: SchedulerEventName): number {
    return this.emitter.listenerCount(event);
  }
}
