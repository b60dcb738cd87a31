/**
 * Countdown Controller
 *
 * Pre-interruption warning (3-2-1). One instance per cycle.
 *
 * State machine:
 *   Idle      → Counting   start(): suspend controllers, report "started"
 *   Counting  → Counting   tick(): remaining - 1, report new value
 *   Counting  → Completed  remaining reaches 0: report "ended", fire onComplete once
 *   Counting  → Cancelled  cancel(): restore controllers, onComplete never fires
 *
 * After Completed the controllers STAY suspended: the interruption itself
 * needs them off. ensureRestored() hands them back and may be called from any
 * number of paths (close notification, pause release, timeout).
 */

import type {
  ControllerRegistry,
  RestoreResult,
  SuspendableController,
  SuspensionOwner,
} from './controllerSuspension';

export type CountdownState = 'Idle' | 'Counting' | 'Completed' | 'Cancelled';

export type CountdownOutcome = 'completed' | 'cancelled';

export interface CountdownListener {
  onStarted?(remainingSec: number): void;
  onTick?(remainingSec: number): void;
  onEnded?(outcome: CountdownOutcome): void;
}

interface SuspendedController {
  controller: SuspendableController;
  alreadyRestored: boolean;
}

let nextCountdownId = 1;

export class CountdownController {
  readonly id: number;
  private readonly owner: SuspensionOwner;
  private state: CountdownState = 'Idle';
  private remaining = 0;
  private onComplete: (() => void) | null = null;
  private suspended: SuspendedController[] = [];

  constructor(
    private readonly registry: ControllerRegistry,
    private readonly listener: CountdownListener = {}
  ) {
    this.id = nextCountdownId++;
    this.owner = Symbol(`countdown-${this.id}`);
  }

  get currentState(): CountdownState {
    return this.state;
  }

  get remainingSec(): number {
    return this.remaining;
  }

  /** True once every controller this instance suspended has been handed back. */
  get isRestored(): boolean {
    return this.suspended.every((entry) => entry.alreadyRestored);
  }

  /**
   * Begin the warning. Only valid from Idle; an instance is never reused.
   *
   * @param durationSec - Rounded up to whole seconds; 0 completes immediately
   * @returns false if the countdown was not Idle
   */
  start(durationSec: number, onComplete: () => void): boolean {
    if (this.state !== 'Idle') {
      console.warn('[Countdown] Already started, ignoring start request', {
        id: this.id,
        state: this.state,
      });
      return false;
    }

    this.onComplete = onComplete;
    this.remaining = Math.max(0, Math.ceil(durationSec));
    this.state = 'Counting';

    this.suspendControllers();
    this.listener.onStarted?.(this.remaining);

    if (this.remaining === 0) {
      this.complete();
    }
    return true;
  }

  /**
   * Advance by one second. Ignored outside Counting.
   */
  tick(): void {
    if (this.state !== 'Counting') {
      return;
    }

    this.remaining = Math.max(0, this.remaining - 1);
    if (this.remaining === 0) {
      this.complete();
      return;
    }
    this.listener.onTick?.(this.remaining);
  }

  /**
   * Abort the warning and restore controllers right away.
   *
   * @returns false if the countdown was not Counting
   */
  cancel(): boolean {
    if (this.state !== 'Counting') {
      return false;
    }

    this.state = 'Cancelled';
    this.onComplete = null;
    this.ensureRestored();
    this.listener.onEnded?.('cancelled');
    return true;
  }

  /**
   * Restore every controller this instance suspended, at most once each.
   *
   * @returns Number of controllers re-enabled by this call
   */
  ensureRestored(): number {
    let reenabled = 0;
    for (const entry of this.suspended) {
      if (entry.alreadyRestored) {
        continue;
      }
      entry.alreadyRestored = true;
      let result: RestoreResult;
      try {
        result = this.registry.restore(entry.controller, this.owner);
      } catch (error) {
        console.error('[Countdown] ❌ Restore failed', { id: this.id, error });
        result = 'failed';
      }
      if (result === 'restored') {
        reenabled += 1;
      }
    }
    return reenabled;
  }

  private suspendControllers(): void {
    this.suspended = this.registry.list().map((controller) => {
      this.registry.suspend(controller, this.owner);
      return { controller, alreadyRestored: false };
    });
  }

  private complete(): void {
    this.state = 'Completed';
    const callback = this.onComplete;
    this.onComplete = null;

    this.listener.onEnded?.('completed');
    callback?.();
  }
}
