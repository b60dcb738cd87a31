/**
 * Cooldown Guard
 *
 * Refuses admission for a fixed window after an interruption closes. The
 * platform's natural timer can still report "ready" right after a close,
 * before its own bookkeeping has reset.
 */

export interface CooldownGuardOptions {
  windowMs: number;
  /** Extra time after the window during which a "0s left" timer is distrusted. */
  staleGraceMs: number;
  /** Seconds-until at or below which the timer is considered to have just fired. */
  staleThresholdSec: number;
}

export class CooldownGuard {
  private lastCloseAt: number | null = null;

  constructor(private readonly options: CooldownGuardOptions) {}

  /** Timestamp (ms) of the last recorded close, or null if none this session. */
  get lastEventCloseTime(): number | null {
    return this.lastCloseAt;
  }

  recordClose(now: number): void {
    this.lastCloseAt = now;
  }

  isReady(now: number): boolean {
    if (this.lastCloseAt === null) {
      return true;
    }
    return now - this.lastCloseAt >= this.options.windowMs;
  }

  /** Milliseconds left in the window; 0 when ready. */
  remainingMs(now: number): number {
    if (this.lastCloseAt === null) {
      return 0;
    }
    return Math.max(0, this.options.windowMs - (now - this.lastCloseAt));
  }

  /**
   * True when the natural timer claims it is due right now but the last close
   * was recent enough that the claim is probably left over from that cycle.
   */
  isSuspectedStale(now: number, secondsUntilNaturalTimer: number): boolean {
    if (this.lastCloseAt === null) {
      return false;
    }
    if (secondsUntilNaturalTimer > this.options.staleThresholdSec) {
      return false;
    }
    return now - this.lastCloseAt < this.options.windowMs + this.options.staleGraceMs;
  }
}
