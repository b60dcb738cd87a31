/**
 * Platform Bridge
 *
 * Translates a third-party interruption SDK (ad/break service with its own
 * interval timer and open/close callbacks) into the scheduler's
 * PlatformAdapter vocabulary.
 *
 * Timer overrides go through the SDK's explicit setTimer() method; the bridge
 * never reaches into SDK internals.
 */

import type {
  InterruptionKind,
  PlatformAdapter,
  PlatformListener,
  PlatformNotification,
} from './platformAdapter';

/**
 * Events emitted by the SDK, with their argument lists.
 */
export interface SdkEventMap {
  openInterstitial: [];
  closeInterstitial: [];
  openRewarded: [];
  closeRewarded: [];
  reward: [rewardId: string];
  pause: [paused: boolean];
}

export type SdkEventName = keyof SdkEventMap;

/**
 * Surface of the external SDK consumed by the bridge.
 */
export interface InterruptionSdk {
  /** False when running without the SDK (local development, tests). */
  readonly isEnabled: boolean;
  readonly isTimerCompleted: boolean;
  /** Seconds until the natural timer completes. */
  readonly timerRemainingSec: number;
  /** Full natural-timer interval in seconds. */
  readonly timerIntervalSec: number;

  showInterstitial(): void;
  showRewarded(rewardId: string, onReward: () => void): void;
  /** Set seconds remaining on the natural timer. */
  setTimer(seconds: number): void;

  on<E extends SdkEventName>(event: E, listener: (...args: SdkEventMap[E]) => void): void;
  off<E extends SdkEventName>(event: E, listener: (...args: SdkEventMap[E]) => void): void;
}

export class PlatformBridge implements PlatformAdapter {
  constructor(
    private readonly sdk: InterruptionSdk,
    private readonly debugLogs = false
  ) {}

  isNaturalTimerReady(): boolean {
    // Without the SDK there is no natural timer to honour.
    if (!this.sdk.isEnabled) {
      return false;
    }
    return this.sdk.isTimerCompleted;
  }

  secondsUntilNaturalTimer(): number {
    if (!this.sdk.isEnabled) {
      return Number.POSITIVE_INFINITY;
    }
    return Math.max(0, this.sdk.timerRemainingSec);
  }

  show(): void {
    try {
      console.log('[Platform Bridge] Requesting interstitial');
      this.sdk.showInterstitial();
    } catch (error) {
      // Silent failure - the next natural cycle will try again
      console.warn('[Platform Bridge] Failed to show interstitial', error);
    }
  }

  showRewarded(rewardId: string, onReward: () => void): void {
    try {
      console.log('[Platform Bridge] Requesting rewarded interruption', { rewardId });
      this.sdk.showRewarded(rewardId, onReward);
    } catch (error) {
      console.warn('[Platform Bridge] Failed to show rewarded interruption', { rewardId, error });
    }
  }

  forceNaturalTimerReady(): void {
    if (!this.sdk.isEnabled) {
      return;
    }
    this.sdk.setTimer(0);
    if (this.debugLogs) {
      console.log('[Platform Bridge] Natural timer forced ready');
    }
  }

  resetNaturalTimerToFullInterval(): void {
    if (!this.sdk.isEnabled) {
      return;
    }
    this.sdk.setTimer(this.sdk.timerIntervalSec);
    if (this.debugLogs) {
      console.log('[Platform Bridge] Natural timer reset to full interval', {
        intervalSec: this.sdk.timerIntervalSec,
      });
    }
  }

  subscribe(listener: PlatformListener): () => void {
    const forward = (notification: PlatformNotification): void => {
      if (this.debugLogs) {
        console.log('[Platform Bridge] Notification', notification);
      }
      listener(notification);
    };

    const opened = (kind: InterruptionKind) => () => forward({ type: 'opened', kind });
    const closed = (kind: InterruptionKind) => () => forward({ type: 'closed', kind });

    const onOpenInterstitial = opened('interstitial');
    const onCloseInterstitial = closed('interstitial');
    const onOpenRewarded = opened('rewarded');
    const onCloseRewarded = closed('rewarded');
    const onReward = (rewardId: string) => forward({ type: 'rewardGranted', rewardId });
    const onPause = (paused: boolean) => forward({ type: 'pauseChanged', paused });

    this.sdk.on('openInterstitial', onOpenInterstitial);
    this.sdk.on('closeInterstitial', onCloseInterstitial);
    this.sdk.on('openRewarded', onOpenRewarded);
    this.sdk.on('closeRewarded', onCloseRewarded);
    this.sdk.on('reward', onReward);
    this.sdk.on('pause', onPause);

    return () => {
      this.sdk.off('openInterstitial', onOpenInterstitial);
      this.sdk.off('closeInterstitial', onCloseInterstitial);
      this.sdk.off('openRewarded', onOpenRewarded);
      this.sdk.off('closeRewarded', onCloseRewarded);
      this.sdk.off('reward', onReward);
      this.sdk.off('pause', onPause);
    };
  }
}
