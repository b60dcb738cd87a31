/**
 * Platform Adapter Interface
 *
 * What the scheduler needs from the platform service that actually displays
 * interruptions and owns the natural (recurring) timer.
 *
 * Usage:
 * ```typescript
 * const unsubscribe = platform.subscribe((notification) => {
 *   if (notification.type === 'closed') {
 *     console.log('Interruption closed:', notification.kind);
 *   }
 * });
 *
 * if (platform.isNaturalTimerReady()) {
 *   platform.show();
 * }
 * ```
 */

export type InterruptionKind = 'interstitial' | 'rewarded';

/**
 * Notifications pushed by the platform. Delivered on the same cooperative
 * tick as any other scheduler call; never re-entrant.
 */
export type PlatformNotification =
  | { type: 'opened'; kind: InterruptionKind }
  | { type: 'closed'; kind: InterruptionKind }
  | { type: 'rewardGranted'; rewardId: string }
  | { type: 'pauseChanged'; paused: boolean };

export type PlatformListener = (notification: PlatformNotification) => void;

export interface PlatformAdapter {
  /** Natural timer has elapsed and an interstitial may be shown. */
  isNaturalTimerReady(): boolean;

  /** Display/diagnostic only. */
  secondsUntilNaturalTimer(): number;

  /** Fire-and-forget request to display an interstitial. */
  show(): void;

  /**
   * Fire-and-forget request to display a rewarded interruption.
   * `onReward` is invoked by the platform if the user earns the reward.
   */
  showRewarded(rewardId: string, onReward: () => void): void;

  /** Privileged: make the natural timer ready now (manual trigger path). */
  forceNaturalTimerReady(): void;

  /** Privileged: restart the natural timer from its full interval (zone return). */
  resetNaturalTimerToFullInterval(): void;

  /**
   * @returns Function that removes the listener
   */
  subscribe(listener: PlatformListener): () => void;
}
