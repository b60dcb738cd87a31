/**
 * Admission Scheduler
 *
 * Decides WHEN a full-screen interruption may be shown and orchestrates the
 * warning countdown that precedes it.
 *
 * Key Rules:
 * - One periodic tick: advance the active countdown, then poll for admission
 * - Natural admission order lives in decisionEngine (busy → polling → zone →
 *   block → cooldown → platform → store → timer ready → stale timer)
 * - Manual triggers skip the natural-timer gate but still honour blocks and
 *   the frequency policy
 * - Every phase change goes through the transition table in schedulerEvents;
 *   duplicate platform notifications are no-ops
 * - Controllers suspended by a completed countdown stay suspended until the
 *   interruption closes (or the platform releases its pause, or the show
 *   request times out)
 *
 * Lifecycle Invariant:
 * Phase, blocks and cooldown are in-memory only. The only persisted value is
 * the manual-trigger counter.
 */

import type { SchedulerConfig } from '../config/schedulerConfig';
import type { InterruptionKind, PlatformAdapter, PlatformNotification } from '../platform/platformAdapter';
import { KeyvCounterStore, type CounterStore } from '../storage/counterStore';
import { BlockCounter } from './blockCounter';
import { CooldownGuard } from './cooldownGuard';
import { ManualTriggerPolicy } from './manualTriggerPolicy';
import { ZoneGate, type ZoneId, type ZoneSource } from './zoneGate';
import { ControllerRegistry, type SuspendableController } from './controllerSuspension';
import { CountdownController } from './countdownController';
import {
  decideNaturalAdmission,
  precheckManualTrigger,
  type AdmissionDecision,
  type ManualTriggerOutcome,
  type ManualTriggerProbe,
} from './decisionEngine';
import {
  nextPhase,
  SchedulerEventEmitter,
  type PhaseTransition,
  type SchedulerEventListener,
  type SchedulerEventName,
  type SchedulerPhase,
  type TriggerSource,
} from './schedulerEvents';

export interface AdmissionSchedulerOptions {
  config: SchedulerConfig;
  /** null/undefined disables natural and manual triggers. */
  platform?: PlatformAdapter | null;
  /** null/undefined: zone stays unknown (never admits under a restricted zone list). */
  zones?: ZoneSource | null;
  /**
   * null/undefined disables natural triggers; manual triggers then count in
   * an in-memory Keyv store for the session.
   */
  counterStore?: CounterStore | null;
  controllers?: ControllerRegistry;
  /** Clock in milliseconds. */
  now?: () => number;
}

export interface SchedulerSnapshot {
  phase: SchedulerPhase;
  isStarted: boolean;
  isWaiting: boolean;
  isEventShowing: boolean;
  isPolling: boolean;
  blockCount: number;
  currentZone: ZoneId | null;
  zoneAllowed: boolean;
  lastEventCloseTime: number | null;
  cooldownRemainingMs: number;
  countdownRemainingSec: number | null;
  manualCounter: number;
  nextManualAdmissionAt: number;
  secondsUntilNaturalTimer: number | null;
}

type Lifecycle = 'stopped' | 'starting' | 'running';

export class AdmissionScheduler {
  private readonly config: SchedulerConfig;
  private readonly platform: PlatformAdapter | null;
  private readonly zones: ZoneSource | null;
  private readonly hasCounterStore: boolean;
  private readonly now: () => number;
  private readonly controllers: ControllerRegistry;
  private readonly events = new SchedulerEventEmitter();

  private readonly blocks = new BlockCounter();
  private readonly cooldown: CooldownGuard;
  private readonly manual: ManualTriggerPolicy;
  private readonly zoneGate: ZoneGate;

  private lifecycle: Lifecycle = 'stopped';
  private phase: SchedulerPhase = 'IDLE';
  private polling = true;
  private readySignalled = false;
  private readyBlockHeld = false;

  // Counting countdown, if any
  private activeCountdown: CountdownController | null = null;
  // Completed countdown whose controllers are released when the interruption ends
  private handoffCountdown: CountdownController | null = null;
  private showRequestedAt: number | null = null;

  private ticker: ReturnType<typeof setInterval> | null = null;
  private unsubscribers: Array<() => void> = [];

  constructor(options: AdmissionSchedulerOptions) {
    this.config = options.config;
    this.platform = options.platform ?? null;
    this.zones = options.zones ?? null;
    this.hasCounterStore = options.counterStore != null;
    this.now = options.now ?? (() => Date.now());
    this.controllers = options.controllers ?? new ControllerRegistry();

    this.cooldown = new CooldownGuard({
      windowMs: this.config.cooldownAfterCloseMs,
      staleGraceMs: this.config.staleTimerGraceMs,
      staleThresholdSec: this.config.staleTimerThresholdSec,
    });
    this.manual = new ManualTriggerPolicy({
      frequency: this.config.manualTriggerFrequency,
      counterKey: this.config.manualCounterKey,
      store: options.counterStore ?? new KeyvCounterStore(),
      debugLogs: this.config.debugLogs,
    });
    this.zoneGate = new ZoneGate(this.config.allowedZones);
  }

  // ==========================================================================
  // Read-only state
  // ==========================================================================

  get currentPhase(): SchedulerPhase {
    return this.phase;
  }

  get isStarted(): boolean {
    return this.lifecycle === 'running';
  }

  /** A warning countdown is running. */
  get isWaiting(): boolean {
    return this.phase === 'COUNTING_DOWN';
  }

  /** The platform reported the interruption open and has not closed it yet. */
  get isEventShowing(): boolean {
    return this.phase === 'SHOWING';
  }

  get isAdmissionBlocked(): boolean {
    return this.blocks.isBlocked;
  }

  get blockCount(): number {
    return this.blocks.value;
  }

  getSnapshot(): SchedulerSnapshot {
    const now = this.now();
    return {
      phase: this.phase,
      isStarted: this.isStarted,
      isWaiting: this.isWaiting,
      isEventShowing: this.isEventShowing,
      isPolling: this.polling,
      blockCount: this.blocks.value,
      currentZone: this.zoneGate.currentZone,
      zoneAllowed: this.zoneGate.isAllowed(),
      lastEventCloseTime: this.cooldown.lastEventCloseTime,
      cooldownRemainingMs: this.cooldown.remainingMs(now),
      countdownRemainingSec: this.activeCountdown?.remainingSec ?? null,
      manualCounter: this.manual.currentCounter,
      nextManualAdmissionAt: this.manual.nextAdmittingCounter(),
      secondsUntilNaturalTimer: this.platform?.secondsUntilNaturalTimer() ?? null,
    };
  }

  on<K extends SchedulerEventName>(event: K, listener: SchedulerEventListener<K>): () => void {
    return this.events.on(event, listener);
  }

  registerController(controller: SuspendableController): () => void {
    return this.controllers.register(controller);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Load the persisted manual counter, subscribe to collaborators and start
   * the periodic tick.
   */
  async start(): Promise<void> {
    if (this.lifecycle !== 'stopped') {
      console.warn('[Admission Scheduler] start() called while', this.lifecycle);
      return;
    }
    this.lifecycle = 'starting';

    await this.manual.load();
    if (this.lifecycle !== 'starting') {
      // stop() ran while the counter was loading
      return;
    }

    if (this.config.blockUntilReady && !this.readySignalled) {
      this.blocks.block();
      this.readyBlockHeld = true;
    }

    if (this.zones) {
      const zone = this.zones.getCurrentZone();
      if (zone !== null) {
        this.zoneGate.update(zone);
      }
      this.unsubscribers.push(this.zones.onZoneChanged((next) => this.handleZoneChanged(next)));
    }
    this.polling = this.zoneGate.isAllowed();

    if (this.platform) {
      this.unsubscribers.push(
        this.platform.subscribe((notification) => this.handlePlatformNotification(notification))
      );
    }

    this.ticker = setInterval(() => this.tick(), this.config.tickIntervalMs);
    this.lifecycle = 'running';

    console.log('[Admission Scheduler] ✅ Started', {
      tickIntervalMs: this.config.tickIntervalMs,
      zone: this.zoneGate.currentZone,
      polling: this.polling,
      manualCounter: this.manual.currentCounter,
      blockCount: this.blocks.value,
    });
  }

  /**
   * Stop ticking, drop subscriptions and hand back every suspended controller.
   */
  stop(): void {
    if (this.ticker !== null) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    this.cancelActiveCountdown('scheduler stopped');
    this.releaseHandoff('scheduler stopped');
    this.showRequestedAt = null;
    this.phase = 'IDLE';
    this.lifecycle = 'stopped';

    console.log('[Admission Scheduler] Stopped');
  }

  /**
   * Host finished loading. Releases the startup block taken under
   * blockUntilReady; later calls do nothing.
   */
  markReady(): void {
    if (this.readySignalled) {
      return;
    }
    this.readySignalled = true;
    if (this.readyBlockHeld) {
      this.readyBlockHeld = false;
      this.unblock();
    }
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  /**
   * One cooperative step. Called by the internal interval; exposed so hosts
   * with their own frame loop (and tests) can drive it.
   */
  tick(): void {
    if (this.lifecycle !== 'running') {
      return;
    }
    try {
      this.activeCountdown?.tick();
      const now = this.now();
      this.checkShowRequestTimeout(now);
      this.poll(now);
    } catch (error) {
      console.error('[Admission Scheduler] ❌ Tick failed:', error);
    }
  }

  private poll(now: number): void {
    const platform = this.platform;
    const decision: AdmissionDecision = decideNaturalAdmission({
      phase: this.phase,
      pollingActive: this.polling,
      zoneAllowed: () => this.zoneGate.isAllowed(),
      blockCount: () => this.blocks.value,
      cooldownReady: () => this.cooldown.isReady(now),
      platformAvailable: platform !== null,
      storeAvailable: this.hasCounterStore,
      timerReady: () => platform?.isNaturalTimerReady() ?? false,
      timerStale: () =>
        platform !== null && this.cooldown.isSuspectedStale(now, platform.secondsUntilNaturalTimer()),
    });

    if (decision.type === 'SKIP') {
      if (this.config.debugLogs && decision.reason !== 'BUSY' && decision.reason !== 'TIMER_NOT_READY') {
        console.log('[Admission Scheduler] Natural admission skipped:', decision.reason);
      }
      return;
    }

    console.log('[Admission Scheduler] Natural timer ready, admitting interruption');
    this.beginCycle('natural');
  }

  // ==========================================================================
  // Block counter
  // ==========================================================================

  /** Suppress admission; cancels a running countdown. Pair with unblock(). */
  block(): void {
    const count = this.blocks.block();
    if (this.config.debugLogs) {
      console.log('[Admission Scheduler] Blocked', { count });
    }
    this.cancelActiveCountdown('admission blocked');
  }

  unblock(): void {
    const before = this.blocks.value;
    const count = this.blocks.unblock();
    if (before === 0) {
      console.warn('[Admission Scheduler] unblock() without matching block(), count stays 0');
      return;
    }
    if (this.config.debugLogs) {
      console.log('[Admission Scheduler] Unblocked', { count });
    }
  }

  /** Recovery for leaked block() calls. */
  forceResetBlocks(): void {
    const previous = this.blocks.forceReset();
    this.readyBlockHeld = false;
    console.warn('[Admission Scheduler] Block counter force-reset', { previous });
  }

  // ==========================================================================
  // Manual & rewarded triggers
  // ==========================================================================

  requestManualTrigger(): ManualTriggerOutcome {
    const rejection = precheckManualTrigger(this.manualProbe());
    if (rejection !== null) {
      console.log('[Admission Scheduler] Manual trigger rejected:', rejection);
      return rejection;
    }

    if (!this.manual.shouldAdmit()) {
      return 'SKIPPED_BY_FREQUENCY';
    }

    const platform = this.platform;
    if (platform && !platform.isNaturalTimerReady()) {
      platform.forceNaturalTimerReady();
    }

    if (this.config.manualTriggerMode === 'countdown') {
      this.beginCycle('manual');
    } else {
      this.cancelActiveCountdown('manual trigger pre-empts countdown');
      this.showEvent('manual');
    }
    return 'ADMITTED';
  }

  /**
   * Would requestManualTrigger() admit right now? Does not advance the counter.
   */
  wouldManualTriggerFire(): boolean {
    return precheckManualTrigger(this.manualProbe()) === null && this.manual.peek();
  }

  /**
   * Show a rewarded interruption. Not subject to the frequency policy,
   * cooldown or natural timer, and its close does not start a cooldown.
   *
   * @returns false if the request could not be made
   */
  requestRewarded(rewardId: string, onReward: () => void): boolean {
    const platform = this.platform;
    if (!platform) {
      console.warn('[Admission Scheduler] Rewarded request without platform', { rewardId });
      return false;
    }
    if (this.phase === 'SHOWING' || this.phase === 'AWAITING_OPEN') {
      console.warn('[Admission Scheduler] Rewarded request while an interruption is active', { rewardId });
      return false;
    }

    this.cancelActiveCountdown('rewarded interruption requested');
    this.transition('SHOW_REQUESTED');
    this.showRequestedAt = this.now();
    this.events.emit('eventRequested', { trigger: 'reward', kind: 'rewarded' });
    platform.showRewarded(rewardId, onReward);
    return true;
  }

  private manualProbe(): ManualTriggerProbe {
    return {
      started: this.lifecycle === 'running',
      phase: this.phase,
      mode: this.config.manualTriggerMode,
      blocked: this.blocks.isBlocked,
      platformAvailable: this.platform !== null,
      frequencyEnabled: this.manual.isEnabled,
    };
  }

  // ==========================================================================
  // Cycle: countdown → show
  // ==========================================================================

  private beginCycle(trigger: TriggerSource): void {
    if (!this.config.countdownWarningEnabled) {
      this.showEvent(trigger);
      return;
    }

    const countdown = new CountdownController(this.controllers, {
      onStarted: (remainingSec) =>
        this.events.emit('countdownStarted', { countdownId: countdown.id, remainingSec, trigger }),
      onTick: (remainingSec) => this.events.emit('countdownTick', { countdownId: countdown.id, remainingSec }),
      onEnded: (outcome) => this.events.emit('countdownEnded', { countdownId: countdown.id, outcome }),
    });

    this.activeCountdown = countdown;
    this.transition('COUNTDOWN_STARTED');
    countdown.start(this.config.countdownDurationSec, () => this.handleCountdownCompleted(countdown, trigger));
  }

  private handleCountdownCompleted(countdown: CountdownController, trigger: TriggerSource): void {
    if (this.activeCountdown !== countdown) {
      return;
    }
    this.activeCountdown = null;

    this.releaseHandoff('superseded by a newer countdown');
    this.handoffCountdown = countdown;

    if (!this.showEvent(trigger)) {
      this.releaseHandoff('show not requested');
      this.transition('COUNTDOWN_CANCELLED');
    }
  }

  /**
   * Ask the platform to display an interstitial.
   *
   * @returns false if nothing was requested
   */
  private showEvent(trigger: TriggerSource): boolean {
    const platform = this.platform;
    if (!platform) {
      console.warn('[Admission Scheduler] No platform, cannot show interruption');
      return false;
    }
    if (this.phase === 'SHOWING' || this.phase === 'AWAITING_OPEN') {
      console.warn('[Admission Scheduler] Interruption already active, show ignored');
      return false;
    }

    // Transition first: a platform may report "opened" synchronously from show().
    this.transition('SHOW_REQUESTED');
    this.showRequestedAt = this.now();
    this.events.emit('eventRequested', { trigger, kind: 'interstitial' });

    console.log('[Admission Scheduler] Requesting interruption', { trigger });
    platform.show();
    return true;
  }

  private checkShowRequestTimeout(now: number): void {
    if (this.phase !== 'AWAITING_OPEN' || this.showRequestedAt === null) {
      return;
    }
    if (now - this.showRequestedAt < this.config.showRequestTimeoutMs) {
      return;
    }

    console.warn('[Admission Scheduler] Platform never opened the interruption, giving up', {
      waitedMs: now - this.showRequestedAt,
    });
    this.showRequestedAt = null;
    this.transition('SHOW_TIMED_OUT');
    this.releaseHandoff('show request timed out');
  }

  private cancelActiveCountdown(reason: string): void {
    const countdown = this.activeCountdown;
    if (!countdown) {
      return;
    }
    this.activeCountdown = null;
    try {
      countdown.cancel();
    } catch (error) {
      console.error('[Admission Scheduler] ❌ Countdown cancel failed:', error);
    }
    this.transition('COUNTDOWN_CANCELLED');
    console.log('[Admission Scheduler] Countdown cancelled:', reason);
  }

  private releaseHandoff(reason: string): void {
    const countdown = this.handoffCountdown;
    if (!countdown) {
      return;
    }
    this.handoffCountdown = null;
    const restored = countdown.ensureRestored();
    if (this.config.debugLogs) {
      console.log('[Admission Scheduler] Controllers released', { reason, restored });
    }
  }

  // ==========================================================================
  // Platform & zone notifications
  // ==========================================================================

  handlePlatformNotification(notification: PlatformNotification): void {
    switch (notification.type) {
      case 'opened':
        this.handleOpened(notification.kind);
        return;
      case 'closed':
        this.handleClosed(notification.kind);
        return;
      case 'rewardGranted':
        console.log('[Admission Scheduler] Reward granted', { rewardId: notification.rewardId });
        this.events.emit('rewardGranted', { rewardId: notification.rewardId });
        return;
      case 'pauseChanged':
        if (!notification.paused && this.phase !== 'SHOWING') {
          this.releaseHandoff('platform pause released');
        }
        return;
    }
  }

  private handleOpened(kind: InterruptionKind): void {
    if (!this.transition('OPENED')) {
      if (this.config.debugLogs) {
        console.log('[Admission Scheduler] Duplicate "opened" ignored', { kind });
      }
      return;
    }
    this.showRequestedAt = null;

    const countdown = this.activeCountdown;
    if (countdown) {
      this.activeCountdown = null;
      countdown.cancel();
    }

    console.log('[Admission Scheduler] Interruption opened', { kind });
    this.events.emit('eventOpened', { kind });
  }

  private handleClosed(kind: InterruptionKind): void {
    if (!this.transition('CLOSED')) {
      if (this.config.debugLogs) {
        console.log('[Admission Scheduler] Duplicate "closed" ignored', { kind });
      }
      return;
    }

    const closedAt = this.now();
    if (kind === 'interstitial') {
      this.cooldown.recordClose(closedAt);
    }
    this.showRequestedAt = null;
    this.releaseHandoff('interruption closed');

    if (this.zoneGate.isAllowed()) {
      this.polling = true;
    }

    console.log('[Admission Scheduler] Interruption closed', { kind, closedAt });
    this.events.emit('eventClosed', { kind, closedAt });
  }

  handleZoneChanged(zone: ZoneId): void {
    const change = this.zoneGate.update(zone);

    if (!change.isAllowed) {
      if (change.wasAllowed) {
        console.log('[Admission Scheduler] Left allowed zones, pausing natural admission', { zone });
      }
      this.polling = false;
      this.cancelActiveCountdown('zone not allowed');
      return;
    }

    if (change.wasAllowed) {
      return;
    }

    console.log('[Admission Scheduler] Entered allowed zone, natural timer restarted', { zone });
    if (this.config.resetBlocksOnZoneReturn && this.blocks.isBlocked) {
      this.forceResetBlocks();
    }
    this.platform?.resetNaturalTimerToFullInterval();
    this.polling = true;
  }

  // ==========================================================================
  // Phase machine
  // ==========================================================================

  private transition(transition: PhaseTransition): boolean {
    const from = this.phase;
    const to = nextPhase(from, transition);
    if (to === null) {
      return false;
    }
    this.phase = to;
    if (this.config.debugLogs) {
      console.log('[Admission Scheduler] Phase', { from, to, transition });
    }
    this.events.emit('phaseChanged', { from, to, transition });
    return true;
  }
}
