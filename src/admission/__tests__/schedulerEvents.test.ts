import { beforeEach, describe, expect, it, vi } from 'vitest';
import { nextPhase, SchedulerEventEmitter } from '../schedulerEvents';
import { silenceConsole } from './fakes';

describe('nextPhase', () => {
  it('follows the cycle IDLE → COUNTING_DOWN → AWAITING_OPEN → SHOWING → IDLE', () => {
    expect(nextPhase('IDLE', 'COUNTDOWN_STARTED')).toBe('COUNTING_DOWN');
    expect(nextPhase('COUNTING_DOWN', 'SHOW_REQUESTED')).toBe('AWAITING_OPEN');
    expect(nextPhase('AWAITING_OPEN', 'OPENED')).toBe('SHOWING');
    expect(nextPhase('SHOWING', 'CLOSED')).toBe('IDLE');
  });

  it('rejects duplicate notifications', () => {
    expect(nextPhase('SHOWING', 'OPENED')).toBeNull();
    expect(nextPhase('IDLE', 'CLOSED')).toBeNull();
  });

  it('rejects a second countdown while one is running', () => {
    expect(nextPhase('COUNTING_DOWN', 'COUNTDOWN_STARTED')).toBeNull();
  });

  it('returns to IDLE when a show request times out', () => {
    expect(nextPhase('AWAITING_OPEN', 'SHOW_TIMED_OUT')).toBe('IDLE');
    expect(nextPhase('SHOWING', 'SHOW_TIMED_OUT')).toBeNull();
  });
});

describe('SchedulerEventEmitter', () => {
  beforeEach(() => {
    silenceConsole();
  });

  it('delivers typed payloads and unsubscribes', () => {
    const events = new SchedulerEventEmitter();
    const listener = vi.fn();

    const off = events.on('rewardGranted', listener);
    events.emit('rewardGranted', { rewardId: 'coins' });
    off();
    events.emit('rewardGranted', { rewardId: 'gems' });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ rewardId: 'coins' });
    expect(events.listenerCount('rewardGranted')).toBe(0);
  });

  it('keeps delivering when a listener throws', () => {
    const events = new SchedulerEventEmitter();
    const after = vi.fn();

    events.on('eventOpened', () => {
      throw new Error('overlay crashed');
    });
    events.on('eventOpened', after);

    expect(() => events.emit('eventOpened', { kind: 'interstitial' })).not.toThrow();
    expect(after).toHaveBeenCalledWith({ kind: 'interstitial' });
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
