import { describe, expect, it } from 'vitest';
import { BlockCounter } from '../blockCounter';

describe('BlockCounter', () => {
  it('starts unblocked', () => {
    const counter = new BlockCounter();
    expect(counter.value).toBe(0);
    expect(counter.isBlocked).toBe(false);
  });

  it('stays blocked until every block is released', () => {
    const counter = new BlockCounter();
    expect(counter.block()).toBe(1);
    expect(counter.block()).toBe(2);

    expect(counter.unblock()).toBe(1);
    expect(counter.isBlocked).toBe(true);

    expect(counter.unblock()).toBe(0);
    expect(counter.isBlocked).toBe(false);
  });

  it('clamps an unmatched unblock at zero', () => {
    const counter = new BlockCounter();
    expect(counter.unblock()).toBe(0);
    expect(counter.block()).toBe(1);
    expect(counter.isBlocked).toBe(true);
  });

  it('force-resets and reports the previous count', () => {
    const counter = new BlockCounter();
    counter.block();
    counter.block();
    counter.block();

    expect(counter.forceReset()).toBe(3);
    expect(counter.value).toBe(0);
    expect(counter.isBlocked).toBe(false);
  });
});
