import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ControllerRegistry, type SuspendableController } from '../controllerSuspension';
import { FakeController, silenceConsole } from './fakes';

describe('ControllerRegistry', () => {
  beforeEach(() => {
    silenceConsole();
  });

  it('registers and unregisters controllers', () => {
    const registry = new ControllerRegistry();
    const player = new FakeController('player');
    const camera = new FakeController('camera');

    const unregister = registry.register(player);
    registry.register(camera);
    expect(registry.list()).toEqual([player, camera]);

    unregister();
    expect(registry.list()).toEqual([camera]);
  });

  it('disables an enabled controller and re-enables it on restore', () => {
    const registry = new ControllerRegistry();
    const player = new FakeController('player');
    const owner = Symbol('owner');

    expect(registry.suspend(player, owner)).toBe('enabled');
    expect(player.isEnabled).toBe(false);
    expect(registry.isSuspended(player)).toBe(true);

    expect(registry.restore(player, owner)).toBe('restored');
    expect(player.isEnabled).toBe(true);
    expect(registry.isSuspended(player)).toBe(false);
    expect(player.setEnabledCalls).toEqual([false, true]);
  });

  it('leaves a controller that was already disabled untouched', () => {
    const registry = new ControllerRegistry();
    const interaction = new FakeController('interaction', false);
    const owner = Symbol('owner');

    expect(registry.suspend(interaction, owner)).toBe('disabled');
    expect(registry.restore(interaction, owner)).toBe('left-disabled');
    expect(interaction.setEnabledCalls).toEqual([]);
    expect(interaction.isEnabled).toBe(false);
  });

  it('does not re-enable a controller held disabled elsewhere', () => {
    const registry = new ControllerRegistry();
    const player = new FakeController('player');
    const owner = Symbol('owner');

    registry.suspend(player, owner);
    player.heldDisabled = true;

    expect(registry.restore(player, owner)).toBe('held-disabled');
    expect(player.isEnabled).toBe(false);
  });

  it('transfers ownership to a newer suspension and keeps the original flag', () => {
    const registry = new ControllerRegistry();
    const player = new FakeController('player');
    const older = Symbol('older');
    const newer = Symbol('newer');

    registry.suspend(player, older);
    expect(registry.suspend(player, newer)).toBe('enabled');
    expect(registry.ownerOf(player)).toBe(newer);

    expect(registry.restore(player, older)).toBe('not-owner');
    expect(player.isEnabled).toBe(false);

    expect(registry.restore(player, newer)).toBe('restored');
    expect(player.isEnabled).toBe(true);
  });

  it('restores to enabled when the prior state could not be read', () => {
    const registry = new ControllerRegistry();
    const setEnabled = vi.fn();
    const flaky: SuspendableController = {
      name: 'flaky',
      get isEnabled(): boolean {
        throw new Error('destroyed');
      },
      setEnabled,
    };
    const owner = Symbol('owner');

    expect(registry.suspend(flaky, owner)).toBe('unknown');
    expect(registry.restore(flaky, owner)).toBe('restored');
    expect(setEnabled.mock.calls).toEqual([[false], [true]]);
  });

  it('reports a failed re-enable', () => {
    const registry = new ControllerRegistry();
    const player = new FakeController('player');
    const owner = Symbol('owner');

    registry.suspend(player, owner);
    vi.spyOn(player, 'setEnabled').mockImplementation(() => {
      throw new Error('gone');
    });

    expect(registry.restore(player, owner)).toBe('failed');
    expect(registry.isSuspended(player)).toBe(false);
    expect(console.error).toHaveBeenCalled();
  });

  it('re-enables a controller whose held state cannot be read', () => {
    const registry = new ControllerRegistry();
    const player = new FakeController('player');
    const owner = Symbol('owner');

    registry.suspend(player, owner);
    vi.spyOn(player, 'isHeldDisabled').mockImplementation(() => {
      throw new Error('boom');
    });

    expect(registry.restore(player, owner)).toBe('restored');
    expect(player.isEnabled).toBe(true);
    expect(console.warn).toHaveBeenCalled();
  });
});
