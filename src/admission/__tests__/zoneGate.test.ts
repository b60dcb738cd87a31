import { describe, expect, it } from 'vitest';
import { ZoneGate } from '../zoneGate';

describe('ZoneGate', () => {
  it('admits everywhere when unrestricted, including an unknown zone', () => {
    const gate = new ZoneGate(null);
    expect(gate.isRestricted).toBe(false);
    expect(gate.isAllowed()).toBe(true);

    gate.update('anywhere');
    expect(gate.isAllowed()).toBe(true);
  });

  it('never admits under restrictions until a zone is known', () => {
    const gate = new ZoneGate(['arena', 'city']);
    expect(gate.isRestricted).toBe(true);
    expect(gate.currentZone).toBeNull();
    expect(gate.isAllowed()).toBe(false);
  });

  it('reports transitions across the allowed boundary', () => {
    const gate = new ZoneGate(['arena']);

    expect(gate.update('lobby')).toEqual({
      previousZone: null,
      zone: 'lobby',
      wasAllowed: false,
      isAllowed: false,
    });
    expect(gate.update('arena')).toEqual({
      previousZone: 'lobby',
      zone: 'arena',
      wasAllowed: false,
      isAllowed: true,
    });
    expect(gate.update('lobby')).toEqual({
      previousZone: 'arena',
      zone: 'lobby',
      wasAllowed: true,
      isAllowed: false,
    });
  });

  it('treats an empty allow-list as "nowhere"', () => {
    const gate = new ZoneGate([]);
    gate.update('arena');
    expect(gate.isAllowed()).toBe(false);
  });
});
