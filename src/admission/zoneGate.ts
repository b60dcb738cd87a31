/**
 * Zone Gate
 *
 * Restricts admission to permitted gameplay zones. The zone collaborator is
 * external; the gate only remembers the latest zone it was told about.
 */

export type ZoneId = string;

export type Unsubscribe = () => void;

/**
 * External zone/location collaborator.
 */
export interface ZoneSource {
  getCurrentZone(): ZoneId | null;
  onZoneChanged(listener: (zone: ZoneId) => void): Unsubscribe;
}

export interface ZoneTransition {
  previousZone: ZoneId | null;
  zone: ZoneId;
  wasAllowed: boolean;
  isAllowed: boolean;
}

export class ZoneGate {
  private readonly allowedZones: ReadonlySet<ZoneId> | null;
  private zone: ZoneId | null = null;

  /**
   * @param allowedZones - null admits every zone (including an unknown one)
   */
  constructor(allowedZones: readonly ZoneId[] | null) {
    this.allowedZones = allowedZones === null ? null : new Set(allowedZones);
  }

  get currentZone(): ZoneId | null {
    return this.zone;
  }

  get isRestricted(): boolean {
    return this.allowedZones !== null;
  }

  isAllowed(): boolean {
    return this.allows(this.zone);
  }

  allows(zone: ZoneId | null): boolean {
    if (this.allowedZones === null) {
      return true;
    }
    // Restricted and no zone collaborator report yet: nothing to admit in.
    if (zone === null) {
      return false;
    }
    return this.allowedZones.has(zone);
  }

  update(zone: ZoneId): ZoneTransition {
    const previousZone = this.zone;
    const wasAllowed = this.allows(previousZone);
    this.zone = zone;
    return { previousZone, zone, wasAllowed, isAllowed: this.allows(zone) };
  }
}
