/**
 * Startup Collaborator Check
 *
 * Validates that the scheduler's external collaborators were wired in before
 * it starts, so a missing platform, zone source or counter store shows up in the logs
 * instead of as "interruptions never appear".
 *
 * Usage:
 *   const report = checkCollaborators({ platform, zones, counterStore, config });
 *   if (report.criticalMissing) { ... }
 */

import type { SchedulerConfig } from '../config/schedulerConfig';
import type { PlatformAdapter } from '../platform/platformAdapter';
import type { CounterStore } from '../storage/counterStore';
import type { ZoneSource } from './zoneGate';

interface CollaboratorCheck {
  name: string;
  present: boolean;
  critical: boolean;
  description: string;
}

export interface CollaboratorReport {
  allAvailable: boolean;
  criticalMissing: boolean;
  missing: string[];
}

export interface Collaborators {
  platform?: PlatformAdapter | null;
  zones?: ZoneSource | null;
  counterStore?: CounterStore | null;
  config: Pick<SchedulerConfig, 'allowedZones'>;
}

export function checkCollaborators({ platform, zones, counterStore, config }: Collaborators): CollaboratorReport {
  const restricted = config.allowedZones !== null;

  const checks: CollaboratorCheck[] = [
    {
      name: 'PlatformAdapter',
      present: platform != null,
      critical: true,
      description: 'Natural and manual interruptions are disabled without a platform',
    },
    {
      name: 'ZoneSource',
      present: zones != null,
      critical: restricted,
      description: restricted
        ? 'allowedZones is set but no zone source is wired: natural admission will never pass the zone gate'
        : 'No zone restrictions configured',
    },
    {
      name: 'CounterStore',
      present: counterStore != null,
      critical: true,
      description: 'Natural interruptions are disabled; the manual-trigger counter resets every session',
    },
  ];

  console.log('[Collaborators] 🔍 Validating collaborators...');

  const missing: string[] = [];
  let criticalMissing = false;

  checks.forEach(({ name, present, critical, description }) => {
    if (present) {
      console.log(`✅ ${name} is available`);
      return;
    }
    missing.push(name);
    if (critical) {
      criticalMissing = true;
      console.error(`❌ CRITICAL: ${name} is not available`);
      console.error(`   ${description}`);
    } else {
      console.warn(`⚠️  WARNING: ${name} is not available`);
      console.warn(`   ${description}`);
    }
  });

  if (missing.length === 0) {
    console.log('[Collaborators] ✅ All collaborators available');
  }

  return { allAvailable: missing.length === 0, criticalMissing, missing };
}
