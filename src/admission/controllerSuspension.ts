/**
 * Controller Suspension
 *
 * Input controllers (player movement, interaction handler, camera...) are
 * disabled while a warning countdown or an interruption is on screen.
 *
 * The registry keeps one ledger entry per suspended controller:
 *   - the ORIGINAL enabled flag captured by the first suspension
 *   - the countdown instance that currently owns the suspension
 *
 * Only the current owner may restore a controller. A newer countdown that
 * suspends an already-suspended controller takes over ownership and keeps the
 * original flag, so a late restore from an older cycle cannot re-enable a
 * controller the newer cycle still needs disabled.
 */

export interface SuspendableController {
  /** Diagnostic label. */
  readonly name?: string;
  readonly isEnabled: boolean;
  setEnabled(enabled: boolean): void;
  /**
   * True while some other system (pause menu, cutscene...) wants this
   * controller disabled; restoration then leaves it alone.
   */
  isHeldDisabled?(): boolean;
}

export type SuspensionOwner = symbol;

/** `unknown` means the prior state could not be read. */
export type PriorState = 'enabled' | 'disabled' | 'unknown';

export type RestoreResult = 'restored' | 'left-disabled' | 'held-disabled' | 'not-owner' | 'failed';

interface LedgerEntry {
  owner: SuspensionOwner;
  prior: PriorState;
}

function labelOf(controller: SuspendableController): string {
  return controller.name ?? 'controller';
}

export class ControllerRegistry {
  private readonly controllers = new Set<SuspendableController>();
  private readonly ledger = new Map<SuspendableController, LedgerEntry>();

  /**
   * @returns Function that unregisters the controller
   */
  register(controller: SuspendableController): () => void {
    this.controllers.add(controller);
    return () => {
      this.controllers.delete(controller);
    };
  }

  list(): SuspendableController[] {
    return Array.from(this.controllers);
  }

  isSuspended(controller: SuspendableController): boolean {
    return this.ledger.has(controller);
  }

  ownerOf(controller: SuspendableController): SuspensionOwner | undefined {
    return this.ledger.get(controller)?.owner;
  }

  /**
   * Disable a controller on behalf of `owner`.
   *
   * @returns The prior state recorded for this controller
   */
  suspend(controller: SuspendableController, owner: SuspensionOwner): PriorState {
    const existing = this.ledger.get(controller);
    if (existing) {
      // Already suspended by an earlier cycle: transfer ownership, keep the original flag.
      existing.owner = owner;
      return existing.prior;
    }

    let prior: PriorState;
    try {
      prior = controller.isEnabled ? 'enabled' : 'disabled';
    } catch (error) {
      console.warn('[Controller Suspension] Could not read enabled state', {
        controller: labelOf(controller),
        error,
      });
      prior = 'unknown';
    }

    this.ledger.set(controller, { owner, prior });

    if (prior !== 'disabled') {
      try {
        controller.setEnabled(false);
      } catch (error) {
        console.error('[Controller Suspension] ❌ Failed to disable controller', {
          controller: labelOf(controller),
          error,
        });
      }
    }
    return prior;
  }

  /**
   * Give a controller back. Controllers that were disabled before suspension
   * stay disabled; an unknown prior state is restored to enabled.
   */
  restore(controller: SuspendableController, owner: SuspensionOwner): RestoreResult {
    const entry = this.ledger.get(controller);
    if (!entry || entry.owner !== owner) {
      return 'not-owner';
    }
    this.ledger.delete(controller);

    if (entry.prior === 'disabled') {
      return 'left-disabled';
    }

    let held = false;
    try {
      held = controller.isHeldDisabled?.() ?? false;
    } catch (error) {
      console.warn('[Controller Suspension] Could not read held state, re-enabling', {
        controller: labelOf(controller),
        error,
      });
    }

    if (held) {
      console.log('[Controller Suspension] Controller held disabled elsewhere, not re-enabling', {
        controller: labelOf(controller),
      });
      return 'held-disabled';
    }

    try {
      controller.setEnabled(true);
      return 'restored';
    } catch (error) {
      console.error('[Controller Suspension] ❌ Failed to re-enable controller', {
        controller: labelOf(controller),
        error,
      });
      return 'failed';
    }
  }
}
