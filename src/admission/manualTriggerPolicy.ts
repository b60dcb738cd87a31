/**
 * Manual Trigger Policy
 *
 * Frequency gate for explicitly requested interruptions (e.g. a "Next" button).
 * The counter is incremented BEFORE the modulo check, so with frequency = 2:
 *   - 1st request: counter 1, 1 % 2 != 0 → skip
 *   - 2nd request: counter 2, 2 % 2 == 0 → admit
 *   - 3rd request: counter 3 → skip, 4th → admit, ...
 *
 * frequency == 1 admits every request; frequency <= 0 disables manual
 * triggers entirely and leaves the counter untouched.
 */

import type { CounterStore } from '../storage/counterStore';

export interface ManualTriggerPolicyOptions {
  frequency: number;
  counterKey: string;
  store: CounterStore;
  debugLogs?: boolean;
}

export class ManualTriggerPolicy {
  private counter = 0;

  constructor(private readonly options: ManualTriggerPolicyOptions) {}

  get currentCounter(): number {
    return this.counter;
  }

  get isEnabled(): boolean {
    return this.options.frequency > 0;
  }

  /**
   * Load the persisted counter. A read failure keeps the in-memory value.
   */
  async load(): Promise<void> {
    try {
      const stored = await this.options.store.read(this.options.counterKey);
      this.counter = stored ?? 0;
      if (this.options.debugLogs) {
        console.log('[Manual Trigger] Loaded counter', {
          counter: this.counter,
          frequency: this.options.frequency,
        });
      }
    } catch (e) {
      console.warn('[Manual Trigger] Failed to load counter, starting from', this.counter, e);
    }
  }

  /**
   * Count one manual request and decide whether it admits an interruption.
   * Persistence is fire-and-forget; the in-memory counter is authoritative.
   */
  shouldAdmit(): boolean {
    const { frequency } = this.options;
    if (frequency <= 0) {
      return false;
    }

    this.counter += 1;
    this.persist();

    const admit = frequency === 1 || this.counter % frequency === 0;
    if (this.options.debugLogs) {
      console.log('[Manual Trigger] Request counted', {
        counter: this.counter,
        frequency,
        admit,
        nextAdmitAt: this.nextAdmittingCounter(),
      });
    }
    return admit;
  }

  /**
   * Would the next shouldAdmit() call admit? Does not touch the counter.
   */
  peek(): boolean {
    const { frequency } = this.options;
    if (frequency <= 0) {
      return false;
    }
    if (frequency === 1) {
      return true;
    }
    return (this.counter + 1) % frequency === 0;
  }

  /**
   * Counter value at which the next admission happens (-1 when disabled).
   */
  nextAdmittingCounter(): number {
    const { frequency } = this.options;
    if (frequency <= 0) {
      return -1;
    }
    if (frequency === 1) {
      return this.counter + 1;
    }
    return (Math.floor(this.counter / frequency) + 1) * frequency;
  }

  private persist(): void {
    const value = this.counter;
    this.options.store.write(this.options.counterKey, value).catch((error: unknown) => {
      console.error('[Manual Trigger] ❌ Failed to persist counter:', { value, error });
    });
  }
}
