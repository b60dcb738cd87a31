/**
 * Counter Store
 *
 * Persists the manual-trigger counter between sessions. The scheduler only
 * ever stores small non-negative integers, read once at startup and written
 * after every increment.
 *
 * Backed by Keyv: in-memory by default, or any Keyv storage adapter the host
 * passes in (file, Redis, SQLite...).
 */

import Keyv from 'keyv';
import { z } from 'zod';

const STORE_NAMESPACE = 'admission_v1';

const storedCounterSchema = z.number().int().nonnegative();

export interface CounterStore {
  /** Resolves to null when nothing (valid) is stored under the key. */
  read(key: string): Promise<number | null>;
  write(key: string, value: number): Promise<void>;
}

export class KeyvCounterStore implements CounterStore {
  private readonly keyv: Keyv<number>;

  constructor(keyv?: Keyv<number>) {
    this.keyv = keyv ?? new Keyv<number>({ namespace: STORE_NAMESPACE });
    this.keyv.on('error', (error: unknown) => {
      console.error('[Counter Store] Storage adapter error:', error);
    });
  }

  async read(key: string): Promise<number | null> {
    const raw: unknown = await this.keyv.get(key);
    if (raw === undefined || raw === null) {
      return null;
    }

    const parsed = storedCounterSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn('[Counter Store] Ignoring invalid stored counter', { key, raw });
      return null;
    }
    return parsed.data;
  }

  async write(key: string, value: number): Promise<void> {
    await this.keyv.set(key, value);
  }
}
