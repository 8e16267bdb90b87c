/**
 * Per-run shared state.
 *
 * One store exists per pipeline run and is discarded with it. Keys are
 * written once: either seeded from the run's initial context or committed
 * by the single module that declares the key in `producedKeys`. Because
 * the registry rejects a second producer for a key and writes are only
 * committed at wave barriers, no two modules ever contend for a key and
 * the store needs no locking.
 *
 * Modules never see the store itself; they receive a scoped reader that
 * only exposes the keys they declared in `consumedKeys`.
 */

import type { ModuleDescriptor } from "../types/module.js";
import {
  DuplicateWriteError,
  MissingKeyError,
  UndeclaredKeyError,
} from "./errors.js";

/** Returned by `get()` when a key has no value in this run. */
export const MISSING: unique symbol = Symbol("shared-state.missing");

export type Missing = typeof MISSING;

export function isMissing(value: unknown): value is Missing {
  return value === MISSING;
}

/**
 * Read access granted to one module.
 *
 * A missing value is legitimate: its producer may have been optional and
 * failed, or skipped. Use `require()` when the module cannot proceed
 * without the value.
 */
export interface SharedStateReader {
  get(key: string): unknown;
  has(key: string): boolean;
  /** @throws MissingKeyError when the key has no value */
  require(key: string): unknown;
}

export class SharedStateStore {
  private readonly values = new Map<string, unknown>();

  constructor(initial: Readonly<Record<string, unknown>> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.set(key, value);
    }
  }

  /**
   * Store a value. Who may write which key is settled at registration;
   * the store only guarantees each key is written once per run.
   *
   * @throws DuplicateWriteError if the key already has a value
   */
  set(key: string, value: unknown): void {
    if (this.values.has(key)) {
      throw new DuplicateWriteError(key);
    }
    this.values.set(key, value);
  }

  /** The value for `key`, or MISSING. */
  get(key: string): unknown {
    return this.values.has(key) ? this.values.get(key) : MISSING;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return [...this.values.keys()].sort();
  }

  /**
   * Check a module's writes against its declared produced keys.
   * Returns the first offending key, if any.
   */
  static undeclaredWrite(
    descriptor: ModuleDescriptor,
    writes: Readonly<Record<string, unknown>>
  ): string | undefined {
    const allowed = new Set(descriptor.producedKeys);
    return Object.keys(writes).find((key) => !allowed.has(key));
  }

  /**
   * Commit a module's writes after validating them against its
   * produced keys. Nothing is written when any key is undeclared.
   *
   * @throws UndeclaredKeyError for a key outside `producedKeys`
   */
  commit(
    descriptor: ModuleDescriptor,
    writes: Readonly<Record<string, unknown>>
  ): void {
    const offending = SharedStateStore.undeclaredWrite(descriptor, writes);
    if (offending !== undefined) {
      throw new UndeclaredKeyError(descriptor.id, offending, "write");
    }
    for (const [key, value] of Object.entries(writes)) {
      this.set(key, value);
    }
  }

  /**
   * Reader restricted to the descriptor's consumed keys.
   */
  viewFor(descriptor: ModuleDescriptor): SharedStateReader {
    const allowed = new Set(descriptor.consumedKeys);
    const check = (key: string): void => {
      if (!allowed.has(key)) {
        throw new UndeclaredKeyError(descriptor.id, key, "read");
      }
    };

    return {
      get: (key) => {
        check(key);
        return this.get(key);
      },
      has: (key) => {
        check(key);
        return this.has(key);
      },
      require: (key) => {
        check(key);
        const value = this.get(key);
        if (isMissing(value)) {
          throw new MissingKeyError(descriptor.id, key);
        }
        return value;
      },
    };
  }

  /**
   * Frozen copy of all values, keys sorted. Keys are defined rather than
   * assigned, so `__proto__` stays an ordinary own key.
   */
  snapshot(): Readonly<Record<string, unknown>> {
    const copy: Record<string, unknown> = {};
    for (const key of this.keys()) {
      Object.defineProperty(copy, key, {
        value: this.values.get(key),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return Object.freeze(copy);
  }
}
