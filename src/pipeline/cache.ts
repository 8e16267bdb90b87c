/**
 * Process-wide memoization with at-most-once computation per key.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ENTRY LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Absent ──(miss)──▶ Pending ──(success)──▶ Ready(value)
 *                         │                      │
 *                         └──(failure)──▶ Absent ◀┘ (TTL expired / evicted)
 *
 * A Pending entry holds the one in-flight computation for its key. Every
 * caller that arrives while the key is Pending awaits that same promise,
 * so it receives the same value, or the same ComputationFailedError
 * instance. Failures are never stored: the key returns to Absent and the
 * next caller computes again.
 *
 * Entries are tracked per key; there is no table-wide lock, so a slow
 * computation only delays callers of its own key.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EVICTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * - TTL is checked lazily on access. `Infinity` keeps an entry for the
 *   lifetime of the process.
 * - With `maxEntries > 0`, the least recently used Ready entries are
 *   dropped once the bound is exceeded. Pending entries are never evicted.
 */

import { config } from "../config/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { ComputationFailedError } from "./errors.js";
import { fingerprint } from "./fingerprint.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CacheOptions {
  /** TTL applied when getOrCompute() is called without one (ms). */
  defaultTtlMs?: number;
  /** Upper bound on Ready entries; 0 disables the bound. */
  maxEntries?: number;
  /** Clock, injectable for TTL tests. */
  now?: () => number;
  logger?: Logger;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Callers that joined an in-flight computation instead of starting one. */
  coalesced: number;
  computations: number;
  failures: number;
  expirations: number;
  evictions: number;
  size: number;
  pendingKeys: number;
}

export type CacheEntryState = "absent" | "pending" | "ready";

interface PendingSlot {
  readonly state: "pending";
  readonly promise: Promise<unknown>;
  /** Identity of the computation that owns this slot. */
  readonly ticket: object;
}

interface ReadySlot {
  readonly state: "ready";
  readonly value: unknown;
  readonly expiresAt: number;
}

type Slot = PendingSlot | ReadySlot;

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export class CacheLayer {
  private readonly slots = new Map<string, Slot>();
  private readonly defaultTtlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private counters = {
    hits: 0,
    misses: 0,
    coalesced: 0,
    computations: 0,
    failures: 0,
    expirations: 0,
    evictions: 0,
  };

  constructor(options: CacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? config.cacheDefaultTtlMs;
    this.maxEntries = options.maxEntries ?? 0;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createSilentLogger();

    if (!(this.defaultTtlMs > 0)) {
      throw new RangeError(`defaultTtlMs must be positive, got ${this.defaultTtlMs}`);
    }
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 0) {
      throw new RangeError(`maxEntries must be a non-negative integer, got ${this.maxEntries}`);
    }
  }

  /**
   * Return the cached value for `key`, computing it with `compute` on a
   * miss. Concurrent callers for the same key share one computation.
   *
   * @param ttlMs - Lifetime of the stored value; defaults to the cache's TTL
   * @throws ComputationFailedError when the computation rejects or throws
   */
  getOrCompute<T>(
    key: string,
    compute: () => T | Promise<T>,
    ttlMs: number = this.defaultTtlMs
  ): Promise<T> {
    if (!(ttlMs > 0)) {
      return Promise.reject(new RangeError(`ttlMs must be positive, got ${ttlMs}`));
    }

    // Fast path: a fresh Ready entry needs no coordination.
    const ready = this.readySlot(key);
    if (ready) {
      this.counters.hits++;
      this.touch(key, ready);
      this.logger.debug("Cache hit", { key });
      return Promise.resolve(this.unwrap<T>(ready.value));
    }

    // Miss path. Re-check the key now that it is ours to claim: another
    // caller may have started the computation since the fast path.
    const current = this.slots.get(key);
    if (current?.state === "pending") {
      this.counters.coalesced++;
      this.logger.debug("Joining in-flight computation", { key });
      return this.unwrap<Promise<T>>(current.promise);
    }

    this.counters.misses++;
    this.logger.debug("Cache miss", { key });
    return this.startComputation(key, compute, ttlMs);
  }

  /**
   * Read a Ready value without computing. Returns undefined for absent,
   * pending, or expired keys.
   */
  peek<T>(key: string): T | undefined {
    const ready = this.readySlot(key);
    return ready ? this.unwrap<T>(ready.value) : undefined;
  }

  state(key: string): CacheEntryState {
    const slot = this.slots.get(key);
    if (!slot) return "absent";
    if (slot.state === "ready") {
      return this.readySlot(key) ? "ready" : "absent";
    }
    return "pending";
  }

  /**
   * Drop a key. An in-flight computation still settles for its callers
   * but its result is not stored.
   */
  invalidate(key: string): boolean {
    return this.slots.delete(key);
  }

  clear(): void {
    this.slots.clear();
  }

  get size(): number {
    return this.slots.size;
  }

  stats(): CacheStats {
    let pendingKeys = 0;
    for (const slot of this.slots.values()) {
      if (slot.state === "pending") pendingKeys++;
    }
    return { ...this.counters, size: this.slots.size, pendingKeys };
  }

  // ============================================================
  // Internals
  // ============================================================

  private startComputation<T>(
    key: string,
    compute: () => T | Promise<T>,
    ttlMs: number
  ): Promise<T> {
    const ticket = {};
    this.counters.computations++;

    // The slot is installed before `compute` runs (it starts on the next
    // microtask), so a synchronous throw or a re-entrant call for the
    // same key still finds the Pending entry.
    const promise = Promise.resolve()
      .then(compute)
      .then(
        (value) => {
          if (this.owns(key, ticket)) {
            this.slots.set(key, {
              state: "ready",
              value,
              expiresAt: this.now() + ttlMs,
            });
            this.enforceBound();
          }
          return value;
        },
        (cause: unknown) => {
          this.counters.failures++;
          if (this.owns(key, ticket)) {
            this.slots.delete(key);
          }
          this.logger.warn("Cache computation failed", {
            key,
            error: cause instanceof Error ? cause.message : String(cause),
          });
          throw cause instanceof ComputationFailedError
            ? cause
            : new ComputationFailedError(key, cause);
        }
      );

    this.slots.set(key, { state: "pending", promise, ticket });
    return promise;
  }

  private owns(key: string, ticket: object): boolean {
    const slot = this.slots.get(key);
    return slot?.state === "pending" && slot.ticket === ticket;
  }

  /** Ready slot for `key`, expiring it lazily. */
  private readySlot(key: string): ReadySlot | undefined {
    const slot = this.slots.get(key);
    if (slot?.state !== "ready") return undefined;

    if (this.now() >= slot.expiresAt) {
      this.slots.delete(key);
      this.counters.expirations++;
      this.logger.debug("Cache entry expired", { key });
      return undefined;
    }
    return slot;
  }

  /** Move a slot to the most-recently-used end of the map. */
  private touch(key: string, slot: ReadySlot): void {
    if (this.maxEntries === 0) return;
    this.slots.delete(key);
    this.slots.set(key, slot);
  }

  private enforceBound(): void {
    if (this.maxEntries === 0) return;

    let ready = 0;
    for (const slot of this.slots.values()) {
      if (slot.state === "ready") ready++;
    }

    for (const [key, slot] of this.slots) {
      if (ready <= this.maxEntries) break;
      if (slot.state !== "ready") continue;
      this.slots.delete(key);
      this.counters.evictions++;
      ready--;
      this.logger.debug("Cache entry evicted", { key });
    }
  }

  /**
   * Values are stored untyped; a key is only ever computed by one kind of
   * function, so the caller's type parameter describes what was stored.
   */
  private unwrap<T>(value: unknown): T {
    return value as T;
  }
}

// ---------------------------------------------------------------------------
// Memoized functions
// ---------------------------------------------------------------------------

export interface CachedOptions {
  cache?: CacheLayer;
  ttlMs?: number;
}

/**
 * Wrap an async function so that calls with structurally equal arguments
 * share one cached result, keyed by `fingerprint(name, ...args)`.
 *
 * @example
 *   const loadSynonyms = cached("synonyms", (term: string) => fetchSynonyms(term));
 *   await loadSynonyms("voorwaarde");
 */
export function cached<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => R | Promise<R>,
  options: CachedOptions = {}
): (...args: A) => Promise<R> {
  return (...args: A) => {
    const cache = options.cache ?? getSharedCache();
    return cache.getOrCompute(fingerprint(name, ...args), () => fn(...args), options.ttlMs);
  };
}

// ---------------------------------------------------------------------------
// Process-wide instance
// ---------------------------------------------------------------------------

let sharedCache: CacheLayer | null = null;

/**
 * The process-wide cache, created on first use from application config.
 */
export function getSharedCache(): CacheLayer {
  sharedCache ??= new CacheLayer({
    defaultTtlMs: config.cacheDefaultTtlMs,
    maxEntries: config.cacheMaxEntries,
  });
  return sharedCache;
}

/** Drop the process-wide cache; the next getSharedCache() starts empty. */
export function resetSharedCache(): void {
  sharedCache?.clear();
  sharedCache = null;
}
