import type { Key } from "./key";
import type { ResolutionContext } from "./resolution-context";

interface PendingInstance {
  readonly promise: Promise<unknown>;
  readonly owner: ResolutionContext;
}

/**
 * Key -> instance cache with per-key single flight: concurrent requests for
 * one key share a single computation, requests for different keys never wait
 * on each other. A failed computation is not cached, and neither is one whose
 * key was deleted or cleared while it was still running.
 */
export class InstanceCache {
  private readonly instances = new Map<Key<unknown>, unknown>();
  private readonly pending = new Map<Key<unknown>, PendingInstance>();
  // Who started the computation of each key; see delete().
  private readonly holders = new Map<Key<unknown>, object>();

  get size(): number {
    return this.instances.size;
  }

  has(key: Key<unknown>): boolean {
    return this.instances.has(key);
  }

  getOrCreate(
    key: Key<unknown>,
    context: ResolutionContext,
    compute: () => Promise<unknown>,
    holder?: object,
  ): Promise<unknown> {
    if (this.instances.has(key)) {
      return Promise.resolve(this.instances.get(key));
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return context.waitFor(key, inFlight.owner, inFlight.promise);
    }

    const creation: Promise<unknown> = compute().then((instance) => {
      if (this.pending.get(key)?.promise === creation) {
        this.instances.set(key, instance);
      }
      return instance;
    });
    const release = (): void => {
      if (this.pending.get(key)?.promise === creation) {
        this.pending.delete(key);
      }
    };
    void creation.then(release, release);

    this.pending.set(key, { promise: creation, owner: context });
    if (holder) {
      this.holders.set(key, holder);
    } else {
      this.holders.delete(key);
    }
    return creation;
  }

  /** Seed the cache with a ready instance. */
  set(key: Key<unknown>, instance: unknown): void {
    this.pending.delete(key);
    this.holders.delete(key);
    this.instances.set(key, instance);
  }

  /**
   * Drop `key`, cached or in flight. Callers already waiting keep their
   * result. With `holder`, the entry is only dropped when that holder started
   * its computation.
   */
  delete(key: Key<unknown>, holder?: object): void {
    if (holder !== undefined && this.holders.get(key) !== holder) {
      return;
    }
    this.instances.delete(key);
    this.pending.delete(key);
    this.holders.delete(key);
  }

  clear(): void {
    this.instances.clear();
    this.pending.clear();
    this.holders.clear();
  }
}

const globalCache = new InstanceCache();

/** The process-wide cache behind `ServiceScope.GLOBAL_SINGLETON`. */
export function globalSingletons(): InstanceCache {
  return globalCache;
}

/**
 * Drop every process-wide singleton. Intended for test isolation.
 *
 * Rebinding a global singleton key only drops the shared instance when the
 * rebinding container built it; instances built by other containers stay
 * until this is called.
 */
export function resetGlobalSingletons(): void {
  globalCache.clear();
}
