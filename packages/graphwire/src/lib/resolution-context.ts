import { CyclicDependencyError } from "./dependency-error";
import type { Key } from "./key";

interface WaitRecord {
  readonly key: Key<unknown>;
  readonly owner: ResolutionContext;
}

/**
 * In-flight state of one resolution call: the ordered keys currently being
 * resolved. Never shared between concurrent calls.
 *
 * Factories resolving through the active resolver run in forks. A fork starts
 * with a copy of its parent's path, so it still detects cycles through its
 * ancestors while sibling forks never see each other's keys.
 */
export class ResolutionContext {
  private readonly inFlight: Key<unknown>[];
  private readonly forks = new Set<ResolutionContext>();
  private waiting: WaitRecord | undefined;

  private constructor(
    private readonly parent: ResolutionContext | undefined,
    path: readonly Key<unknown>[],
  ) {
    this.inFlight = [...path];
  }

  static root(): ResolutionContext {
    return new ResolutionContext(undefined, []);
  }

  get path(): readonly Key<unknown>[] {
    return [...this.inFlight];
  }

  has(key: Key<unknown>): boolean {
    return this.inFlight.includes(key);
  }

  /** Mark `key` in flight, failing if it already is. */
  enter(key: Key<unknown>): void {
    if (this.has(key)) {
      throw new CyclicDependencyError(this.cycleThrough(key), [
        ...this.inFlight,
        key,
      ]);
    }
    this.inFlight.push(key);
  }

  leave(key: Key<unknown>): void {
    const index = this.inFlight.lastIndexOf(key);
    if (index !== -1) {
      this.inFlight.splice(index, 1);
    }
  }

  /** `[key, ..., key]`: the in-flight keys from `key` onwards, closed by `key`. */
  cycleThrough(key: Key<unknown>): Key<unknown>[] {
    return [...this.segmentFrom(key), key];
  }

  fork(): ResolutionContext {
    const child = new ResolutionContext(this, this.inFlight);
    this.forks.add(child);
    return child;
  }

  release(): void {
    this.parent?.forks.delete(this);
  }

  /**
   * Await a value another context is computing for `key`.
   *
   * Fails with a cyclic-dependency error instead of waiting when the owner is,
   * directly or through further waits, itself waiting on this context or one
   * of its ancestors.
   */
  async waitFor<T>(
    key: Key<unknown>,
    owner: ResolutionContext,
    pending: Promise<T>,
  ): Promise<T> {
    const segments = this.findWaitCycle(owner, key);
    if (segments) {
      throw new CyclicDependencyError(joinSegments(segments), this.path);
    }
    this.waiting = { key, owner };
    try {
      return await pending;
    } finally {
      this.waiting = undefined;
    }
  }

  /** This context plus every live fork below it. */
  activeBranches(): ResolutionContext[] {
    const branches: ResolutionContext[] = [this];
    for (const fork of this.forks) {
      branches.push(...fork.activeBranches());
    }
    return branches;
  }

  private segmentFrom(key: Key<unknown>): Key<unknown>[] {
    const index = this.inFlight.indexOf(key);
    return this.inFlight.slice(Math.max(index, 0));
  }

  private isSelfOrAncestor(context: ResolutionContext): boolean {
    for (
      let current: ResolutionContext | undefined = this;
      current;
      current = current.parent
    ) {
      if (current === context) {
        return true;
      }
    }
    return false;
  }

  private findWaitCycle(
    owner: ResolutionContext,
    heldKey: Key<unknown>,
  ): Key<unknown>[][] | undefined {
    const visited = new Set<ResolutionContext>();

    const search = (
      holder: ResolutionContext,
      held: Key<unknown>,
      segments: Key<unknown>[][],
    ): Key<unknown>[][] | undefined => {
      if (visited.has(holder)) {
        return undefined;
      }
      visited.add(holder);
      for (const branch of holder.activeBranches()) {
        const wait = branch.waiting;
        if (!wait) {
          continue;
        }
        const trail = [...segments, branch.segmentFrom(held)];
        if (this.isSelfOrAncestor(wait.owner)) {
          return [...trail, this.segmentFrom(wait.key)];
        }
        const found = search(wait.owner, wait.key, trail);
        if (found) {
          return found;
        }
      }
      return undefined;
    };

    return search(owner, heldKey, []);
  }
}

function joinSegments(segments: Key<unknown>[][]): Key<unknown>[] {
  const [first = [], ...rest] = segments;
  const cycle = [...first];
  for (const segment of rest) {
    cycle.push(...segment.slice(1));
  }
  return cycle;
}
