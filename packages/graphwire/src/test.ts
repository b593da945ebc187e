export { createToken } from "./lib/types"; // convenience re-export for tests
export type { MockOf, MethodKeys, Spy } from "./lib/testing/mocking";
export { mockContract } from "./lib/testing/mocking";
export {
  snapshotRegistry,
  restoreRegistry,
  getRawDependencies,
} from "./lib/testing/registry";
export { resetGlobalSingletons } from "./lib/instance-cache";

import { Container } from "./lib/container";
import { resetGlobalSingletons } from "./lib/instance-cache";
import { toKey, type Key, type KeyLike } from "./lib/key";
import type { ContainerOptions } from "./lib/options";
import { applyProviders, type ProviderDefinitions } from "./lib/providers";
import {
  applyAutoMocks,
  type ContractMock,
  type MethodKeys,
  type MockOf,
  type Spy,
} from "./lib/testing/mocking";
import { restoreRegistry, snapshotRegistry } from "./lib/testing/registry";

export interface OverrideSpec {
  /** `[target, instance]` pairs bound over whatever the target resolves to. */
  instances?: Array<[KeyLike<unknown>, unknown]>;
}

export interface CreateTestContainerOptions {
  /** Options for the underlying container. Defaults to a silent logger. */
  options?: ContainerOptions;
  providers?: ProviderDefinitions | ProviderDefinitions[];
  /** Direct configuration applied after `providers`, before overrides. */
  configure?: (container: Container) => void;
  overrides?: OverrideSpec;
  autoMock?: boolean;
  target?: KeyLike<unknown>; // focal service for auto-mocking its dependency graph
}

export interface TestContainerHandle {
  container: Container;
  get<T>(target: KeyLike<T>): Promise<T>;
  getOptional<T>(target: KeyLike<T>): Promise<T | undefined>;
  /** Replace a binding with a ready instance. */
  override<T>(target: KeyLike<T>, instance: T): void;
  /** Retrieve a single contract mock (if autoMock enabled). */
  getMock<T>(target: KeyLike<T>): MockOf<T> | undefined;
  /** Retrieve multiple contract mocks preserving tuple order. */
  getMocks<T extends readonly KeyLike<unknown>[]>(
    targets: T,
  ): {
    [K in keyof T]: T[K] extends KeyLike<infer I>
      ? MockOf<I> | undefined
      : never;
  };
  /** Convenience: get a specific method spy from a mock. */
  spyOf<T>(
    target: KeyLike<T>,
    method: Extract<MethodKeys<T>, string>,
  ): Spy | undefined;
  /** Convenience: reset all mock spies (calls `mockReset()` on each). */
  clearMockSpies(): void;
  /** Undo decorator registry changes and drop process-wide singletons. */
  restore(): void;
}

/**
 * Create a test-focused container.
 *
 * Order of application: `providers`, `configure`, `overrides`, then auto-mocks
 * for the dependency graph of `target` (keys overridden by hand are kept).
 */
export function createTestContainer(
  opts: CreateTestContainerOptions = {},
): TestContainerHandle {
  // Take a snapshot of the registry before applying providers/overrides/mocks
  const snapshot = snapshotRegistry();
  const container = new Container(opts.options ?? { logLevel: "silent" });

  if (opts.providers) {
    applyProviders(container, opts.providers);
  }
  opts.configure?.(container);

  const overriddenKeys = new Set<Key<unknown>>();
  for (const [target, instance] of opts.overrides?.instances ?? []) {
    container.overrideInstance(target, instance);
    overriddenKeys.add(toKey(target));
  }

  let mocks = new Map<Key<unknown>, ContractMock<unknown>>();
  if (opts.autoMock && opts.target) {
    mocks = applyAutoMocks({
      target: opts.target,
      container,
      overriddenKeys,
    }).mocks;
  }

  const getMock = <T>(target: KeyLike<T>): MockOf<T> | undefined => {
    // Mocks are created from the key's own contract, so the stored mock is a MockOf<T>.
    return mocks.get(toKey(target))?.mock as MockOf<T> | undefined;
  };

  return {
    container,
    get: <T>(target: KeyLike<T>) => container.get(target),
    getOptional: <T>(target: KeyLike<T>) => container.getOptional(target),
    override: <T>(target: KeyLike<T>, instance: T) =>
      container.overrideInstance(target, instance),
    getMock,
    getMocks: <T extends readonly KeyLike<unknown>[]>(targets: T) => {
      return targets.map((target) => getMock(target)) as {
        [K in keyof T]: T[K] extends KeyLike<infer I>
          ? MockOf<I> | undefined
          : never;
      };
    },
    spyOf: <T>(target: KeyLike<T>, method: Extract<MethodKeys<T>, string>) =>
      getMock(target)?.spies[method],
    clearMockSpies: () => {
      for (const contractMock of mocks.values()) {
        for (const spy of Object.values(contractMock.spies)) {
          spy.mockReset();
        }
      }
    },
    restore: () => {
      restoreRegistry(snapshot);
      resetGlobalSingletons();
    },
  };
}
