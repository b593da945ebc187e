import { isKeyLike, toKey } from "./key";
import type { Key, KeyLike } from "./key";
import type { AbstractNewable, Token } from "./types";

const OPTIONAL_DEPENDENCY = Symbol("graphwire.optional");
const PROVIDER_DEPENDENCY = Symbol("graphwire.provider");

/** Resolves to `undefined` instead of failing when its key has no binding. */
export interface OptionalDependency<T> {
  readonly [OPTIONAL_DEPENDENCY]: true;
  readonly target: KeyLike<T>;
}

/** Injects a deferred getter; each call starts a fresh resolution. */
export interface ProviderDependency<T> {
  readonly [PROVIDER_DEPENDENCY]: true;
  readonly target: KeyLike<T>;
}

/**
 * A single dependency item can be:
 * - A contract (class or token) or a qualified {@link Key}.
 * - An {@link optional} wrapper around one of those.
 * - A {@link providerOf} wrapper requesting a deferred getter.
 */
export type Dependency<T = unknown> =
  | KeyLike<T>
  | OptionalDependency<T>
  | ProviderDependency<T>;

/** Readonly list of dependency items describing a constructor's injection points. */
export type DependencyList = readonly Dependency[];

/**
 * Dependencies can be provided directly or via a thunk to support ordering / circular cases.
 */
export type DependenciesOption = DependencyList | (() => DependencyList);

export function optional<T>(target: KeyLike<T>): OptionalDependency<T> {
  return { [OPTIONAL_DEPENDENCY]: true, target };
}

export function providerOf<T>(target: KeyLike<T>): ProviderDependency<T> {
  return { [PROVIDER_DEPENDENCY]: true, target };
}

/**
 * Resolve a declared dependency to the value the constructor receives.
 *
 * - `optional(X)` resolves to `X | undefined`.
 * - `providerOf(X)` resolves to `() => Promise<X>`.
 * - A `Key<T>`, `Token<T>` or class resolves to `T`.
 */
export type ResolveDep<D> =
  D extends OptionalDependency<infer O>
    ? O | undefined
    : D extends ProviderDependency<infer P>
      ? () => Promise<P>
      : D extends Key<infer K>
        ? K
        : D extends Token<infer V>
          ? V
          : D extends AbstractNewable<infer I>
            ? I
            : never;

/**
 * Tuple-map a declared dependencies list to the constructor parameter types.
 *
 * Example:
 * - `[Logger, Metrics]`           -> `[Logger, Metrics]` (instances)
 * - `[optional(Cache)]`           -> `[Cache | undefined]`
 */
export type DepInstances<TDeps extends readonly unknown[]> = {
  [K in keyof TDeps]: ResolveDep<TDeps[K]>;
};

export type DependencyClassification =
  | { kind: "required"; key: Key<unknown> }
  | { kind: "optional"; key: Key<unknown> }
  | { kind: "provider"; key: Key<unknown> };

function hasMarker(value: unknown, marker: symbol): value is { target: unknown } {
  return (
    typeof value === "object" &&
    value !== null &&
    marker in value &&
    "target" in value
  );
}

export function classifyDependency(
  value: unknown,
): DependencyClassification | null {
  if (hasMarker(value, OPTIONAL_DEPENDENCY)) {
    return isKeyLike(value.target)
      ? { kind: "optional", key: toKey(value.target) }
      : null;
  }
  if (hasMarker(value, PROVIDER_DEPENDENCY)) {
    return isKeyLike(value.target)
      ? { kind: "provider", key: toKey(value.target) }
      : null;
  }
  if (isKeyLike(value)) {
    return { kind: "required", key: toKey(value) };
  }
  return null;
}

/**
 * Normalizes dependencies option into a consistent thunk form.
 */
export function normalizeDependencies(
  option?: DependenciesOption,
): () => DependencyList {
  if (!option) {
    return () => [];
  }
  if (typeof option === "function") {
    return option;
  }
  return () => option;
}
