import { normalizeDependencies } from "./dependencies";
import type {
  DependenciesOption,
  DependencyList,
  DepInstances,
} from "./dependencies";
import type { KeyLike } from "./key";
import { isLazy, Lazy, type Importer } from "./lazy";
import type { Newable } from "./types";

/**
 * The active resolver handed to factory providers. Resolutions made through it
 * take part in the caller's cycle detection.
 */
export interface Resolver {
  get<T>(target: KeyLike<T>): Promise<T>;
  getOptional<T>(target: KeyLike<T>): Promise<T | undefined>;
  getProvider<T>(target: KeyLike<T>): () => Promise<T>;
}

/** Ordered dependency list plus a build function receiving the resolved values. */
export interface ConstructorProvider<T> {
  readonly kind: "constructor";
  readonly dependencies: () => DependencyList;
  readonly build: (args: readonly unknown[]) => T | Promise<T>;
}

/**
 * `new useClass(...deps)`. When `dependencies` is absent the class's
 * decorator metadata supplies them.
 */
export interface ClassProvider<T> {
  readonly kind: "class";
  readonly useClass: Newable<T>;
  readonly dependencies?: () => DependencyList;
}

export interface FactoryProvider<T> {
  readonly kind: "factory";
  readonly useFactory: (resolver: Resolver) => T | Promise<T>;
}

/** Pre-built instance. Scope is irrelevant: the same object is always returned. */
export interface InstanceProvider<T> {
  readonly kind: "instance";
  readonly instance: T;
}

/** A class loaded through an async importer the first time it is needed. */
export interface LazyClassProvider<T> {
  readonly kind: "lazy-class";
  readonly lazy: Lazy<T>;
  readonly dependencies: () => DependencyList;
}

export type Provider<T = unknown> =
  | ConstructorProvider<T>
  | ClassProvider<T>
  | FactoryProvider<T>
  | InstanceProvider<T>
  | LazyClassProvider<T>;

export function constructorProvider<
  const TDeps extends DependencyList,
  T,
>(
  dependencies: TDeps | (() => TDeps),
  build: (...args: DepInstances<TDeps>) => T | Promise<T>,
): ConstructorProvider<T> {
  return {
    kind: "constructor",
    dependencies: normalizeDependencies(dependencies),
    // The resolver produces one value per declared dependency, in order.
    build: (args) => build(...(args as DepInstances<TDeps>)),
  };
}

export function classProvider<T>(useClass: Newable<T>): ClassProvider<T>;
export function classProvider<const TDeps extends DependencyList, T>(
  useClass: new (...args: DepInstances<TDeps>) => T,
  dependencies: TDeps | (() => TDeps),
): ClassProvider<T>;
export function classProvider<T>(
  useClass: Newable<T>,
  dependencies?: DependenciesOption,
): ClassProvider<T> {
  return {
    kind: "class",
    useClass,
    dependencies: dependencies ? normalizeDependencies(dependencies) : undefined,
  };
}

export function factoryProvider<T>(
  useFactory: (resolver: Resolver) => T | Promise<T>,
): FactoryProvider<T> {
  return { kind: "factory", useFactory };
}

export function instanceProvider<T>(instance: T): InstanceProvider<T> {
  return { kind: "instance", instance };
}

/** Accepts a `Lazy(...)` wrapper, or a bare importer loaded without retries. */
export function lazyClassProvider<T>(
  source: Lazy<T> | Importer<T>,
  dependencies?: DependenciesOption,
): LazyClassProvider<T> {
  return {
    kind: "lazy-class",
    lazy: isLazy(source) ? source : Lazy(source),
    dependencies: normalizeDependencies(dependencies),
  };
}
