/**
 * Provider definitions
 * --------------------
 * A data form of container configuration: blocks of descriptors built with
 * `asValue`, `asClass`, `asFactory`, `asLazyClass` and `asMulti`, aggregated
 * with `defineProviders` and applied in bulk with `applyProviders`. Libraries
 * can ship such blocks without depending on a container instance.
 *
 * Every descriptor names the key it binds. Classes default to their own
 * unqualified key; `provide` binds them to a contract instead.
 *
 * Before anything is bound, `applyProviders` checks the class and lazy class
 * descriptors declared with array dependencies for cycles among themselves,
 * so a statically visible loop fails at configuration time. Thunk
 * dependencies are not evaluated here; the resolver still catches their cycles.
 */
import type { Container } from "./container";
import { classifyDependency } from "./dependencies";
import type { DependenciesOption } from "./dependencies";
import { InvalidBindingError } from "./dependency-error";
import { keyFor, type Key, type KeyLike, type Qualifier } from "./key";
import { Lazy, type Importer, type RetryOptions } from "./lazy";
import {
  classProvider,
  factoryProvider,
  instanceProvider,
  lazyClassProvider,
  type Provider,
  type Resolver,
} from "./provider";
import { ServiceScope } from "./scope";
import { isConstructor } from "./types";
import type { Newable } from "./types";

/**
 * Explicit lifecycle choices for providers. Mirrors decorator scopes but externalized.
 */
export type ProviderLifecycle = ServiceScope;

/** Descriptor for a pre-built value bound to a key. */
export interface ValueProviderDescriptor<T = unknown> {
  kind: "value";
  key: Key<T>;
  value: T;
}

/** Descriptor for a concrete class provider with lifecycle and optional dependencies. */
export interface ServiceProviderDescriptor<T = unknown> {
  kind: "service";
  key: Key<T>;
  useClass: Newable<T>;
  lifecycle: ProviderLifecycle;
  deps?: DependenciesOption;
}

export interface FactoryProviderDescriptor<T = unknown> {
  kind: "factory";
  key: Key<T>;
  useFactory: (resolver: Resolver) => T | Promise<T>;
  lifecycle: ProviderLifecycle;
}

/** Descriptor for a class imported on first resolution. */
export interface LazyServiceProviderDescriptor<T = unknown> {
  kind: "lazy-service";
  key: Key<T>;
  lazy: Lazy<T>;
  lifecycle: ProviderLifecycle;
  deps?: DependenciesOption;
}

/** One element appended to a multi-bound collection. */
export interface MultiProviderDescriptor<T = unknown> {
  kind: "multi";
  key: Key<T[]>;
  provider: Provider<T>;
  asSet: boolean;
}

/** Aggregate provider definitions for batch application. */
export interface ProviderDefinitions {
  values?: ValueProviderDescriptor[];
  services?: ServiceProviderDescriptor[];
  factories?: FactoryProviderDescriptor[];
  lazyServices?: LazyServiceProviderDescriptor[];
  multi?: MultiProviderDescriptor[];
}

/**
 * Identity helper for provider definition blocks.
 * Enables better type inference in user code without changing runtime behavior.
 */
export function defineProviders(
  defs: ProviderDefinitions,
): ProviderDefinitions {
  return defs;
}

/** Bind a key (a token, usually) to a concrete value. */
export function asValue<T>(
  target: KeyLike<T>,
  value: T,
  options: { qualifier?: Qualifier } = {},
): ValueProviderDescriptor<T> {
  return { kind: "value", key: keyFor(target, options.qualifier), value };
}

/**
 * Create a class (service) provider with explicit lifecycle and optional dependencies.
 *
 * @example
 * ```ts
 * asClass(SmtpMailer, { provide: Mailer, lifecycle: lifecycle.singleton(), deps: [MailConfig] })
 * ```
 */
export function asClass<T>(
  useClass: Newable<T>,
  options: {
    lifecycle: ProviderLifecycle;
    deps?: DependenciesOption;
    provide?: KeyLike<T>;
    qualifier?: Qualifier;
  },
): ServiceProviderDescriptor<T> {
  return {
    kind: "service",
    key: keyFor(options.provide ?? useClass, options.qualifier),
    useClass,
    lifecycle: options.lifecycle,
    deps: options.deps,
  };
}

export function asFactory<T>(
  target: KeyLike<T>,
  useFactory: (resolver: Resolver) => T | Promise<T>,
  options: { lifecycle?: ProviderLifecycle; qualifier?: Qualifier } = {},
): FactoryProviderDescriptor<T> {
  return {
    kind: "factory",
    key: keyFor(target, options.qualifier),
    useFactory,
    lifecycle: options.lifecycle ?? ServiceScope.TRANSIENT,
  };
}

/**
 * Define a lazily imported class provider bound at `target`.
 *
 * The importer runs the first time the key is resolved (and again for
 * transient bindings, where module caching makes it cheap). Dependencies are
 * declared here because the class is not available before the import.
 *
 * @example
 * ```ts
 * asLazyClass(Mailer, () => import("./smtp-mailer").then((m) => m.SmtpMailer), {
 *   lifecycle: lifecycle.singleton(),
 *   deps: [MailConfig],
 *   retry: { retries: 2, backoffMs: 50 },
 * })
 * ```
 */
export function asLazyClass<T>(
  target: KeyLike<T>,
  importer: Importer<T>,
  options: {
    lifecycle: ProviderLifecycle;
    deps?: DependenciesOption;
    qualifier?: Qualifier;
    retry?: RetryOptions;
  },
): LazyServiceProviderDescriptor<T> {
  return {
    kind: "lazy-service",
    key: keyFor(target, options.qualifier),
    lazy: Lazy(importer, options.retry),
    lifecycle: options.lifecycle,
    deps: options.deps,
  };
}

/**
 * Append a class or provider to the collection bound at `target`. Pass
 * `asSet: true` for a set binding, where a repeated class is added once.
 */
export function asMulti<T>(
  target: KeyLike<T[]>,
  element: Newable<T> | Provider<T>,
  options: { asSet?: boolean } = {},
): MultiProviderDescriptor<T> {
  return {
    kind: "multi",
    key: keyFor(target),
    provider: isConstructor(element) ? classProvider(element) : element,
    asSet: options.asSet ?? false,
  };
}

/**
 * Convenience lifecycle helpers for fluent provider creation.
 */
export const lifecycle = {
  singleton(): ProviderLifecycle {
    return ServiceScope.SINGLETON;
  },
  globalSingleton(): ProviderLifecycle {
    return ServiceScope.GLOBAL_SINGLETON;
  },
  transient(): ProviderLifecycle {
    return ServiceScope.TRANSIENT;
  },
} as const;

type ProviderPlanEntry = {
  key: Key<unknown>;
  deps?: DependenciesOption;
};

/** @throws {InvalidBindingError} on the first cycle found among `entries`. */
export function detectProviderCycles(entries: ProviderPlanEntry[]): void {
  const providerMap = new Map<Key<unknown>, DependenciesOption | undefined>();
  for (const entry of entries) {
    providerMap.set(entry.key, entry.deps);
  }
  if (providerMap.size <= 1) {
    return;
  }

  const adjacency = new Map<Key<unknown>, Key<unknown>[]>();
  for (const [key, depsOption] of providerMap.entries()) {
    // Thunks stay unevaluated: they exist to defer module-order issues.
    if (typeof depsOption === "function") {
      adjacency.set(key, []);
      continue;
    }

    const neighbors: Key<unknown>[] = [];
    for (const dep of depsOption ?? []) {
      const classified = classifyDependency(dep);
      // Provider getters resolve later and cannot close a construction cycle.
      if (
        classified &&
        classified.kind !== "provider" &&
        providerMap.has(classified.key)
      ) {
        neighbors.push(classified.key);
      }
    }
    adjacency.set(key, neighbors);
  }

  const visiting = new Set<Key<unknown>>();
  const visited = new Set<Key<unknown>>();
  const path: Key<unknown>[] = [];

  const dfs = (node: Key<unknown>): void => {
    if (visiting.has(node)) {
      const cycleStart = path.indexOf(node);
      const cyclePath = [...path.slice(cycleStart), node]
        .map((key) => key.toString())
        .join(" -> ");
      throw new InvalidBindingError(
        `Circular provider dependency detected: ${cyclePath}`,
      );
    }
    if (visited.has(node)) {
      return;
    }

    visiting.add(node);
    path.push(node);
    for (const dep of adjacency.get(node) ?? []) {
      dfs(dep);
    }
    path.pop();
    visiting.delete(node);
    visited.add(node);
  };

  for (const node of providerMap.keys()) {
    dfs(node);
  }
}

/**
 * Apply one or more provider definition blocks to a container.
 *
 * Blocks apply in order; within a block values bind first, then services,
 * factories, lazy services and finally multi elements. Later single bindings
 * for the same key win, as with direct `bind` calls.
 */
export function applyProviders(
  container: Container,
  definitions: ProviderDefinitions | ProviderDefinitions[],
): void {
  const list = Array.isArray(definitions) ? definitions : [definitions];

  const planEntries: ProviderPlanEntry[] = [];
  for (const definition of list) {
    for (const service of definition.services ?? []) {
      planEntries.push({ key: service.key, deps: service.deps });
    }
    for (const lazyService of definition.lazyServices ?? []) {
      planEntries.push({ key: lazyService.key, deps: lazyService.deps });
    }
  }
  detectProviderCycles(planEntries);

  for (const definition of list) {
    for (const valueProvider of definition.values ?? []) {
      container.bind(valueProvider.key, instanceProvider(valueProvider.value));
    }

    for (const service of definition.services ?? []) {
      container.bind(
        service.key,
        service.deps
          ? classProvider(service.useClass, service.deps)
          : classProvider(service.useClass),
        service.lifecycle,
      );
    }

    for (const factory of definition.factories ?? []) {
      container.bind(
        factory.key,
        factoryProvider(factory.useFactory),
        factory.lifecycle,
      );
    }

    for (const lazyService of definition.lazyServices ?? []) {
      container.bind(
        lazyService.key,
        lazyClassProvider(lazyService.lazy, lazyService.deps),
        lazyService.lifecycle,
      );
    }

    for (const element of definition.multi ?? []) {
      container.bindMulti(element.key, element.provider, {
        asSet: element.asSet,
      });
    }
  }
}
