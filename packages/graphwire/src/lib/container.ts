import {
  BindingRegistry,
  type Binding,
  type BindOptions,
  type MultiBindOptions,
  type MultiBinding,
  type SingleBinding,
} from "./binding-registry";
import { dependenciesRegistry } from "./decorators";
import {
  classifyDependency,
  type DependenciesOption,
  type Dependency,
  type DependencyClassification,
  type DependencyList,
} from "./dependencies";
import {
  ConstructionError,
  DependencyResolutionError,
  InvalidBindingError,
  UnboundDependencyError,
} from "./dependency-error";
import { globalSingletons, InstanceCache } from "./instance-cache";
import { keyFor, toKey } from "./key";
import type { Contract, Key, KeyLike, Qualifier } from "./key";
import type { Lazy } from "./lazy";
import type { Logger } from "./logger";
import { MembersInjector, type MemberInjection } from "./members";
import { resolveContainerOptions, type ContainerOptions } from "./options";
import {
  classProvider,
  factoryProvider,
  instanceProvider,
  type Provider,
  type Resolver,
} from "./provider";
import { ResolutionContext } from "./resolution-context";
import { ServiceScope } from "./scope";
import { isConstructor } from "./types";
import type { Newable } from "./types";

type ResolutionMode = "required" | "optional";

export interface RegisterOptions {
  qualifier?: Qualifier;
  /** Defaults to the decorator scope of the implementation, then transient. */
  scope?: ServiceScope;
  /** Defaults to the decorator dependencies of the implementation. */
  dependencies?: DependenciesOption;
}

export interface RegisterFactoryOptions {
  qualifier?: Qualifier;
  scope?: ServiceScope;
}

// Bindings for a Key<T> only accept a Provider<T>, so whatever is resolved for it is a T.
function resolvedAs<T>(value: unknown): T {
  return value as T;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function declaredDependencies(target: Newable<unknown>): () => DependencyList {
  return dependenciesRegistry.get(target)?.dependencies ?? (() => []);
}

/**
 * Resolves object graphs from a {@link BindingRegistry}.
 *
 * Every `get` call is one resolution: its in-flight keys drive cycle
 * detection and are never visible to concurrent calls. Container singletons
 * live in this container's cache, global singletons in the process-wide one;
 * both guarantee a single construction per key under concurrent requests.
 */
export class Container implements Resolver {
  public readonly registry: BindingRegistry;
  public readonly name: string | undefined;
  private readonly singletons = new InstanceCache();
  private readonly logger: Logger;
  private readonly implicitBindingsEnabled: boolean;
  private readonly implicitBindings = new Map<Key<unknown>, SingleBinding>();
  private readonly membersInjector: MembersInjector;

  constructor(options?: ContainerOptions) {
    const resolved = resolveContainerOptions(options);
    this.name = resolved.name;
    this.logger = resolved.logger;
    this.implicitBindingsEnabled = resolved.implicitBindings;
    this.registry = new BindingRegistry(this.logger);
    this.membersInjector = new MembersInjector((dependency) =>
      this.resolveMember(dependency),
    );
  }

  /**
   * Bind `target` to `provider`. Re-binding a key replaces the previous
   * binding (with a warning unless `options.override` is set) and discards
   * the container singleton built from it.
   */
  public bind<T>(
    target: KeyLike<T>,
    provider: Provider<T>,
    scope: ServiceScope = ServiceScope.TRANSIENT,
    options?: BindOptions,
  ): void {
    const key = toKey(target);
    this.registry.bind(key, provider, scope, options);
    this.forget(key);
  }

  /**
   * Add one element provider to the collection bound at `target`.
   *
   * @example
   * ```ts
   * const Plugins = createToken<Plugin[]>("plugins");
   * container.bindMulti(Plugins, classProvider(AuditPlugin));
   * const plugins = await container.get(Plugins); // [AuditPlugin instance]
   * ```
   *
   * With `{ asSet: true }` the collection skips providers already present.
   */
  public bindMulti<T>(
    target: KeyLike<T[]>,
    provider: Provider<T>,
    options?: MultiBindOptions,
  ): void {
    this.registry.bindMulti(toKey(target), provider, options);
  }

  /** The binding `target` resolves through, including implicit self-bindings. */
  public lookup(target: KeyLike<unknown>): Binding | undefined {
    return this.bindingFor(toKey(target));
  }

  /** Merge the bindings of another container or registry into this one. */
  public install(source: Container | BindingRegistry): void {
    const registry = source instanceof Container ? source.registry : source;
    this.registry.install(registry);
    for (const key of registry.keys()) {
      this.forget(key);
    }
  }

  /**
   * Bind `contract` (optionally qualified) to a class. Scope and dependencies
   * default to the implementation's decorator metadata.
   */
  public register<T>(
    contract: Contract<T>,
    implementation: Newable<T>,
    options: RegisterOptions = {},
  ): void {
    const key = keyFor(contract, options.qualifier);
    const provider = options.dependencies
      ? classProvider(implementation, options.dependencies)
      : classProvider(implementation);
    const scope =
      options.scope ??
      dependenciesRegistry.get(implementation)?.scope ??
      ServiceScope.TRANSIENT;
    this.bind(key, provider, scope);
  }

  public registerFactory<T>(
    target: KeyLike<T>,
    factory: (resolver: Resolver) => T | Promise<T>,
    options: RegisterFactoryOptions = {},
  ): void {
    this.bind(
      keyFor(target, options.qualifier),
      factoryProvider(factory),
      options.scope ?? ServiceScope.TRANSIENT,
    );
  }

  public registerInstance<T>(
    target: KeyLike<T>,
    instance: T,
    options: { qualifier?: Qualifier } = {},
  ): void {
    this.bind(keyFor(target, options.qualifier), instanceProvider(instance));
  }

  /**
   * Replace whatever `target` is bound to with a ready instance. Used by test
   * utilities to inject mocks and stubs: no warning and no contract check.
   */
  public overrideInstance<T>(target: KeyLike<T>, instance: T): void {
    this.bind(target, instanceProvider(instance), ServiceScope.TRANSIENT, {
      override: true,
      unchecked: true,
    });
  }

  /**
   * Resolve (and construct) the requested service.
   *
   * @throws {UnboundDependencyError} when `target` or one of its dependencies has no binding.
   * @throws {CyclicDependencyError} when the graph loops back on a key in flight.
   * @throws {ConstructionError} when a constructor, build function or factory throws.
   */
  public async get<T>(target: KeyLike<T>): Promise<T> {
    return resolvedAs<T>(
      await this.resolveKey(
        toKey(target),
        ResolutionContext.root(),
        "required",
      ),
    );
  }

  /** Like {@link get}, but an unbound `target` yields `undefined`. */
  public async getOptional<T>(target: KeyLike<T>): Promise<T | undefined> {
    return resolvedAs<T | undefined>(
      await this.resolveKey(
        toKey(target),
        ResolutionContext.root(),
        "optional",
      ),
    );
  }

  /** A getter that starts a fresh resolution of `target` on each call. */
  public getProvider<T>(target: KeyLike<T>): () => Promise<T> {
    return () => this.get(target);
  }

  /**
   * Fill member slots of an existing instance: the given list, or the
   * `@Inject` slots of its class chain. Slots are processed in order, each as
   * its own resolution; the first failure aborts and earlier assignments stay.
   */
  public async injectMembers<T extends object>(
    instance: T,
    members?: readonly MemberInjection[],
  ): Promise<T> {
    return this.membersInjector.inject(instance, members);
  }

  /**
   * The dependencies the binding for `target` declares, classified. Factories
   * and instances declare none.
   */
  public dependenciesOf(
    target: KeyLike<unknown>,
  ): DependencyClassification[] {
    const binding = this.lookup(target);
    if (!binding) {
      return [];
    }
    const providers =
      binding.kind === "single" ? [binding.provider] : binding.providers;
    return providers
      .flatMap((provider) => this.declaredList(provider))
      .flatMap((dependency) => {
        const classified = classifyDependency(dependency);
        return classified ? [classified] : [];
      });
  }

  private forget(key: Key<unknown>): void {
    this.singletons.delete(key);
    globalSingletons().delete(key, this);
    this.implicitBindings.delete(key);
  }

  private bindingFor(key: Key<unknown>): Binding | undefined {
    return this.registry.lookup(key) ?? this.implicitBindingFor(key);
  }

  /** Decorated classes requested unqualified bind to themselves. */
  private implicitBindingFor(key: Key<unknown>): SingleBinding | undefined {
    if (
      !this.implicitBindingsEnabled ||
      key.qualifier !== undefined ||
      !isConstructor(key.contract)
    ) {
      return undefined;
    }
    const cached = this.implicitBindings.get(key);
    if (cached) {
      return cached;
    }
    const metadata = dependenciesRegistry.get(key.contract);
    if (!metadata) {
      return undefined;
    }
    const binding: SingleBinding = {
      kind: "single",
      key,
      provider: classProvider(key.contract),
      scope: metadata.scope ?? ServiceScope.TRANSIENT,
    };
    this.implicitBindings.set(key, binding);
    this.logger.debug(
      `Implicitly bound ${key.toString()} to itself (${binding.scope}).`,
    );
    return binding;
  }

  private async resolveKey(
    key: Key<unknown>,
    context: ResolutionContext,
    mode: ResolutionMode,
  ): Promise<unknown> {
    context.enter(key);
    try {
      const binding = this.bindingFor(key);
      if (!binding) {
        if (mode === "optional") {
          return undefined;
        }
        throw new UnboundDependencyError(key, context.path);
      }
      if (binding.kind === "multi") {
        return await this.resolveMulti(binding, context);
      }
      return await this.resolveSingle(binding, context);
    } finally {
      context.leave(key);
    }
  }

  private async resolveSingle(
    binding: SingleBinding,
    context: ResolutionContext,
  ): Promise<unknown> {
    const { key, provider, scope } = binding;
    if (provider.kind === "instance") {
      return provider.instance;
    }
    const create = async () => {
      const instance = await this.instantiate(key, provider, context);
      this.logger.debug(`Created ${scope} ${key.toString()}.`);
      return instance;
    };
    switch (scope) {
      case ServiceScope.TRANSIENT:
        return this.instantiate(key, provider, context);
      case ServiceScope.SINGLETON:
        return this.singletons.getOrCreate(key, context, create);
      case ServiceScope.GLOBAL_SINGLETON:
        return globalSingletons().getOrCreate(key, context, create, this);
    }
  }

  /** Every element provider, in registration order. */
  private async resolveMulti(
    binding: MultiBinding,
    context: ResolutionContext,
  ): Promise<unknown[]> {
    const instances: unknown[] = [];
    for (const provider of binding.providers) {
      instances.push(await this.instantiate(binding.key, provider, context));
    }
    return instances;
  }

  private async instantiate(
    key: Key<unknown>,
    provider: Provider,
    context: ResolutionContext,
  ): Promise<unknown> {
    switch (provider.kind) {
      case "instance":
        return provider.instance;
      case "factory": {
        const resolver = this.createResolver(context);
        return this.invoke(key, context, () => provider.useFactory(resolver));
      }
      case "constructor": {
        const args = await this.resolveDependencies(provider, key, context);
        return this.invoke(key, context, () => provider.build(args));
      }
      case "class": {
        const args = await this.resolveDependencies(provider, key, context);
        const ctor = provider.useClass;
        return this.invoke(key, context, () => new ctor(...args));
      }
      case "lazy-class": {
        const ctor = await this.importWithRetry(provider.lazy, key, context);
        const args = await this.resolveDependencies(provider, key, context);
        return this.invoke(key, context, () => new ctor(...args));
      }
    }
  }

  /** Run user code, wrapping anything but resolution errors in a ConstructionError. */
  private async invoke(
    key: Key<unknown>,
    context: ResolutionContext,
    build: () => unknown,
  ): Promise<unknown> {
    try {
      return await build();
    } catch (error: unknown) {
      if (error instanceof DependencyResolutionError) {
        throw error;
      }
      throw new ConstructionError(key, context.path, error);
    }
  }

  private declaredList(provider: Provider): DependencyList {
    switch (provider.kind) {
      case "constructor":
      case "lazy-class":
        return provider.dependencies();
      case "class":
        return (
          provider.dependencies ?? declaredDependencies(provider.useClass)
        )();
      case "factory":
      case "instance":
        return [];
    }
  }

  /** Resolve declared dependencies one after another, in declaration order. */
  private async resolveDependencies(
    provider: Provider,
    owner: Key<unknown>,
    context: ResolutionContext,
  ): Promise<unknown[]> {
    let dependencies: DependencyList;
    try {
      dependencies = this.declaredList(provider);
    } catch (error: unknown) {
      throw new ConstructionError(
        owner,
        context.path,
        error,
        `Evaluating the dependency list failed: ${describeError(error)}`,
      );
    }

    const values: unknown[] = [];
    for (const [index, dependency] of dependencies.entries()) {
      values.push(
        await this.resolveDependency(dependency, index, owner, context),
      );
    }
    return values;
  }

  private async resolveDependency(
    dependency: unknown,
    index: number,
    owner: Key<unknown>,
    context: ResolutionContext,
  ): Promise<unknown> {
    const classified = classifyDependency(dependency);
    if (!classified) {
      const received = typeof dependency;
      throw new ConstructionError(
        owner,
        context.path,
        new TypeError(`Invalid dependency at position ${index}`),
        `Dependency at position ${index} is not a class, token, key, optional() or providerOf(). Received type: ${received}`,
      );
    }
    switch (classified.kind) {
      case "required":
        return this.resolveKey(classified.key, context, "required");
      case "optional":
        return this.resolveKey(classified.key, context, "optional");
      case "provider":
        return this.getProvider(classified.key);
    }
  }

  /** Member slots resolve as independent calls. */
  private async resolveMember(dependency: Dependency): Promise<unknown> {
    const classified = classifyDependency(dependency);
    if (!classified) {
      throw new InvalidBindingError(
        `Invalid member dependency: received ${typeof dependency}`,
      );
    }
    switch (classified.kind) {
      case "required":
        return this.get(classified.key);
      case "optional":
        return this.getOptional(classified.key);
      case "provider":
        return this.getProvider(classified.key);
    }
  }

  /**
   * The resolver handed to factories. Each call resolves in a fork of the
   * factory's context, so it sees the keys already in flight.
   */
  private createResolver(context: ResolutionContext): Resolver {
    return {
      get: async <T>(target: KeyLike<T>): Promise<T> =>
        resolvedAs<T>(
          await this.resolveInFork(context, toKey(target), "required"),
        ),
      getOptional: async <T>(target: KeyLike<T>): Promise<T | undefined> =>
        resolvedAs<T | undefined>(
          await this.resolveInFork(context, toKey(target), "optional"),
        ),
      getProvider: <T>(target: KeyLike<T>) => this.getProvider(target),
    };
  }

  private async resolveInFork(
    parent: ResolutionContext,
    key: Key<unknown>,
    mode: ResolutionMode,
  ): Promise<unknown> {
    const fork = parent.fork();
    try {
      return await this.resolveKey(key, fork, mode);
    } finally {
      fork.release();
    }
  }

  /**
   * Execute a lazy importer with optional retry/backoff semantics.
   * Delay before retry n (0-based) is `backoffMs * factor ^ n`.
   */
  private async importWithRetry(
    lazy: Lazy<unknown>,
    key: Key<unknown>,
    context: ResolutionContext,
  ): Promise<Newable<unknown>> {
    const retries = lazy.retry?.retries ?? 0;
    const baseDelay = lazy.retry?.backoffMs ?? 0;
    const factor = lazy.retry?.factor ?? 2;
    let attempt = 0;

    while (true) {
      let loaded: unknown;
      try {
        loaded = await lazy.importer();
      } catch (error: unknown) {
        if (attempt >= retries) {
          throw new ConstructionError(
            key,
            context.path,
            error,
            `Lazy importer failed after ${attempt + 1} attempt(s). Original error: ${describeError(error)}`,
          );
        }
        const delay = baseDelay * Math.pow(factor, attempt);
        if (delay > 0) {
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
        attempt++;
        continue;
      }

      // Handle both default and named exports
      const candidate: unknown =
        !isConstructor(loaded) &&
        typeof loaded === "object" &&
        loaded !== null &&
        "default" in loaded
          ? loaded.default
          : loaded;
      if (!isConstructor(candidate)) {
        throw new ConstructionError(
          key,
          context.path,
          new TypeError("Lazy importer did not return a class"),
          `Lazy importer did not return a class. Received type: ${typeof candidate}`,
        );
      }
      return candidate;
    }
  }
}
