import { assertSatisfiesContract } from "./capabilities";
import { InvalidBindingError } from "./dependency-error";
import type { Key } from "./key";
import { silentLogger, type Logger } from "./logger";
import type { Provider } from "./provider";
import { ServiceScope } from "./scope";

export interface SingleBinding<T = unknown> {
  readonly kind: "single";
  readonly key: Key<T>;
  readonly provider: Provider<T>;
  readonly scope: ServiceScope;
}

/** Ordered element providers aggregated under one key. Elements are unscoped. */
export interface MultiBinding<T = unknown> {
  readonly kind: "multi";
  readonly key: Key<T>;
  readonly providers: readonly Provider[];
  /** Set flavor: a provider already present is not added again. */
  readonly distinct: boolean;
}

export type Binding<T = unknown> = SingleBinding<T> | MultiBinding<T>;

export interface MultiBindOptions {
  /** Skip the bind-time contract check. */
  unchecked?: boolean;
  /**
   * Aggregate as a set: registering the same class, instance, factory or
   * lazy importer twice keeps only the first registration. A key is either a
   * set or a list for its whole lifetime.
   */
  asSet?: boolean;
}

export interface BindOptions {
  /** Replace an existing single binding without the override warning. */
  override?: boolean;
  /** Skip the bind-time contract check (test doubles are rarely complete). */
  unchecked?: boolean;
}

/**
 * Key -> binding table. Single bindings follow last-write-wins; multi bindings
 * accumulate providers in registration order.
 */
export class BindingRegistry {
  private readonly bindings = new Map<Key<unknown>, Binding>();

  constructor(private readonly logger: Logger = silentLogger) {}

  bind<T>(
    key: Key<T>,
    provider: Provider<T>,
    scope: ServiceScope = ServiceScope.TRANSIENT,
    options: BindOptions = {},
  ): void {
    if (!options.unchecked) {
      assertSatisfiesContract(key, provider);
    }
    const existing = this.bindings.get(key);
    if (existing?.kind === "multi") {
      throw new InvalidBindingError(
        `Cannot bind ${key.toString()} as a single binding: it already has ${existing.providers.length} multi-binding provider(s)`,
      );
    }
    if (existing && !options.override) {
      this.logger.warn(
        `Binding for ${key.toString()} registered more than once; the last registration wins.`,
      );
    }
    this.bindings.set(key, { kind: "single", key, provider, scope });
  }

  /**
   * Append `provider` to the collection bound at `key`. Resolving the key
   * yields one element per provider, in registration order.
   */
  bindMulti<T>(
    key: Key<T[]>,
    provider: Provider<T>,
    options: MultiBindOptions = {},
  ): void {
    if (!options.unchecked) {
      // Capabilities declared on a collection token describe its elements.
      assertSatisfiesContract(key, provider);
    }
    this.appendMulti(key, [provider], options.asSet ?? false);
  }

  lookup(key: Key<unknown>): Binding | undefined {
    return this.bindings.get(key);
  }

  has(key: Key<unknown>): boolean {
    return this.bindings.has(key);
  }

  keys(): Key<unknown>[] {
    return [...this.bindings.keys()];
  }

  entries(): Binding[] {
    return [...this.bindings.values()];
  }

  /**
   * Merge `other` into this registry: single bindings override (with the
   * usual warning), multi-binding lists concatenate after the existing ones
   * and sets keep their flavor.
   */
  install(other: BindingRegistry): void {
    if (other === this) {
      return;
    }
    for (const binding of other.entries()) {
      if (binding.kind === "single") {
        this.bind(binding.key, binding.provider, binding.scope, {
          unchecked: true,
        });
      } else {
        this.appendMulti(binding.key, binding.providers, binding.distinct);
      }
    }
  }

  private appendMulti(
    key: Key<unknown>,
    providers: readonly Provider[],
    distinct: boolean,
  ): void {
    const existing = this.bindings.get(key);
    if (existing?.kind === "single") {
      throw new InvalidBindingError(
        `Cannot add a multi-binding provider to ${key.toString()}: it already has a single binding`,
      );
    }
    if (existing && existing.distinct !== distinct) {
      throw new InvalidBindingError(
        `Cannot add a ${flavor(distinct)} multi-binding provider to ${key.toString()}: it is already bound as a ${flavor(existing.distinct)}`,
      );
    }

    const merged = [...(existing?.providers ?? [])];
    for (const provider of providers) {
      const identity = providerIdentity(provider);
      const duplicate = merged.some((present) =>
        Object.is(providerIdentity(present), identity),
      );
      if (distinct && duplicate) {
        this.logger.debug(
          `Skipped a duplicate element of set binding ${key.toString()}.`,
        );
        continue;
      }
      merged.push(provider);
    }
    this.bindings.set(key, { kind: "multi", key, providers: merged, distinct });
  }
}

function flavor(distinct: boolean): string {
  return distinct ? "set" : "list";
}

/** What makes two element providers the same entry of a set binding. */
function providerIdentity(provider: Provider): unknown {
  switch (provider.kind) {
    case "class":
      return provider.useClass;
    case "instance":
      return provider.instance;
    case "factory":
      return provider.useFactory;
    case "lazy-class":
      return provider.lazy.importer;
    case "constructor":
      return provider;
  }
}
