import type {
  DependenciesOption,
  Dependency,
  DependencyList,
  DepInstances,
} from "./dependencies";
import { normalizeDependencies } from "./dependencies";
import { registerMemberInjection } from "./members";
import { ServiceScope, isServiceScope } from "./scope";
import { isConstructor } from "./types";
import type { Newable } from "./types";

/**
 * Strongly-typed decorator function signature used by overloads when dependencies are known.
 *
 * @typeParam TDeps - A readonly tuple of declared dependencies.
 * @internal
 */
type TypedClassDecorator<TDeps extends DependencyList> = (
  target: new (...args: DepInstances<TDeps>) => unknown,
) => void;

export interface ServiceMetadata {
  dependencies?: () => DependencyList;
  scope?: ServiceScope;
}

/**
 * Global registry for decorator metadata.
 *
 * Keys are service constructors; values carry the declared scope and a
 * normalized thunk returning the declared dependencies. The container reads it
 * for class providers without explicit dependencies and for implicit
 * self-bindings of decorated classes.
 *
 * @internal
 */
export const dependenciesRegistry = new Map<Newable<unknown>, ServiceMetadata>();

/**
 * Create the underlying decorator implementation for `@Injectable`, `@Singleton`
 * and `@GlobalSingleton`.
 *
 * @param scope - The requested lifetime.
 * @param depsOpt - Dependency list (array or factory returning an array).
 * @internal
 */
function createDecoratorWithDeps<const TDeps extends DependencyList>(
  scope: ServiceScope,
  depsOpt: (() => TDeps) | TDeps,
): TypedClassDecorator<TDeps> {
  const dependencies = normalizeDependencies(depsOpt);
  return (target) => {
    dependenciesRegistry.set(target, { scope, dependencies });
  };
}

/**
 * Register scope metadata for services that declare no dependencies.
 * @internal
 */
function createDecoratorWithoutDeps(scope: ServiceScope): ClassDecorator {
  return (target) => {
    if (isConstructor(target)) {
      dependenciesRegistry.set(target, { scope });
    }
  };
}

function isDependenciesArg(value: unknown): value is DependenciesOption {
  return typeof value === "function" || Array.isArray(value);
}

/**
 * Class decorator for declaring a container-managed service and its dependencies.
 *
 * Notes:
 * - Order matters: dependencies map positionally to constructor parameters and
 *   are resolved one after another in that order.
 * - For circular references in the same file, use the function form: `@Injectable(() => [B])`.
 * - `optional(X)` injects `undefined` when X is unbound; `providerOf(X)` injects
 *   a getter resolving X on demand.
 * - Decorator position may not always surface target mismatches; use
 *   {@link assertDeps} for a compile-time check when needed.
 *
 * @example
 * ```ts
 * @Injectable(deps(Logger, optional(Metrics)))
 * class Checkout {
 *   constructor(private logger: Logger, private metrics?: Metrics) {}
 * }
 * ```
 *
 * @example Singleton shorthand via scope
 * ```ts
 * @Injectable('singleton')
 * class AppState {}
 * ```
 */
export function Injectable(): ClassDecorator;
export function Injectable(scope: ServiceScope): ClassDecorator;
export function Injectable<const TDeps extends DependencyList>(
  dependencies: () => TDeps,
  scope?: ServiceScope,
): TypedClassDecorator<TDeps>;
export function Injectable<const TDeps extends DependencyList>(
  dependencies: TDeps,
  scope?: ServiceScope,
): TypedClassDecorator<TDeps>;
export function Injectable(
  depsOrScope?: DependenciesOption | ServiceScope,
  scopeOverride?: ServiceScope,
) {
  if (isDependenciesArg(depsOrScope)) {
    return createDecoratorWithDeps(
      scopeOverride ?? ServiceScope.TRANSIENT,
      depsOrScope,
    );
  }

  const scope =
    (isServiceScope(depsOrScope) ? depsOrScope : undefined) ??
    scopeOverride ??
    ServiceScope.TRANSIENT;
  return createDecoratorWithoutDeps(scope);
}

/**
 * Shorthand for `@Injectable(dependencies?, 'singleton')`: one instance per container.
 *
 * @example
 * ```ts
 * @Singleton(deps(Config))
 * class Metrics { constructor(private cfg: Config) {} }
 * ```
 */
export function Singleton(): ClassDecorator;
export function Singleton<const TDeps extends DependencyList>(
  dependencies: () => TDeps,
): TypedClassDecorator<TDeps>;
export function Singleton<const TDeps extends DependencyList>(
  dependencies: TDeps,
): TypedClassDecorator<TDeps>;
export function Singleton(dependencies?: DependenciesOption) {
  if (isDependenciesArg(dependencies)) {
    return createDecoratorWithDeps(ServiceScope.SINGLETON, dependencies);
  }
  return createDecoratorWithoutDeps(ServiceScope.SINGLETON);
}

/**
 * Shorthand for `@Injectable(dependencies?, 'global-singleton')`: one instance
 * shared by every container in the process.
 */
export function GlobalSingleton(): ClassDecorator;
export function GlobalSingleton<const TDeps extends DependencyList>(
  dependencies: () => TDeps,
): TypedClassDecorator<TDeps>;
export function GlobalSingleton<const TDeps extends DependencyList>(
  dependencies: TDeps,
): TypedClassDecorator<TDeps>;
export function GlobalSingleton(dependencies?: DependenciesOption) {
  if (isDependenciesArg(dependencies)) {
    return createDecoratorWithDeps(ServiceScope.GLOBAL_SINGLETON, dependencies);
  }
  return createDecoratorWithoutDeps(ServiceScope.GLOBAL_SINGLETON);
}

/**
 * Declare dependencies as a strongly-typed readonly tuple without `as const`.
 *
 * @example
 * ```ts
 * @Injectable(deps(Logger, Key.of(Database, "replica")))
 * class Reports { constructor(l: Logger, db: Database) {} }
 * ```
 */
export function deps<const T extends DependencyList>(...items: T): () => T {
  return () => items;
}

/**
 * Compile-time assertion: ensure constructor parameters match the resolved dependency tuple.
 * Zero runtime cost; returns the class unchanged.
 *
 * @example
 * ```ts
 * @Injectable(deps(Dep))
 * class UsesWrong { constructor(_: Wrong) {} }
 *
 * // @ts-expect-error mismatch detected at compile time
 * assertDeps(deps(Dep), UsesWrong);
 * ```
 */
export function assertDeps<
  TDeps extends DependencyList,
  TClass extends new (...args: DepInstances<TDeps>) => unknown,
>(_depsFn: () => TDeps, klass: TClass): TClass {
  return klass;
}

/**
 * Property decorator recording a member injection slot. `container.injectMembers(instance)`
 * fills every decorated property of the instance's class chain.
 *
 * @example
 * ```ts
 * class Screen {
 *   @Inject(Logger) logger?: Logger;
 *   @Inject(optional(Theme)) theme?: Theme;
 * }
 * ```
 */
export function Inject(dependency: Dependency): PropertyDecorator {
  return (target, member) => {
    registerMemberInjection(target.constructor, { member, dependency });
  };
}
