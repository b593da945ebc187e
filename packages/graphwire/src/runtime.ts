export { Container } from "./lib/container";
export type {
  RegisterOptions,
  RegisterFactoryOptions,
} from "./lib/container";
export { BindingRegistry } from "./lib/binding-registry";
export type {
  Binding,
  BindOptions,
  MultiBindOptions,
  MultiBinding,
  SingleBinding,
} from "./lib/binding-registry";
export {
  Key,
  annotation,
  named,
  formatQualifier,
  describeContract,
  keyFor,
} from "./lib/key";
export type {
  Annotation,
  AnnotationValue,
  Contract,
  KeyLike,
  Qualifier,
} from "./lib/key";
export { ServiceScope, SERVICE_SCOPES } from "./lib/scope";
export {
  classProvider,
  constructorProvider,
  factoryProvider,
  instanceProvider,
  lazyClassProvider,
} from "./lib/provider";
export type {
  ClassProvider,
  ConstructorProvider,
  FactoryProvider,
  InstanceProvider,
  LazyClassProvider,
  Provider,
  Resolver,
} from "./lib/provider";
export { optional, providerOf } from "./lib/dependencies";
export type {
  Dependency,
  DependencyList,
  DependenciesOption,
  DepInstances,
  OptionalDependency,
  ProviderDependency,
} from "./lib/dependencies";
export {
  dependenciesRegistry,
  Injectable,
  Singleton,
  GlobalSingleton,
  Inject,
  deps,
  assertDeps,
} from "./lib/decorators";
export type { MemberInjection } from "./lib/members";
export { Lazy, LAZY_IDENTIFIER } from "./lib/lazy";
export type { Lazy as LazyInterface, RetryOptions } from "./lib/lazy";
export type { Newable, AbstractNewable, Token } from "./lib/types";
export { createToken } from "./lib/types";
export {
  defineProviders,
  asValue,
  asClass,
  asFactory,
  asLazyClass,
  asMulti,
  lifecycle,
  applyProviders,
} from "./lib/providers";
export type { ProviderDefinitions } from "./lib/providers";
export {
  discoverImplementations,
  applyDiscovered,
} from "./lib/discovery";
export type {
  DiscoveredImplementation,
  DiscoveryOptions,
} from "./lib/discovery";
export { implementsContract } from "./lib/capabilities";
export {
  DependencyResolutionError,
  UnboundDependencyError,
  CyclicDependencyError,
  ConstructionError,
  ConfigurationError,
  InvalidBindingError,
} from "./lib/dependency-error";
export { createConsoleLogger } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";
export type { ContainerOptions } from "./lib/options";
export { resetGlobalSingletons } from "./lib/instance-cache";
