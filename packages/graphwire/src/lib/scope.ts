export const ServiceScope = {
  /** New instance on every resolution. */
  TRANSIENT: "transient",
  /** One instance per container, created on first resolution. */
  SINGLETON: "singleton",
  /** One instance per process, shared by every container. */
  GLOBAL_SINGLETON: "global-singleton",
} as const;

export type ServiceScope = (typeof ServiceScope)[keyof typeof ServiceScope];

export const SERVICE_SCOPES = [
  ServiceScope.TRANSIENT,
  ServiceScope.SINGLETON,
  ServiceScope.GLOBAL_SINGLETON,
] as const;

export function isServiceScope(value: unknown): value is ServiceScope {
  return SERVICE_SCOPES.some((scope) => scope === value);
}
