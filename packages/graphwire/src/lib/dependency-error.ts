import type { Key } from "./key";

export function formatKeyPath(path: readonly Key<unknown>[]): string {
  return path.map((key) => key.toString()).join(" -> ");
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Base class for every failure raised while resolving a key.
 * `path` is the chain of keys from the root request to the failing key.
 */
export class DependencyResolutionError extends Error {
  public readonly key: Key<unknown>;
  public readonly path: readonly Key<unknown>[];

  constructor(
    message: string,
    params: {
      key: Key<unknown>;
      path: readonly Key<unknown>[];
      cause?: unknown;
    },
  ) {
    super(
      message,
      params.cause !== undefined ? { cause: params.cause } : undefined,
    );
    this.name = "DependencyResolutionError";
    this.key = params.key;
    this.path = [...params.path];
  }

  toDetailedString(): string {
    const causeInfo =
      this.cause !== undefined ? `\nCaused by: ${describeCause(this.cause)}` : "";
    return `${this.message}\nResolution path: ${formatKeyPath(this.path)}${causeInfo}`;
  }
}

export class UnboundDependencyError extends DependencyResolutionError {
  /** The key whose construction needed the missing one, if any. */
  public readonly requestedBy?: Key<unknown>;

  constructor(key: Key<unknown>, path: readonly Key<unknown>[]) {
    const requestedBy = path.length > 1 ? path[path.length - 2] : undefined;
    const via = requestedBy ? ` (required by ${requestedBy.toString()})` : "";
    super(
      `No binding registered for ${key.toString()}${via}. Resolution path: ${formatKeyPath(path)}`,
      { key, path },
    );
    this.name = "UnboundDependencyError";
    this.requestedBy = requestedBy;
  }
}

export class CyclicDependencyError extends DependencyResolutionError {
  /** Ordered keys from the first repeated key back to itself. */
  public readonly cycle: readonly Key<unknown>[];

  constructor(cycle: readonly Key<unknown>[], path: readonly Key<unknown>[]) {
    super(`Circular dependency detected: ${formatKeyPath(cycle)}`, {
      key: cycle[0],
      path,
    });
    this.name = "CyclicDependencyError";
    this.cycle = [...cycle];
  }
}

export class ConstructionError extends DependencyResolutionError {
  constructor(
    key: Key<unknown>,
    path: readonly Key<unknown>[],
    cause: unknown,
    reason?: string,
  ) {
    super(
      `Failed to construct ${key.toString()}. Resolution path: ${formatKeyPath(path)}. ${reason ?? `Original error: ${describeCause(cause)}`}`,
      { key, path, cause },
    );
    this.name = "ConstructionError";
  }
}

/** Raised for invalid configuration: malformed options, qualifiers or bindings. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class InvalidBindingError extends ConfigurationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidBindingError";
  }
}
