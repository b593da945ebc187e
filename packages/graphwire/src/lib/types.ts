/**
 * Represents a class constructor with arbitrary parameters.
 * We intentionally use `any[]` here because the container never inspects
 * constructor parameter types at runtime and widening to `unknown[]` causes
 * TypeScript incompatibilities (strict contravariance) when passing concrete
 * constructor signatures. Instantiation is delegated to the actual class.
 */
export type Newable<T> = new (...args: any[]) => T;

/** Abstract classes are valid contracts even though they cannot be constructed. Same `any[]` reasoning. */
export type AbstractNewable<T> = abstract new (...args: any[]) => T;

/** Generic constructor shape (helper for internal checks). */
export type Constructor = Newable<unknown>;

/** Typed token for non-class values or interface-style contracts. */
export interface Token<T> {
  readonly id: symbol;
  readonly description?: string;
  /**
   * Member names every implementation bound to this token must expose.
   * Checked once when a class or instance is bound, never during resolution.
   */
  readonly capabilities?: readonly string[];
  // phantom type field, not used at runtime
  readonly __type?: T;
}

export interface TokenOptions {
  capabilities?: readonly string[];
}

/** Create a unique typed token for values or abstractions. */
export function createToken<T>(
  description?: string,
  options?: TokenOptions,
): Token<T> {
  const token: Token<T> = {
    id: Symbol(description),
    description,
    capabilities: options?.capabilities
      ? Object.freeze([...options.capabilities])
      : undefined,
  };
  return Object.freeze(token);
}

export function isToken(value: unknown): value is Token<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.prototype.hasOwnProperty.call(value, "id") &&
    typeof (value as { id?: unknown }).id === "symbol"
  );
}

export function isConstructor(value: unknown): value is Constructor {
  if (typeof value !== "function") {
    return false;
  }

  const proto = (value as { prototype?: unknown }).prototype;
  if (!proto || typeof proto !== "object") {
    return false;
  }

  if ((proto as { constructor?: unknown }).constructor !== value) {
    return false;
  }

  return true;
}
