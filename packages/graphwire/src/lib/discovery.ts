import { z } from "zod";
import { implementsContract } from "./capabilities";
import type { Container } from "./container";
import { dependenciesRegistry } from "./decorators";
import { InvalidBindingError } from "./dependency-error";
import { Key, isContract, type Contract, type KeyLike } from "./key";
import { classProvider } from "./provider";
import { ServiceScope } from "./scope";
import type { Newable } from "./types";

const discoveryOptionsSchema = z.object({
  pattern: z
    .union([
      z.string().min(1, "pattern must be a non-empty string"),
      z.instanceof(RegExp),
    ])
    .optional(),
  qualifyByName: z.boolean().default(false),
});

export interface DiscoveryOptions<T> {
  /** Candidates must satisfy this contract's capability set. */
  contract: Contract<T>;
  /**
   * Export-name filter: a RegExp, or a string where `*` matches any run of
   * characters (`"*Channel"`). Defaults to every export.
   */
  pattern?: string | RegExp;
  /** Qualify each key with the export name instead of using the bare contract. */
  qualifyByName?: boolean;
}

export interface DiscoveredImplementation<T> {
  /** Export name the implementation was found under. */
  name: string;
  key: Key<T>;
  implementation: Newable<T>;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
}

function toMatcher(
  pattern: string | RegExp | undefined,
): (name: string) => boolean {
  if (pattern === undefined) {
    return () => true;
  }
  if (pattern instanceof RegExp) {
    return (name) => {
      pattern.lastIndex = 0;
      return pattern.test(name);
    };
  }
  const source = pattern.split("*").map(escapeRegExp).join(".*");
  const expression = new RegExp(`^${source}$`);
  return (name) => expression.test(name);
}

/**
 * Enumerate a module namespace (`import * as channels from "./channels"`) or
 * any plain object of exports and return the classes implementing `contract`.
 *
 * Enumeration follows the namespace's key order. The contract itself is
 * never reported as its own implementation.
 */
export function discoverImplementations<T>(
  namespace: Readonly<Record<string, unknown>>,
  options: DiscoveryOptions<T>,
): DiscoveredImplementation<T>[] {
  if (!isContract(options.contract)) {
    throw new InvalidBindingError(
      "Discovery contract must be a class or a token",
    );
  }
  const parsed = discoveryOptionsSchema.safeParse({
    pattern: options.pattern,
    qualifyByName: options.qualifyByName,
  });
  if (!parsed.success) {
    throw new InvalidBindingError(
      `Invalid discovery options: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
    );
  }

  const { contract } = options;
  const matches = toMatcher(parsed.data.pattern);
  const discovered: DiscoveredImplementation<T>[] = [];
  for (const [name, candidate] of Object.entries(namespace)) {
    if (!matches(name) || candidate === contract) {
      continue;
    }
    if (!implementsContract(contract, candidate)) {
      continue;
    }
    discovered.push({
      name,
      key: parsed.data.qualifyByName
        ? Key.of(contract, name)
        : Key.of(contract),
      implementation: candidate,
    });
  }
  return discovered;
}

export interface ApplyDiscoveredOptions<T> {
  /** Append every implementation to this collection instead of binding keys one by one. */
  into?: KeyLike<T[]>;
  /** Scope for single bindings; defaults to each class's decorator scope, then transient. */
  scope?: ServiceScope;
}

/**
 * Feed discovered implementations to the container exactly like manual
 * registrations: `bind` per key, or `bindMulti` into a collection.
 */
export function applyDiscovered<T>(
  container: Container,
  discovered: readonly DiscoveredImplementation<T>[],
  options: ApplyDiscoveredOptions<T> = {},
): void {
  for (const { key, implementation } of discovered) {
    if (options.into) {
      container.bindMulti(options.into, classProvider(implementation));
      continue;
    }
    const scope =
      options.scope ??
      dependenciesRegistry.get(implementation)?.scope ??
      ServiceScope.TRANSIENT;
    container.bind(key, classProvider(implementation), scope);
  }
}
