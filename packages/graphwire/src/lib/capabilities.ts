import { InvalidBindingError } from "./dependency-error";
import type { Contract, Key } from "./key";
import type { Provider } from "./provider";
import { isConstructor, isToken } from "./types";
import type { Newable } from "./types";

function prototypeMembers(prototype: unknown): string[] {
  const members = new Set<string>();
  let current: unknown = prototype;
  while (
    typeof current === "object" &&
    current !== null &&
    current !== Object.prototype
  ) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (name !== "constructor") {
        members.add(name);
      }
    }
    current = Object.getPrototypeOf(current);
  }
  return [...members];
}

/**
 * Member names an implementation of `contract` must expose: the declared
 * capabilities of a token, or the prototype members of a class (abstract
 * members leave no trace at runtime and are not checked).
 */
export function requiredCapabilities(
  contract: Contract<unknown>,
): readonly string[] {
  if (isToken(contract)) {
    return contract.capabilities ?? [];
  }
  return prototypeMembers(contract.prototype);
}

function missingCapabilities(
  contract: Contract<unknown>,
  has: (member: string) => boolean,
): string[] {
  return requiredCapabilities(contract).filter((member) => !has(member));
}

function isSubclassOf(
  candidate: Newable<unknown>,
  contract: Contract<unknown>,
): boolean {
  return (
    isConstructor(contract) &&
    (candidate === contract || candidate.prototype instanceof contract)
  );
}

/** Whether `candidate` is a class whose instances satisfy `contract`. */
export function implementsContract<T>(
  contract: Contract<T>,
  candidate: unknown,
): candidate is Newable<T> {
  if (!isConstructor(candidate)) {
    return false;
  }
  if (isSubclassOf(candidate, contract)) {
    return true;
  }
  const prototype: unknown = candidate.prototype;
  return (
    missingCapabilities(
      contract,
      (member) =>
        typeof prototype === "object" &&
        prototype !== null &&
        member in prototype,
    ).length === 0
  );
}

function instanceMissing(
  contract: Contract<unknown>,
  instance: unknown,
): string[] {
  if (isConstructor(contract) && instance instanceof contract) {
    return [];
  }
  if (instance === null || instance === undefined) {
    return [...requiredCapabilities(contract)];
  }
  const target = Object(instance);
  return missingCapabilities(contract, (member) => member in target);
}

/**
 * Bind-time check that a class or instance provider satisfies the key's
 * contract. Factory, constructor and lazy providers cannot be inspected up
 * front and are accepted as is.
 */
export function assertSatisfiesContract(
  key: Key<unknown>,
  provider: Provider,
): void {
  let missing: string[] = [];
  let subject = "";
  switch (provider.kind) {
    case "class":
      if (isSubclassOf(provider.useClass, key.contract)) {
        return;
      }
      missing = missingCapabilities(
        key.contract,
        (member) => member in provider.useClass.prototype,
      );
      subject = provider.useClass.name || "<anonymous>";
      break;
    case "instance":
      missing = instanceMissing(key.contract, provider.instance);
      subject = "instance";
      break;
    case "constructor":
    case "factory":
    case "lazy-class":
      return;
  }
  if (missing.length > 0) {
    throw new InvalidBindingError(
      `Cannot bind ${subject} to ${key.toString()}: missing ${missing.join(", ")}`,
    );
  }
}
