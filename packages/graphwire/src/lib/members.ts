import { InvalidBindingError } from "./dependency-error";
import type { Dependency, DependencyList } from "./dependencies";

/** Assign the resolved dependency to `instance[member]`. */
export interface FieldInjection {
  readonly member: string | symbol;
  readonly dependency: Dependency;
}

/** Call `instance[method](...resolved)` with the dependencies resolved in order. */
export interface MethodInjection {
  readonly method: string | symbol;
  readonly dependencies: DependencyList;
}

export type MemberInjection = FieldInjection | MethodInjection;

// Keyed by the class that declared the slots (see `@Inject`).
const memberRegistry = new Map<Function, MemberInjection[]>();

export function registerMemberInjection(
  owner: Function,
  injection: MemberInjection,
): void {
  const slots = memberRegistry.get(owner) ?? [];
  slots.push(injection);
  memberRegistry.set(owner, slots);
}

/**
 * Decorated slots of `instance`'s class chain, base classes first, each class
 * in declaration order.
 */
export function memberInjectionsOf(instance: object): MemberInjection[] {
  const owners: unknown[] = [];
  let prototype: unknown = Object.getPrototypeOf(instance);
  while (
    typeof prototype === "object" &&
    prototype !== null &&
    prototype !== Object.prototype
  ) {
    owners.unshift(Reflect.get(prototype, "constructor"));
    prototype = Object.getPrototypeOf(prototype);
  }
  return owners.flatMap((owner) =>
    typeof owner === "function" ? (memberRegistry.get(owner) ?? []) : [],
  );
}

function describeMember(member: string | symbol): string {
  return typeof member === "symbol" ? member.toString() : member;
}

/**
 * Fills member slots of an already constructed instance. Each dependency is
 * resolved through `resolve` as its own resolution call. The first failure
 * aborts the injection; members assigned before it stay assigned.
 */
export class MembersInjector {
  constructor(
    private readonly resolve: (dependency: Dependency) => Promise<unknown>,
  ) {}

  async inject<T extends object>(
    instance: T,
    members: readonly MemberInjection[] = memberInjectionsOf(instance),
  ): Promise<T> {
    for (const slot of members) {
      if ("member" in slot) {
        const value = await this.resolve(slot.dependency);
        Reflect.set(instance, slot.member, value);
        continue;
      }

      const method: unknown = Reflect.get(instance, slot.method);
      if (typeof method !== "function") {
        throw new InvalidBindingError(
          `Cannot inject method ${describeMember(slot.method)}: it is not a function on ${instance.constructor.name || "<anonymous>"}`,
        );
      }
      const values: unknown[] = [];
      for (const dependency of slot.dependencies) {
        values.push(await this.resolve(dependency));
      }
      await Reflect.apply(method, instance, values);
    }
    return instance;
  }
}
