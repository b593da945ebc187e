import { z } from "zod";
import { InvalidBindingError } from "./dependency-error";
import { isConstructor, isToken } from "./types";
import type { AbstractNewable, Token } from "./types";

/** Anything a binding can be registered for: a class, an abstract class or a token. */
export type Contract<T = unknown> = AbstractNewable<T> | Token<T>;

export type AnnotationValue = string | number | boolean;

/** Structured qualifier, e.g. `annotation("Env", { stage: "prod" })`. */
export interface Annotation {
  readonly name: string;
  readonly attributes: Readonly<Record<string, AnnotationValue>>;
}

/** A plain string is a name qualifier; anything richer is an {@link Annotation}. */
export type Qualifier = string | Annotation;

const annotationSchema = z.object({
  name: z.string().min(1, "annotation name must be a non-empty string"),
  attributes: z
    .record(z.union([z.string(), z.number(), z.boolean()]))
    .default({}),
});

const qualifierSchema = z.union([
  z.string().min(1, "qualifier name must be a non-empty string"),
  annotationSchema,
]);

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

/** Validated string qualifier. */
export function named(name: string): string {
  const parsed = qualifierSchema.safeParse(name);
  if (!parsed.success || typeof parsed.data !== "string") {
    throw new InvalidBindingError(
      `Invalid name qualifier ${JSON.stringify(name)}: qualifier name must be a non-empty string`,
    );
  }
  return parsed.data;
}

export function annotation(
  name: string,
  attributes?: Record<string, AnnotationValue>,
): Annotation {
  const parsed = annotationSchema.safeParse({ name, attributes });
  if (!parsed.success) {
    throw new InvalidBindingError(
      `Invalid annotation qualifier: ${formatIssues(parsed.error)}`,
    );
  }
  return Object.freeze({
    name: parsed.data.name,
    attributes: Object.freeze({ ...parsed.data.attributes }),
  });
}

function normalizeQualifier(qualifier: unknown): Qualifier | undefined {
  if (qualifier === undefined) {
    return undefined;
  }
  const parsed = qualifierSchema.safeParse(qualifier);
  if (!parsed.success) {
    throw new InvalidBindingError(
      `Invalid qualifier: ${formatIssues(parsed.error)}`,
    );
  }
  if (typeof parsed.data === "string") {
    return parsed.data;
  }
  return Object.freeze({
    name: parsed.data.name,
    attributes: Object.freeze({ ...parsed.data.attributes }),
  });
}

function sortedAttributes(
  value: Annotation,
): Array<[string, AnnotationValue]> {
  return Object.keys(value.attributes)
    .sort()
    .map((name) => [name, value.attributes[name]]);
}

/** Canonical text used for interning; equal qualifiers produce equal ids. */
function qualifierId(qualifier: Qualifier | undefined): string {
  if (qualifier === undefined) {
    return "";
  }
  if (typeof qualifier === "string") {
    return JSON.stringify(qualifier);
  }
  const attributes = sortedAttributes(qualifier).map(([name, value]) => [
    name,
    typeof value,
    String(value),
  ]);
  return `@${qualifier.name}${JSON.stringify(attributes)}`;
}

function formatAttributeValue(value: AnnotationValue): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

export function formatQualifier(qualifier: Qualifier): string {
  if (typeof qualifier === "string") {
    return JSON.stringify(qualifier);
  }
  const attributes = sortedAttributes(qualifier);
  if (attributes.length === 0) {
    return `@${qualifier.name}`;
  }
  const rendered = attributes
    .map(([name, value]) => `${name}=${formatAttributeValue(value)}`)
    .join(", ");
  return `@${qualifier.name}(${rendered})`;
}

export function isContract(value: unknown): value is Contract<unknown> {
  return isToken(value) || isConstructor(value);
}

export function describeContract(contract: Contract<unknown>): string {
  if (isToken(contract)) {
    return contract.description ?? contract.id.description ?? "<token>";
  }
  return contract.name || "<anonymous>";
}

const internedKeys = new WeakMap<object, Map<string, Key<unknown>>>();
const contractOrdinals = new WeakMap<object, number>();
let nextContractOrdinal = 0;

function contractOrdinal(contract: Contract<unknown>): number {
  const existing = contractOrdinals.get(contract);
  if (existing !== undefined) {
    return existing;
  }
  nextContractOrdinal += 1;
  contractOrdinals.set(contract, nextContractOrdinal);
  return nextContractOrdinal;
}

/**
 * Lookup token for bindings: a contract plus an optional qualifier.
 *
 * Keys are interned, so `Key.of(A, "x") === Key.of(A, "x")` and keys can be used
 * directly as `Map` keys. A key without a qualifier never matches a qualified one.
 *
 * @example
 * ```ts
 * const primary = Key.of(Database, "primary");
 * const eu = Key.of(Database, annotation("Region", { code: "eu" }));
 * ```
 */
export class Key<T = unknown> {
  private constructor(
    public readonly contract: Contract<T>,
    public readonly qualifier: Qualifier | undefined,
    /** Stable, process-unique hash text for this key. */
    public readonly id: string,
  ) {
    Object.freeze(this);
  }

  static of<T>(contract: Contract<T>, qualifier?: Qualifier): Key<T> {
    if (!isContract(contract)) {
      throw new InvalidBindingError(
        `Key contract must be a class or a token, received ${typeof contract}`,
      );
    }
    const normalized = normalizeQualifier(qualifier);
    const qualifierText = qualifierId(normalized);

    let byQualifier = internedKeys.get(contract);
    if (!byQualifier) {
      byQualifier = new Map();
      internedKeys.set(contract, byQualifier);
    }
    const existing = byQualifier.get(qualifierText);
    if (existing) {
      // Interning erases T; the contract object guarantees it matches.
      return existing as Key<T>;
    }

    const suffix = qualifierText ? `|${qualifierText}` : "";
    const key = new Key<T>(
      contract,
      normalized,
      `${contractOrdinal(contract)}:${describeContract(contract)}${suffix}`,
    );
    byQualifier.set(qualifierText, key);
    return key;
  }

  equals(other: Key<unknown>): boolean {
    return this === other;
  }

  toString(): string {
    const label = describeContract(this.contract);
    if (this.qualifier === undefined) {
      return label;
    }
    // Annotations already render with a leading "@".
    return typeof this.qualifier === "string"
      ? `${label}@${formatQualifier(this.qualifier)}`
      : `${label}${formatQualifier(this.qualifier)}`;
  }
}

/** Either a key or a bare contract (meaning its unqualified key). */
export type KeyLike<T> = Key<T> | Contract<T>;

export function isKeyLike(value: unknown): value is KeyLike<unknown> {
  return value instanceof Key || isContract(value);
}

export function toKey<T>(target: KeyLike<T>): Key<T> {
  return target instanceof Key ? target : Key.of(target);
}

/** Build the key for `target`, applying `qualifier` when `target` is a bare contract. */
export function keyFor<T>(target: KeyLike<T>, qualifier?: Qualifier): Key<T> {
  if (qualifier === undefined) {
    return toKey(target);
  }
  if (target instanceof Key) {
    throw new InvalidBindingError(
      `Cannot apply qualifier ${formatQualifier(qualifier)} to ${target.toString()}: it is already a key`,
    );
  }
  return Key.of(target, qualifier);
}
