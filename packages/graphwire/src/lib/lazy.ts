import type { Newable } from "./types";

export const LAZY_IDENTIFIER = Symbol("lazy");

export type Importer<T> = () => Promise<
  | {
      default: Newable<T>;
    }
  | Newable<T>
>;

export interface RetryOptions {
  retries: number; // number of additional attempts after the first
  backoffMs?: number; // initial delay
  factor?: number; // backoff multiplier
}

export interface Lazy<T> {
  [LAZY_IDENTIFIER]: true;
  importer: Importer<T>;
  retry?: RetryOptions;
}

/**
 * Narrow an unknown value to a `Lazy` wrapper based on the hidden identifier symbol.
 */
export function isLazy(value: unknown): value is Lazy<unknown> {
  return (
    typeof value === "object" && value !== null && LAZY_IDENTIFIER in value
  );
}

/**
 * Wraps a dynamic import of a class so it is only loaded when first resolved.
 * @param importer A function that returns the class, e.g. `() => import('./mailer').then(m => m.Mailer)`
 * @param retry Optional retry/backoff policy for flaky loaders.
 */
export function Lazy<T>(importer: Importer<T>, retry?: RetryOptions): Lazy<T> {
  return {
    [LAZY_IDENTIFIER]: true,
    importer,
    retry,
  };
}
