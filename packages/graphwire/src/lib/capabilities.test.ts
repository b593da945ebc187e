import { describe, expect, it } from "vitest";
import {
  assertSatisfiesContract,
  implementsContract,
  requiredCapabilities,
} from "./capabilities";
import { Key } from "./key";
import {
  classProvider,
  factoryProvider,
  instanceProvider,
} from "./provider";
import { createToken } from "./types";

abstract class Repository {
  abstract find(id: string): string;

  count(): number {
    return 0;
  }
}

class SqlRepository extends Repository {
  find(id: string): string {
    return `sql:${id}`;
  }
}

class CachedRepository {
  find(id: string): string {
    return `cached:${id}`;
  }

  count(): number {
    return 1;
  }

  evict(): void {}
}

class BareRepository {
  find(id: string): string {
    return id;
  }
}

const Queue = createToken<{ push(): void; drain(): void }>("queue", {
  capabilities: ["push", "drain"],
});

describe("capabilities", () => {
  it("lists token capabilities and concrete class members", () => {
    expect(requiredCapabilities(Queue)).toEqual(["push", "drain"]);
    expect(requiredCapabilities(Repository)).toEqual(["count"]);
    expect(requiredCapabilities(createToken("plain"))).toEqual([]);
  });

  it("recognizes subclasses and structural implementations", () => {
    expect(implementsContract(Repository, SqlRepository)).toBe(true);
    expect(implementsContract(Repository, CachedRepository)).toBe(true);
    expect(implementsContract(Repository, BareRepository)).toBe(false);
    expect(implementsContract(Repository, () => undefined)).toBe(false);
  });

  it("checks instances against the contract at bind time", () => {
    expect(() =>
      assertSatisfiesContract(
        Key.of(Queue),
        instanceProvider({ push: () => {}, drain: () => {} }),
      ),
    ).not.toThrow();
    expect(() =>
      assertSatisfiesContract(Key.of(Queue), instanceProvider(undefined)),
    ).toThrow("Cannot bind instance to queue: missing push, drain");
    expect(() =>
      assertSatisfiesContract(
        Key.of(Repository),
        instanceProvider(new SqlRepository()),
      ),
    ).not.toThrow();
  });

  it("names the class and the missing members", () => {
    expect(() =>
      assertSatisfiesContract(
        Key.of(Repository, "bare"),
        classProvider(BareRepository),
      ),
    ).toThrow('Cannot bind BareRepository to Repository@"bare": missing count');
  });

  it("accepts factories unchecked", () => {
    expect(() =>
      assertSatisfiesContract(
        Key.of(Queue),
        factoryProvider(() => undefined),
      ),
    ).not.toThrow();
  });
});
