import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { Container } from "../container";
import { dependenciesRegistry } from "../decorators";
import { optional } from "../dependencies";
import { Key } from "../key";
import { createToken } from "../types";
import { applyAutoMocks, mockContract } from "./mocking";
import {
  restoreRegistry,
  snapshotRegistry,
  type RegistrySnapshot,
} from "./registry";

describe("mockContract", () => {
  it("creates spies for prototype methods, inherited ones included", () => {
    class BaseService {
      close(): void {}
    }

    class ExampleService extends BaseService {
      nonFunction = "should not be copied";

      greet(name: string): string {
        return `hello ${name}`;
      }

      compute(value: number): number {
        return value * 2;
      }
    }

    const { target, mock, spies } = mockContract(ExampleService);

    expect(target).toBe(ExampleService);

    mock.greet?.("world");
    mock.compute?.(21);

    expect(mock.spies.greet).toHaveBeenCalledWith("world");
    expect(mock.spies.compute).toHaveBeenCalledWith(21);
    expect(Object.keys(spies).sort()).toEqual(["close", "compute", "greet"]);
    expect(mock).not.toHaveProperty("nonFunction");
    expect(mock.__target).toBe(ExampleService);
  });

  it("creates spies for the capabilities of a token", () => {
    const Audit = createToken<{ record(entry: string): void }>("audit", {
      capabilities: ["record"],
    });

    const { mock } = mockContract(Audit);
    mock.record?.("login");

    expect(mock.spies.record).toHaveBeenCalledWith("login");
  });
});

describe("applyAutoMocks", () => {
  let baseline: RegistrySnapshot;

  beforeEach(() => {
    baseline = snapshotRegistry();
    dependenciesRegistry.clear();
  });

  afterEach(() => {
    restoreRegistry(baseline);
    vi.restoreAllMocks();
  });

  class Leaf {
    ping(): string {
      return "leaf";
    }
  }
  class Branch {
    grow(): string {
      return "branch";
    }
  }
  class Root {
    constructor(
      public branch: Branch,
      public audit: { record(entry: string): void },
      public settings: { verbose: boolean },
      public extra?: Leaf,
    ) {}
  }
  const Audit = createToken<{ record(entry: string): void }>("audit", {
    capabilities: ["record"],
  });
  const Settings = createToken<{ verbose: boolean }>("settings");
  const ExtraLeaf = createToken<Leaf>("extra-leaf");

  function register(): void {
    dependenciesRegistry.set(Leaf, { dependencies: () => [] });
    dependenciesRegistry.set(Branch, { dependencies: () => [Leaf] });
    dependenciesRegistry.set(Root, {
      dependencies: () => [Branch, Audit, Settings, optional(ExtraLeaf)],
    });
  }

  it("auto-mocks the dependency graph, skipping the target itself", async () => {
    register();
    const container = new Container({ logLevel: "silent" });
    const settings = { verbose: true };
    container.registerInstance(Settings, settings);
    const overrideSpy = vi.spyOn(container, "overrideInstance");

    const result = applyAutoMocks({
      target: Root,
      container,
      overriddenKeys: new Set<Key<unknown>>(),
    });

    expect(overrideSpy.mock.calls.map((call) => call[0])).toEqual([
      Key.of(Branch),
      Key.of(Audit),
      Key.of(Leaf),
    ]);
    expect(result.mocks.has(Key.of(Root))).toBe(false);
    expect(result.mocks.has(Key.of(Settings))).toBe(false);
    expect(result.mocks.has(Key.of(ExtraLeaf))).toBe(false);

    const root = await container.get(Root);
    expect(root.branch).toBe(result.mocks.get(Key.of(Branch))?.mock);
    expect(root.settings).toBe(settings);
    expect(root.extra).toBeUndefined();
    root.audit.record("boot");
    expect(result.mocks.get(Key.of(Audit))?.spies.record).toHaveBeenCalledWith(
      "boot",
    );
  });

  it("respects manual overrides", () => {
    register();
    const container = new Container({ logLevel: "silent" });
    const overrideSpy = vi.spyOn(container, "overrideInstance");

    const result = applyAutoMocks({
      target: Root,
      container,
      overriddenKeys: new Set([Key.of(Branch)]),
    });

    expect(overrideSpy).toHaveBeenCalledTimes(2);
    expect(result.mocks.has(Key.of(Branch))).toBe(false);
    expect(result.mocks.has(Key.of(Leaf))).toBe(true);
  });
});
