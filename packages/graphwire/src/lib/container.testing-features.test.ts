import { afterEach, describe, expect, it, vi } from "vitest";

import { createTestContainer } from "../test";
import { Container } from "./container";
import {
  dependenciesRegistry,
  deps,
  GlobalSingleton,
  Injectable,
} from "./decorators";
import { asValue, defineProviders } from "./providers";
import { createToken } from "./types";

interface Fuel {
  kind(): string;
}

const FuelToken = createToken<Fuel>("fuel", { capabilities: ["kind"] });

@Injectable()
class Engine {
  start(): string {
    return "real";
  }
}

@Injectable(deps(Engine, FuelToken))
class Car {
  constructor(
    public engine: Engine,
    public fuel: Fuel,
  ) {}

  run(): string {
    return `${this.engine.start()} on ${this.fuel.kind()}`;
  }
}

@GlobalSingleton()
class Telemetry {}

describe("Container testing features", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("overrideInstance", () => {
    it("injects overridden dependencies when resolving upstream services", async () => {
      const container = new Container({ logLevel: "silent" });
      const startSpy = vi.fn().mockReturnValue("mocked-engine");
      const mockedEngine: Engine = { start: startSpy };

      container.overrideInstance(Engine, mockedEngine);
      container.registerInstance(FuelToken, { kind: () => "diesel" });

      const car = await container.get(Car);

      expect(car.engine).toBe(mockedEngine);
      expect(car.run()).toBe("mocked-engine on diesel");
      expect(startSpy).toHaveBeenCalledTimes(1);
    });

    it("allows overriding the target itself without building its dependencies", async () => {
      const dependencyConstructed = vi.fn();

      @Injectable()
      class Dependency {
        constructor() {
          dependencyConstructed();
        }
      }

      @Injectable([Dependency])
      class Subject {
        constructor(public dependency: Dependency) {}
      }

      const container = new Container({ logLevel: "silent" });
      const stub: Subject = { dependency: {} };
      container.overrideInstance(Subject, stub);

      expect(await container.get(Subject)).toBe(stub);
      expect(dependencyConstructed).not.toHaveBeenCalled();
    });

    it("replaces cached singleton instances", async () => {
      @Injectable("singleton")
      class Config {
        value = 1;
      }

      const container = new Container({ logLevel: "silent" });
      const original = await container.get(Config);
      const replacement: Config = { value: 42 };

      container.overrideInstance(Config, replacement);

      expect(original).not.toBe(replacement);
      expect(await container.get(Config)).toBe(replacement);
      expect(await container.get(Config)).toBe(replacement);
    });
  });

  describe("createTestContainer", () => {
    it("auto-mocks the dependencies of a target", async () => {
      const handle = createTestContainer({ autoMock: true, target: Car });

      handle.spyOf(Engine, "start")?.mockReturnValue("mocked");
      handle.spyOf(FuelToken, "kind")?.mockReturnValue("hydrogen");

      const car = await handle.get(Car);
      expect(car.run()).toBe("mocked on hydrogen");

      const [engineMock, fuelMock] = handle.getMocks([Engine, FuelToken]);
      expect(engineMock?.__target).toBe(Engine);
      expect(fuelMock?.__target).toBe(FuelToken);

      handle.clearMockSpies();
      expect(handle.spyOf(Engine, "start")).toHaveBeenCalledTimes(0);
      handle.restore();
    });

    it("keeps manual overrides out of auto-mocking", async () => {
      const engine: Engine = { start: () => "manual" };
      const handle = createTestContainer({
        autoMock: true,
        target: Car,
        overrides: { instances: [[Engine, engine]] },
      });

      expect(handle.getMock(Engine)).toBeUndefined();
      expect(handle.getMock(FuelToken)).toBeDefined();
      expect((await handle.get(Car)).engine).toBe(engine);
      handle.restore();
    });

    it("applies provider definitions and configuration", async () => {
      const Label = createToken<string>("label");
      const handle = createTestContainer({
        providers: defineProviders({
          values: [asValue(FuelToken, { kind: () => "petrol" })],
        }),
        configure: (container) => {
          container.registerInstance(Label, "configured");
        },
      });

      expect((await handle.get(Car)).run()).toBe("real on petrol");
      expect(await handle.get(Label)).toBe("configured");
      expect(await handle.getOptional(createToken("unbound"))).toBeUndefined();
      handle.restore();
    });

    it("overrides bindings after creation", async () => {
      const handle = createTestContainer();
      handle.override(FuelToken, { kind: () => "steam" });
      expect((await handle.get(Car)).fuel.kind()).toBe("steam");
      handle.restore();
    });

    it("restores decorator metadata and drops global singletons", async () => {
      const handle = createTestContainer();

      @Injectable()
      class DeclaredDuringTest {}

      const telemetry = await handle.get(Telemetry);
      expect(dependenciesRegistry.has(DeclaredDuringTest)).toBe(true);

      handle.restore();

      expect(dependenciesRegistry.has(DeclaredDuringTest)).toBe(false);
      const fresh = new Container({ logLevel: "silent" });
      expect(await fresh.get(Telemetry)).not.toBe(telemetry);
    });
  });
});
