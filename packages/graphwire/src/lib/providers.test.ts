import { describe, expect, it, vi } from "vitest";
import { Container } from "./container";
import { deps } from "./decorators";
import { providerOf } from "./dependencies";
import { InvalidBindingError } from "./dependency-error";
import { Key } from "./key";
import { instanceProvider } from "./provider";
import {
  applyProviders,
  asClass,
  asFactory,
  asLazyClass,
  asMulti,
  asValue,
  defineProviders,
  detectProviderCycles,
  lifecycle,
} from "./providers";
import { createToken } from "./types";

interface Notifier {
  notify(message: string): string;
}

class DepService {}
class NeedsDep {
  constructor(
    public dep: DepService,
    public baseUrl: string,
  ) {}
}

class ConsoleNotifier implements Notifier {
  notify(message: string): string {
    return `console:${message}`;
  }
}

class WebhookNotifier implements Notifier {
  constructor(public url: string) {}

  notify(message: string): string {
    return `${this.url}:${message}`;
  }
}

const NotifierToken = createToken<Notifier>("notifier", {
  capabilities: ["notify"],
});
const Notifiers = createToken<Notifier[]>("notifiers", {
  capabilities: ["notify"],
});
const WebhookUrl = createToken<string>("webhook-url");

function silentContainer(): Container {
  return new Container({ logLevel: "silent" });
}

describe("provider helpers", () => {
  it("registers values and services on a container", async () => {
    const apiToken = createToken<string>("api-base-url");
    const definition = defineProviders({
      values: [asValue(apiToken, "https://api.test")],
      services: [
        asClass(DepService, { lifecycle: lifecycle.singleton() }),
        asClass(NeedsDep, {
          lifecycle: lifecycle.transient(),
          deps: deps(DepService, apiToken),
        }),
      ],
    });

    const container = silentContainer();
    applyProviders(container, definition);

    const resolved = await container.get(NeedsDep);
    expect(resolved.dep).toBeInstanceOf(DepService);
    expect(await container.get(NeedsDep)).not.toBe(resolved);
    expect(resolved.dep).toBe(await container.get(DepService));
    expect(resolved.baseUrl).toBe("https://api.test");
  });

  it("accepts arrays of provider definitions, later blocks winning", async () => {
    const container = silentContainer();
    class Scoped {}
    const first = defineProviders({
      values: [asValue(WebhookUrl, "https://first.test")],
      services: [asClass(Scoped, { lifecycle: lifecycle.singleton() })],
    });
    const second = defineProviders({
      values: [asValue(WebhookUrl, "https://second.test")],
    });
    applyProviders(container, [first, second]);

    expect(await container.get(Scoped)).toBe(await container.get(Scoped));
    expect(await container.get(WebhookUrl)).toBe("https://second.test");
  });

  it("binds classes to a contract and qualifier", async () => {
    const container = silentContainer();
    applyProviders(container, {
      values: [asValue(WebhookUrl, "https://hooks.test")],
      services: [
        asClass(ConsoleNotifier, {
          provide: NotifierToken,
          lifecycle: lifecycle.singleton(),
        }),
        asClass(WebhookNotifier, {
          provide: NotifierToken,
          qualifier: "webhook",
          lifecycle: lifecycle.transient(),
          deps: [WebhookUrl],
        }),
      ],
    });

    const plain = await container.get(NotifierToken);
    const webhook = await container.get(Key.of(NotifierToken, "webhook"));
    expect(plain.notify("up")).toBe("console:up");
    expect(webhook.notify("up")).toBe("https://hooks.test:up");
  });

  it("binds factories with the resolver", async () => {
    const container = silentContainer();
    const Greeting = createToken<string>("greeting");
    applyProviders(container, {
      values: [asValue(WebhookUrl, "https://hooks.test")],
      factories: [
        asFactory(
          Greeting,
          async (resolver) => `posting to ${await resolver.get(WebhookUrl)}`,
          { lifecycle: lifecycle.singleton() },
        ),
      ],
    });
    expect(await container.get(Greeting)).toBe("posting to https://hooks.test");
  });

  it("appends multi elements in order", async () => {
    const container = silentContainer();
    const fixed: Notifier = { notify: (message) => `fixed:${message}` };
    applyProviders(container, {
      multi: [
        asMulti(Notifiers, ConsoleNotifier),
        asMulti(Notifiers, instanceProvider(fixed)),
      ],
    });

    const notifiers = await container.get(Notifiers);
    expect(notifiers.map((notifier) => notifier.notify("x"))).toEqual([
      "console:x",
      "fixed:x",
    ]);
  });

  it("collects set elements once across provider blocks", async () => {
    const container = silentContainer();
    const block = defineProviders({
      multi: [asMulti(Notifiers, ConsoleNotifier, { asSet: true })],
    });
    applyProviders(container, [block, block]);

    const binding = container.lookup(Notifiers);
    expect(binding?.kind === "multi" && binding.distinct).toBe(true);
    const notifiers = await container.get(Notifiers);
    expect(notifiers.map((notifier) => notifier.notify("x"))).toEqual([
      "console:x",
    ]);
  });

  it("registers lazy services that load classes on demand", async () => {
    const importer = vi.fn(async () => ({ default: WebhookNotifier }));
    const definition = defineProviders({
      values: [asValue(WebhookUrl, "https://lazy.test")],
      lazyServices: [
        asLazyClass(NotifierToken, importer, {
          lifecycle: lifecycle.singleton(),
          deps: deps(WebhookUrl),
        }),
      ],
    });

    const container = silentContainer();
    applyProviders(container, definition);
    expect(importer).not.toHaveBeenCalled();

    const instance = await container.get(NotifierToken);
    expect(instance).toBeInstanceOf(WebhookNotifier);
    expect(instance.notify("lazy")).toBe("https://lazy.test:lazy");
    expect(await container.get(NotifierToken)).toBe(instance);
    expect(importer).toHaveBeenCalledTimes(1);
  });

  it("rejects statically visible cycles before binding anything", () => {
    class CycleLeft {}
    class CycleRight {}
    const container = silentContainer();
    const defs = defineProviders({
      values: [asValue(WebhookUrl, "https://never.test")],
      services: [
        asClass(CycleLeft, { lifecycle: lifecycle.transient(), deps: [CycleRight] }),
        asClass(CycleRight, { lifecycle: lifecycle.transient(), deps: [CycleLeft] }),
      ],
    });

    expect(() => applyProviders(container, defs)).toThrow(
      new InvalidBindingError(
        "Circular provider dependency detected: CycleLeft -> CycleRight -> CycleLeft",
      ),
    );
    expect(container.lookup(WebhookUrl)).toBeUndefined();
  });

  it("does not eagerly evaluate thunk deps during cycle detection", () => {
    class A {}
    class B {}
    const thunk = vi.fn(() => [B]);

    const defs = defineProviders({
      services: [
        asClass(A, { lifecycle: lifecycle.transient(), deps: thunk }),
        asClass(B, { lifecycle: lifecycle.transient(), deps: [A] }),
      ],
    });

    expect(() => applyProviders(silentContainer(), defs)).not.toThrow();
    expect(thunk).not.toHaveBeenCalled();
  });

  it("ignores provider getters when looking for cycles", () => {
    class Parent {}
    class Child {}
    expect(() =>
      detectProviderCycles([
        { key: Key.of(Parent), deps: [providerOf(Child)] },
        { key: Key.of(Child), deps: [Parent] },
      ]),
    ).not.toThrow();
  });
});
