import { describe, expect, it } from "vitest";
import { asValue, defineProviders } from "graphwire/runtime";
import { EmailChannel, SmsChannel } from "./channels";
import {
  AuditLog,
  Channels,
  Clock,
  createNotificationsContainer,
  NotificationPanel,
  NotificationService,
  QuietHoursPolicy,
  SenderAddress,
} from "./index";
import type { Notification } from "./index";

const fixedNow = new Date("2026-03-01T09:30:00Z");
const fixedClock = defineProviders({
  values: [asValue(Clock, () => fixedNow)],
});

const outage: Notification = {
  recipient: "ops@example.com",
  subject: "Disk full",
  body: "Volume /var is at 98%.",
};

const deliveredDetail =
  "email:alerts@example.com -> ops@example.com; sms:sms.example.com -> ops@example.com";

function createContainer() {
  return createNotificationsContainer({ logLevel: "silent" }, [fixedClock]);
}

describe("notifications module", () => {
  it("collects the discovered channels", async () => {
    const channels = await createContainer().get(Channels);
    expect(channels).toHaveLength(2);
    expect(channels[0]).toBeInstanceOf(EmailChannel);
    expect(channels[1]).toBeInstanceOf(SmsChannel);
  });

  it("delivers through every channel and records the outcome", async () => {
    const container = createContainer();
    const service = await container.get(NotificationService);

    expect(await service.notify(outage)).toEqual([
      { channel: "email:alerts@example.com", recipient: "ops@example.com" },
      { channel: "sms:sms.example.com", recipient: "ops@example.com" },
    ]);
    expect((await container.get(AuditLog)).list()).toEqual([
      { at: fixedNow, event: "delivered", detail: deliveredDetail },
    ]);
  });

  it("pages the on-call rotation for urgent notifications", async () => {
    const container = createContainer();
    const service = await container.get(NotificationService);

    await service.notify({ ...outage, urgent: true });

    const entries = (await container.get(AuditLog)).list();
    expect(entries.map((entry) => entry.event)).toEqual([
      "delivered",
      "escalated",
    ]);
    expect(entries[1]?.detail).toBe("paged platform-primary about Disk full");
  });

  it("defers non-urgent notifications during quiet hours", async () => {
    const container = createContainer();
    container.registerInstance(QuietHoursPolicy, { isQuiet: () => true });
    const service = await container.get(NotificationService);

    expect(await service.notify(outage)).toEqual([]);
    expect(await service.notify({ ...outage, urgent: true })).toHaveLength(2);
    expect(
      (await container.get(AuditLog)).list().map((entry) => entry.event),
    ).toEqual(["deferred", "delivered", "escalated"]);
  });

  it("fills panel members from the container", async () => {
    const container = createContainer();
    await (await container.get(NotificationService)).notify(outage);

    const panel = await container.injectMembers(new NotificationPanel());

    expect(panel.audit).toBe(await container.get(AuditLog));
    expect(panel.summary()).toEqual([`delivered: ${deliveredDetail}`]);
    expect(panel.isMuted(fixedNow)).toBe(false);
  });

  it("lets host providers replace the defaults", async () => {
    const container = createNotificationsContainer({ logLevel: "silent" }, [
      fixedClock,
      defineProviders({ values: [asValue(SenderAddress, "noreply@example.org")] }),
    ]);
    const [email] = await (await container.get(NotificationService)).notify(
      outage,
    );
    expect(email).toEqual({
      channel: "email:noreply@example.org",
      recipient: "ops@example.com",
    });
  });
});
