import { deps, optional, providerOf, Singleton } from "graphwire/runtime";
import { AuditLog } from "./audit-log";
import { describeReceipt } from "./channels";
import { Channels, Clock, Escalation, QuietHoursPolicy } from "./tokens";
import type {
  Channel,
  DeliveryReceipt,
  Notification,
  Pager,
  QuietHours,
} from "./tokens";

/**
 * Fans a notification out to every channel and records the outcome.
 *
 * Quiet hours are optional: without a policy bound, nothing is deferred.
 * The pager is requested through a provider so its module only loads when
 * something urgent happens.
 */
@Singleton(
  deps(
    Channels,
    AuditLog,
    Clock,
    optional(QuietHoursPolicy),
    providerOf(Escalation),
  ),
)
export class NotificationService {
  constructor(
    private readonly channels: Channel[],
    private readonly audit: AuditLog,
    private readonly now: () => Date,
    private readonly quietHours: QuietHours | undefined,
    private readonly pager: () => Promise<Pager>,
  ) {}

  async notify(notification: Notification): Promise<DeliveryReceipt[]> {
    if (!notification.urgent && this.quietHours?.isQuiet(this.now())) {
      this.audit.record("deferred", notification.recipient);
      return [];
    }

    const receipts: DeliveryReceipt[] = [];
    for (const channel of this.channels) {
      receipts.push(await channel.send(notification));
    }
    this.audit.record("delivered", receipts.map(describeReceipt).join("; "));

    if (notification.urgent) {
      const pager = await this.pager();
      this.audit.record("escalated", await pager.page(notification));
    }
    return receipts;
  }
}
