import { Inject, optional } from "graphwire/runtime";
import { AuditLog } from "./audit-log";
import { QuietHoursPolicy } from "./tokens";
import type { QuietHours } from "./tokens";

/** Created by the host UI; its fields are filled with `container.injectMembers`. */
export class NotificationPanel {
  @Inject(AuditLog) audit?: AuditLog;
  @Inject(optional(QuietHoursPolicy)) quietHours?: QuietHours;

  summary(): string[] {
    return (this.audit?.list() ?? []).map(
      (entry) => `${entry.event}: ${entry.detail}`,
    );
  }

  isMuted(at: Date): boolean {
    return this.quietHours?.isQuiet(at) ?? false;
  }
}
