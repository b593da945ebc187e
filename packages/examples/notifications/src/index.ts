import {
  applyDiscovered,
  applyProviders,
  Container,
  discoverImplementations,
} from "graphwire/runtime";
import type { ContainerOptions, ProviderDefinitions } from "graphwire/runtime";
import * as channels from "./channels";
import defaultProviders from "./providers";
import { ChannelContract, Channels } from "./tokens";

export { AuditLog } from "./audit-log";
export type { AuditEntry } from "./audit-log";
export { NotificationPanel } from "./notification-panel";
export { NotificationService } from "./notification-service";
export * from "./tokens";

/**
 * Bind the notifications module into `container`: default providers, then
 * `extra` blocks, then every `*Channel` class exported from `./channels`
 * appended to {@link Channels}.
 */
export function registerNotifications(
  container: Container,
  extra: ProviderDefinitions[] = [],
): void {
  applyProviders(container, [defaultProviders, ...extra]);
  applyDiscovered(
    container,
    discoverImplementations(channels, {
      contract: ChannelContract,
      pattern: "*Channel",
    }),
    { into: Channels },
  );
}

export function createNotificationsContainer(
  options: ContainerOptions = {},
  extra: ProviderDefinitions[] = [],
): Container {
  const container = new Container({ name: "notifications", ...options });
  registerNotifications(container, extra);
  return container;
}
