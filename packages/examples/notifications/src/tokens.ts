import { createToken } from "graphwire/runtime";

export interface Notification {
  recipient: string;
  subject: string;
  body: string;
  /** Urgent notifications ignore quiet hours and page the on-call rotation. */
  urgent?: boolean;
}

export interface DeliveryReceipt {
  channel: string;
  recipient: string;
}

export interface Channel {
  send(notification: Notification): Promise<DeliveryReceipt>;
}

export interface Pager {
  page(notification: Notification): Promise<string>;
}

export interface QuietHours {
  isQuiet(at: Date): boolean;
}

/** Contract every discovered channel class must satisfy. */
export const ChannelContract = createToken<Channel>("Channel", {
  capabilities: ["send"],
});

/** Every registered channel, in registration order. */
export const Channels = createToken<Channel[]>("Channels", {
  capabilities: ["send"],
});

export const SenderAddress = createToken<string>("SenderAddress");
export const SmsGatewayUrl = createToken<string>("SmsGatewayUrl");
export const OnCallRotation = createToken<string>("OnCallRotation");
export const Clock = createToken<() => Date>("Clock");

export const QuietHoursPolicy = createToken<QuietHours>("QuietHours", {
  capabilities: ["isQuiet"],
});

export const Escalation = createToken<Pager>("Escalation", {
  capabilities: ["page"],
});
