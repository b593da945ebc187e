import { deps, Injectable } from "graphwire/runtime";
import { SenderAddress, SmsGatewayUrl } from "./tokens";
import type { Channel, DeliveryReceipt, Notification } from "./tokens";

@Injectable(deps(SenderAddress))
export class EmailChannel implements Channel {
  constructor(private readonly from: string) {}

  async send(notification: Notification): Promise<DeliveryReceipt> {
    return { channel: `email:${this.from}`, recipient: notification.recipient };
  }
}

@Injectable(deps(SmsGatewayUrl))
export class SmsChannel implements Channel {
  private readonly gateway: URL;

  constructor(gatewayUrl: string) {
    this.gateway = new URL(gatewayUrl);
  }

  async send(notification: Notification): Promise<DeliveryReceipt> {
    return {
      channel: `sms:${this.gateway.host}`,
      recipient: notification.recipient,
    };
  }
}

export function describeReceipt(receipt: DeliveryReceipt): string {
  return `${receipt.channel} -> ${receipt.recipient}`;
}
