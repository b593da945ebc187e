import type { Notification, Pager } from "./tokens";

/** Loaded on the first urgent notification. */
export class OnCallPager implements Pager {
  constructor(private readonly rotation: string) {}

  async page(notification: Notification): Promise<string> {
    return `paged ${this.rotation} about ${notification.subject}`;
  }
}
