/**
 * In-process stand-in for a NATS connection as the endpoint uses it.
 */

import { decodeMessage, encodeMessage } from "@planwire/core";
import type { EndpointConnection, EndpointMessage, EndpointSubscription } from "./endpoint.js";

export class FakeSubscription implements EndpointSubscription {
  private readonly pending: EndpointMessage[] = [];
  private waiting?: (result: IteratorResult<EndpointMessage>) => void;
  private drained = false;

  constructor(
    readonly subject: string,
    readonly queue?: string
  ) {}

  /** Deliver a request and resolve with the decoded reply. */
  request(body: unknown): Promise<unknown> {
    return new Promise((resolve) => {
      this.deliver({
        data: typeof body === "string" ? new TextEncoder().encode(body) : encodeMessage(body),
        reply: "_INBOX.test",
        respond: (data) => {
          resolve(decodeMessage(data ?? new Uint8Array(0)));
          return true;
        },
      });
    });
  }

  async drain(): Promise<void> {
    this.drained = true;
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterator<EndpointMessage> {
    return {
      next: async (): Promise<IteratorResult<EndpointMessage>> => {
        const message = this.pending.shift();
        if (message) return { value: message, done: false };
        if (this.drained) return { value: undefined, done: true };
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
    };
  }

  private deliver(message: EndpointMessage): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting({ value: message, done: false });
    } else {
      this.pending.push(message);
    }
  }
}

export class FakeEndpointConnection implements EndpointConnection {
  readonly subscriptions: FakeSubscription[] = [];
  drained = false;

  subscribe(subject: string, opts: { queue?: string } = {}): FakeSubscription {
    const subscription = new FakeSubscription(subject, opts.queue);
    this.subscriptions.push(subscription);
    return subscription;
  }

  on(subject: string): FakeSubscription[] {
    return this.subscriptions.filter((subscription) => subscription.subject === subject);
  }

  async drain(): Promise<void> {
    this.drained = true;
  }
}
