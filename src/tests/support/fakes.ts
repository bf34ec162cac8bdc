// Test-Doubles fuer Delivery-Gateways und Uhr

import type { Channel, DeliveryGateway, DeliveryMessage } from "../../libs/delivery.js";

export type SentMessage = { destination: string; message: DeliveryMessage };

export class RecordingGateway implements DeliveryGateway {
  readonly sent: SentMessage[] = [];
  failWith: Error | null = null;
  /** true: send() haengt, bis das AbortSignal feuert */
  hang = false;

  constructor(readonly channel: Channel) {}

  async send(destination: string, message: DeliveryMessage, signal: AbortSignal): Promise<void> {
    if (this.hang) {
      await new Promise<void>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    if (this.failWith) throw this.failWith;
    this.sent.push({ destination, message });
  }
}

export class TestClock {
  constructor(private current: Date) {}

  now = (): Date => new Date(this.current.getTime());

  advance(seconds: number) {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}
