// src/libs/delivery.ts
// ============================================================================
// Delivery-Gateway (E-Mail / SMS)
// ----------------------------------------------------------------------------
// - Ein Gateway pro Kanal, Implementierungen in libs/mail.ts & libs/sms.ts
// - Jeder Versand laeuft gegen eine Deadline; Ablauf → DeliveryError
// - Versand wird nie automatisch wiederholt
// ============================================================================

import { DeliveryError } from "./errors.js";

export type Channel = "email" | "phone";

export type DeliveryMessage = {
  subject: string;
  text: string;
  html?: string;
};

export interface DeliveryGateway {
  readonly channel: Channel;
  send(destination: string, message: DeliveryMessage, signal: AbortSignal): Promise<void>;
}

export async function deliverWithDeadline(
  gateway: DeliveryGateway,
  destination: string,
  message: DeliveryMessage,
  deadlineMs: number,
): Promise<void> {
  const controller = new AbortController();
  const timeout = new DeliveryError(
    gateway.channel,
    `${gateway.channel} delivery timed out after ${deadlineMs}ms`,
  );
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(timeout);
      controller.abort();
    }, deadlineMs);
  });

  try {
    await Promise.race([gateway.send(destination, message, controller.signal), deadline]);
  } catch (err) {
    // Provider bricht nach abort() evtl. mit eigenem Fehler ab
    if (controller.signal.aborted) throw timeout;
    if (err instanceof DeliveryError) throw err;
    throw new DeliveryError(gateway.channel, `${gateway.channel} delivery failed`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}
