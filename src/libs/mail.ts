// src/libs/mail.ts
// ============================================================================
// SMTP-Integration (nodemailer)
// ----------------------------------------------------------------------------
// - Transport aus env.ts (SMTP_*), Mailpit im Dev-Setup
// - createMailGateway(): DeliveryGateway fuer den Kanal "email"
// - Healthcheck via transporter.verify()
// ============================================================================

import nodemailer from "nodemailer";
import type { DeliveryGateway } from "./delivery.js";
import type { Env } from "./env.js";

export type MailSender = {
  sendMail(options: {
    from: string;
    to: string;
    subject: string;
    text: string;
    html?: string;
  }): Promise<unknown>;
  verify(): Promise<unknown>;
};

export function createMailTransport(source: Env): MailSender {
  return nodemailer.createTransport({
    host: source.SMTP_HOST,
    port: source.SMTP_PORT,
    secure: source.SMTP_SECURE,
    auth:
      source.SMTP_USER && source.SMTP_PASS
        ? {
            user: source.SMTP_USER,
            pass: source.SMTP_PASS,
          }
        : undefined,
  });
}

export function createMailGateway(transport: MailSender, from: string): DeliveryGateway {
  return {
    channel: "email",
    async send(destination, message) {
      // nodemailer kennt kein AbortSignal; die Deadline greift in deliverWithDeadline()
      await transport.sendMail({
        from,
        to: destination,
        subject: message.subject,
        text: message.text,
        ...(message.html ? { html: message.html } : {}),
      });
    },
  };
}

// Health-Check für /health
export async function mailHealth(transport: MailSender): Promise<{
  ok: boolean;
  reason?: string;
}> {
  try {
    await transport.verify();
    return { ok: true };
  } catch (err: unknown) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : "smtp_verify_failed",
    };
  }
}
