// src/libs/sms.ts
// ============================================================================
// SMS-Versand
// ----------------------------------------------------------------------------
// Provider (SMS_PROVIDER):
// - console: Nachricht nur ins Log, in production verboten
// - twilio:  Twilio Messages API per axios (Basic Auth, form-encoded)
// ============================================================================

import axios from "axios";
import type { DeliveryGateway } from "./delivery.js";
import { ConfigurationError } from "./errors.js";
import type { Env } from "./env.js";
import type { Logger } from "./logger.js";

const TWILIO_API_BASE = "https://api.twilio.com/2010-04-01";

export type SmsProviderConfig =
  | { provider: "console" }
  | {
      provider: "twilio";
      accountSid: string;
      authToken: string;
      messageServiceSid?: string;
    };

export function smsConfigFromEnv(source: Env): SmsProviderConfig {
  if (source.SMS_PROVIDER === "console") return { provider: "console" };

  if (!source.TWILIO_ACCOUNT_SID || !source.TWILIO_AUTH_TOKEN) {
    throw new ConfigurationError("Twilio is not configured (TWILIO_ACCOUNT_SID / TWILIO_AUTH_TOKEN)");
  }
  return {
    provider: "twilio",
    accountSid: source.TWILIO_ACCOUNT_SID,
    authToken: source.TWILIO_AUTH_TOKEN,
    messageServiceSid: source.TWILIO_MESSAGE_SERVICE_SID,
  };
}

export function createSmsGateway(
  config: SmsProviderConfig,
  log: Logger,
  nodeEnv: Env["NODE_ENV"],
): DeliveryGateway {
  if (config.provider === "console") {
    if (nodeEnv === "production") {
      throw new ConfigurationError("SMS_PROVIDER=console is not allowed in production");
    }
    return {
      channel: "phone",
      async send(destination, message) {
        log.info({ to: destination, body: message.text }, "sms_console_delivery");
      },
    };
  }

  const url = `${TWILIO_API_BASE}/Accounts/${encodeURIComponent(config.accountSid)}/Messages.json`;

  return {
    channel: "phone",
    async send(destination, message, signal) {
      const form = new URLSearchParams();
      form.append("To", `+${destination}`);
      form.append("Body", message.text);
      if (config.messageServiceSid) {
        form.append("MessagingServiceSid", config.messageServiceSid);
      }

      await axios.post(url, form, {
        auth: { username: config.accountSid, password: config.authToken },
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        signal,
      });
    },
  };
}
