// src/modules/otp/service.ts
// ============================================================================
// OTP-Anfrage per SMS
// ----------------------------------------------------------------------------
// - Bekannte Nummer: Cooldown pruefen, Code erzeugen, zustellen
// - Unbekannte Nummer: Signup mit Zufallspasswort in derselben Transaktion
// - SMS-Auto-Confirm: Nummer sofort bestaetigen, kein Secret, kein Versand
// - Paralleler Erstkontakt: der Verlierer des INSERT wird einmal als
//   bekannte Nummer wiederholt (→ Cooldown greift)
// ============================================================================

import { generatePassword } from "../../libs/crypto.js";
import { AlreadyRegisteredError, ValidationError } from "../../libs/errors.js";
import { normalizePhone, validatePhoneFormat } from "../../libs/otp.js";
import { maskPhoneForLog } from "../../libs/pii.js";
import { autoConfirmChannel, reserveChannel, sendPhoneConfirmation } from "../signup/confirmation.js";
import { prepareSignup, runSignupSteps } from "../signup/service.js";
import type { SignupDeps } from "../signup/types.js";
import type { OtpRequestInput, OtpRequestOutcome } from "./types.js";

type OtpTarget = {
  tenantId: string;
  aud: string;
  phone: string;
  email?: string;
  data?: Record<string, unknown>;
};

function runOtpRequest(deps: SignupDeps, target: OtpTarget): Promise<OtpRequestOutcome> {
  return deps.uow.run(target.tenantId, async (tx) => {
    const existing = await tx.users.findByPhone(target.phone, target.aud);

    if (!existing.found) {
      const params = prepareSignup(
        deps.config,
        {
          tenantId: target.tenantId,
          aud: target.aud,
          phone: target.phone,
          email: target.email,
          password: generatePassword(),
          data: target.data,
        },
        "phone",
      );
      const outcome = await runSignupSteps(tx, deps, params);
      return { registered: true, issued: outcome.issued };
    }

    const user = existing.row;
    const now = deps.now();

    if (deps.config.autoconfirm.phone) {
      if (user.phone_confirmed_at === null) {
        await autoConfirmChannel(tx, deps, user, "phone", now);
      }
      return { registered: false, issued: [] };
    }

    const reservation = await reserveChannel(tx, deps, user, "phone", target.phone, now);
    await sendPhoneConfirmation(tx, deps, user, target.phone, reservation, now);
    return { registered: false, issued: ["phone"] };
  });
}

export async function requestSmsOtp(
  deps: SignupDeps,
  input: OtpRequestInput,
): Promise<OtpRequestOutcome> {
  if (input.type !== "sms") {
    throw new ValidationError(
      `Unsupported otp type: ${input.type ?? "(missing)"}`,
      "UNSUPPORTED_OTP_TYPE",
    );
  }

  const phone = normalizePhone(input.phone);
  if (!validatePhoneFormat(phone)) {
    throw new ValidationError("Invalid phone number format (E.164 required)");
  }

  const target: OtpTarget = {
    tenantId: input.tenantId,
    aud: input.aud?.trim() || deps.config.defaultAudience,
    phone,
    email: input.email,
    data: input.data,
  };

  try {
    return await runOtpRequest(deps, target);
  } catch (err) {
    if (!(err instanceof AlreadyRegisteredError) || err.channel !== "phone") throw err;

    // Nummer wurde zwischen findByPhone und INSERT parallel angelegt
    deps.log.info({ phone: maskPhoneForLog(phone) }, "otp_signup_race_retry");
    return runOtpRequest(deps, target);
  }
}
