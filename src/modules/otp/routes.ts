// src/modules/otp/routes.ts
// ============================================================================
// OTP-Routen
// ----------------------------------------------------------------------------
// POST /auth/otp  { type: "sms", phone, email?, data? }  → {}
// Fehlender oder anderer type → 422 UNSUPPORTED_OTP_TYPE
// Die Antwort verraet nicht, ob der Nutzer neu angelegt wurde.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { sendApiError } from "../../libs/error-response.js";
import { recordOtpIssued } from "../../libs/metrics.js";
import { maskPhoneForLog } from "../../libs/pii.js";
import type { SignupDeps } from "../signup/types.js";
import { requestSmsOtp } from "./service.js";

const OtpRequestBody = z.object({
  type: z.string().optional(),
  phone: z.string().min(1).max(32),
  email: z.string().max(255).optional(),
  data: z.record(z.unknown()).optional(),
});

export default async function otpRoutes(app: FastifyInstance, opts: { deps: SignupDeps }) {
  // /auth/otp
  app.post("/otp", { config: { tenant: true } }, async (req, reply) => {
    const parse = OtpRequestBody.safeParse(req.body);
    if (!parse.success) {
      return sendApiError(reply, 422, "INVALID_FORMAT", "Invalid otp request payload.", parse.error.flatten());
    }

    const tenantId = req.requestedTenantId;
    if (!tenantId) {
      return sendApiError(reply, 400, "INVALID_FORMAT", "Tenant context not set.");
    }

    const outcome = await requestSmsOtp(opts.deps, {
      tenantId,
      aud: req.audience,
      ...parse.data,
    });

    for (const channel of outcome.issued) recordOtpIssued(channel);
    req.log.info(
      { phone: maskPhoneForLog(parse.data.phone), registered: outcome.registered },
      "otp_requested",
    );

    return reply.send({});
  });
}
