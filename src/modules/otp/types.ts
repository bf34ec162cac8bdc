// src/modules/otp/types.ts
// ============================================================================
// Typen fuer /auth/otp
// ============================================================================

import type { Channel } from "../../libs/delivery.js";

export type OtpRequestInput = {
  tenantId: string;
  aud?: string;
  /** nur "sms" wird unterstuetzt */
  type?: string;
  phone: string;
  email?: string;
  data?: Record<string, unknown>;
};

export type OtpRequestOutcome = {
  /** true, wenn der Nutzer mit dieser Anfrage erst angelegt wurde */
  registered: boolean;
  issued: Channel[];
};
