// src/libs/pii.ts
// PII nie im Klartext in Logs/Events: nur Hashes bzw. maskierte Werte.
import { createHash } from "node:crypto";

export function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

export function hashEmailForLog(email: string): string {
  return sha256(email.trim().toLowerCase());
}

export function maskPhoneForLog(phone: string): string {
  return phone.length <= 4 ? "****" : `${"*".repeat(phone.length - 4)}${phone.slice(-4)}`;
}
