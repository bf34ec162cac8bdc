// src/libs/secret-cipher.ts
// ============================================================================
// Symmetrische Verschluesselung fuer OTP-Secrets (AES-256-GCM)
// ----------------------------------------------------------------------------
// Format:  nonce (12 Byte) || ciphertext || auth-tag (16 Byte)
//
// Schluesselableitung (key_version = 1):
// - Die Passphrase wird direkt als 32-Byte-Schluessel verwendet (UTF-8).
// - Es gibt KEINE zweite Ableitung (z. B. MD5) – ein Wechsel braucht eine
//   neue key_version + Migration der Bestandsdaten.
//
// Die Passphrase wird einmal beim Start uebergeben (kein env-Zugriff hier).
// ============================================================================

import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { ConfigurationError, CryptoError } from "./errors.js";

const ALGORITHM = "aes-256-gcm";
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
export const KEY_LENGTH = 32;
export const CURRENT_KEY_VERSION = 1;

export interface SecretCipher {
  readonly keyVersion: number;
  encrypt(plaintext: Uint8Array | string): Buffer;
  decrypt(blob: Uint8Array, keyVersion?: number): Buffer;
}

function deriveKey(passphrase: string | undefined): Buffer {
  if (!passphrase) {
    throw new ConfigurationError("Secret passphrase is not configured");
  }
  const key = Buffer.from(passphrase, "utf8");
  if (key.length !== KEY_LENGTH) {
    throw new ConfigurationError(
      `Secret passphrase must be exactly ${KEY_LENGTH} bytes (got ${key.length})`,
    );
  }
  return key;
}

export function createSecretCipher(opts: { passphrase: string | undefined }): SecretCipher {
  const key = deriveKey(opts.passphrase);

  return {
    keyVersion: CURRENT_KEY_VERSION,

    encrypt(plaintext) {
      const input =
        typeof plaintext === "string" ? Buffer.from(plaintext, "utf8") : Buffer.from(plaintext);

      try {
        const nonce = randomBytes(NONCE_LENGTH);
        const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
        const body = Buffer.concat([cipher.update(input), cipher.final()]);
        return Buffer.concat([nonce, body, cipher.getAuthTag()]);
      } catch (err) {
        throw new CryptoError("Secret encryption failed", { cause: err });
      }
    },

    decrypt(blob, keyVersion = CURRENT_KEY_VERSION) {
      if (keyVersion !== CURRENT_KEY_VERSION) {
        throw new CryptoError(`Unsupported secret key version: ${keyVersion}`);
      }
      const data = Buffer.from(blob);
      if (data.length < NONCE_LENGTH + TAG_LENGTH) {
        throw new CryptoError("Encrypted secret is truncated");
      }

      const nonce = data.subarray(0, NONCE_LENGTH);
      const tag = data.subarray(data.length - TAG_LENGTH);
      const body = data.subarray(NONCE_LENGTH, data.length - TAG_LENGTH);

      try {
        const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
        decipher.setAuthTag(tag);
        return Buffer.concat([decipher.update(body), decipher.final()]);
      } catch (err) {
        throw new CryptoError("Secret decryption failed", { cause: err });
      }
    },
  };
}
