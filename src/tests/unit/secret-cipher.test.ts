import { describe, expect, it } from "vitest";
import { ConfigurationError, CryptoError } from "../../libs/errors.js";
import {
  CURRENT_KEY_VERSION,
  NONCE_LENGTH,
  TAG_LENGTH,
  createSecretCipher,
} from "../../libs/secret-cipher.js";

const PASSPHRASE = "test-passphrase-0123456789abcdef";

describe("secret cipher", () => {
  const cipher = createSecretCipher({ passphrase: PASSPHRASE });

  it("decrypts what it encrypted", () => {
    const blob = cipher.encrypt("otpauth://totp/test:alice?secret=ABC");

    expect(cipher.decrypt(blob).toString("utf8")).toBe("otpauth://totp/test:alice?secret=ABC");
  });

  it("handles empty plaintext", () => {
    const blob = cipher.encrypt(new Uint8Array(0));

    expect(blob.length).toBe(NONCE_LENGTH + TAG_LENGTH);
    expect(cipher.decrypt(blob).length).toBe(0);
  });

  it("uses a fresh nonce per encryption", () => {
    const a = cipher.encrypt("same input");
    const b = cipher.encrypt("same input");

    expect(a.subarray(0, NONCE_LENGTH).equals(b.subarray(0, NONCE_LENGTH))).toBe(false);
    expect(a.equals(b)).toBe(false);
  });

  it("never stores the plaintext verbatim", () => {
    const blob = cipher.encrypt("plain-secret-value");

    expect(blob.includes(Buffer.from("plain-secret-value"))).toBe(false);
  });

  it("rejects a blob encrypted with another passphrase", () => {
    const other = createSecretCipher({ passphrase: "other-passphrase-0123456789abcde" });
    const blob = other.encrypt("secret");

    expect(() => cipher.decrypt(blob)).toThrow(CryptoError);
  });

  it("rejects a tampered ciphertext", () => {
    const blob = cipher.encrypt("secret");
    blob[NONCE_LENGTH] = blob[NONCE_LENGTH] ^ 0xff;

    expect(() => cipher.decrypt(blob)).toThrow(CryptoError);
  });

  it("rejects a truncated blob", () => {
    expect(() => cipher.decrypt(Buffer.alloc(NONCE_LENGTH + TAG_LENGTH - 1))).toThrow(
      "Encrypted secret is truncated",
    );
  });

  it("rejects unknown key versions", () => {
    const blob = cipher.encrypt("secret");

    expect(cipher.keyVersion).toBe(CURRENT_KEY_VERSION);
    expect(() => cipher.decrypt(blob, CURRENT_KEY_VERSION + 1)).toThrow(
      "Unsupported secret key version: 2",
    );
  });

  it("requires a 32-byte passphrase", () => {
    expect(() => createSecretCipher({ passphrase: "too-short" })).toThrow(ConfigurationError);
    expect(() => createSecretCipher({ passphrase: undefined })).toThrow(
      "Secret passphrase is not configured",
    );
  });
});
