import { createCipheriv, createPublicKey, diffieHellman, generateKeyPairSync, randomBytes, type KeyObject } from "node:crypto";
import { CryptoError, errorMessage } from "../errors/updaterErrors.js";
import type { EnvelopeEncryptor } from "../types/interfaces.js";

export const X25519_KEY_BYTES = 32;
export const NONCE_BYTES = 12;
export const GCM_TAG_BYTES = 16;

const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;

export function decodePublicKeyHex(publicKeyHex: string): Buffer {
  const hex = publicKeyHex.startsWith("0x") ? publicKeyHex.slice(2) : publicKeyHex;
  if (!HEX_RE.test(hex)) {
    throw new CryptoError("Failed to decode public key hex");
  }
  const bytes = Buffer.from(hex, "hex");
  if (bytes.length !== X25519_KEY_BYTES) {
    throw new CryptoError(`Invalid public key length: expected ${X25519_KEY_BYTES} bytes, got ${bytes.length}`);
  }
  return bytes;
}

export function x25519PublicKeyFromRaw(raw: Buffer): KeyObject {
  return createPublicKey({ key: { kty: "OKP", crv: "X25519", x: raw.toString("base64url") }, format: "jwk" });
}

export function x25519PublicKeyToRaw(key: KeyObject): Buffer {
  const { x } = key.export({ format: "jwk" });
  if (!x) {
    throw new CryptoError("X25519 public key export did not include the key bytes");
  }
  return Buffer.from(x, "base64url");
}

/**
 * Seals `{"env": <payloadJson>}` for the holder of `remotePublicKeyHex`.
 *
 * Output (hex): ephemeral X25519 public key (32) | nonce (12) | AES-256-GCM ciphertext | tag (16).
 * The raw X25519 shared secret is the AES key; there is no KDF step, and the
 * VMM side decrypts on that assumption.
 */
export function encryptEnv(payloadJson: string, remotePublicKeyHex: string): string {
  const remoteRaw = decodePublicKeyHex(remotePublicKeyHex);

  try {
    const remoteKey = x25519PublicKeyFromRaw(remoteRaw);
    const ephemeral = generateKeyPairSync("x25519");
    const sharedSecret = diffieHellman({ privateKey: ephemeral.privateKey, publicKey: remoteKey });

    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv("aes-256-gcm", sharedSecret, nonce);
    const plaintext = Buffer.from(`{"env":${payloadJson}}`, "utf-8");
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final(), cipher.getAuthTag()]);

    return Buffer.concat([x25519PublicKeyToRaw(ephemeral.publicKey), nonce, ciphertext]).toString("hex");
  } catch (err) {
    if (err instanceof CryptoError) throw err;
    throw new CryptoError(`Encryption failed: ${errorMessage(err)}`, { cause: err });
  }
}

export const envelopeEncryptor: EnvelopeEncryptor = {
  encrypt: encryptEnv
};
