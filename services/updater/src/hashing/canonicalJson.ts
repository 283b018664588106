import { createHash } from "node:crypto";
import { APP_ID_LENGTH } from "../config/constants.js";
import type { JsonValue } from "../utils/json.js";

/**
 * Compact JSON with every object's keys in code-unit order. Written out by hand:
 * a JS object would hoist integer-like keys ("9", "10") ahead of the rest.
 */
export function canonicalStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalStringify(item)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const members = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalStringify(value[key])}`);
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value);
}

/** Throws on malformed input. */
export function canonicalize(json: string): string {
  const parsed: JsonValue = JSON.parse(json);
  return canonicalStringify(parsed);
}

/**
 * SHA-256 over the canonical manifest, a NUL separator and the image reference.
 * The image takes part so that an image bump alone forces a new VM.
 *
 * Malformed JSON is hashed as-is; equivalent malformed inputs may then hash differently.
 */
export function computeComposeHash(serializedManifest: string, image: string): string {
  let normalized: string;
  try {
    normalized = canonicalize(serializedManifest);
  } catch {
    normalized = serializedManifest;
  }
  return createHash("sha256").update(normalized, "utf-8").update("\0").update(image, "utf-8").digest("hex");
}

export function truncateAppId(hashOrAppId: string): string {
  return hashOrAppId.slice(0, APP_ID_LENGTH);
}
