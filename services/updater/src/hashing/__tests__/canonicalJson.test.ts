import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { canonicalStringify, canonicalize, computeComposeHash, truncateAppId } from "../canonicalJson.js";

function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

describe("canonicalize", () => {
  it("sorts keys at every depth and keeps array order", () => {
    const input = '{"b":1,"a":{"d":[3,{"z":1,"y":2}],"c":null}}';
    expect(canonicalize(input)).toBe('{"a":{"c":null,"d":[3,{"y":2,"z":1}]},"b":1}');
  });

  it("drops insignificant whitespace", () => {
    expect(canonicalize('{ "k" : [ 1 , 2 ] }')).toBe('{"k":[1,2]}');
  });

  it("writes scalars as plain JSON", () => {
    expect(canonicalStringify("x")).toBe('"x"');
    expect(canonicalStringify(7)).toBe("7");
    expect(canonicalStringify(null)).toBe("null");
    expect(canonicalStringify(false)).toBe("false");
  });

  it("orders integer-like keys as strings", () => {
    expect(canonicalize('{"b":1,"10":2,"9":3}')).toBe('{"10":2,"9":3,"b":1}');
    expect(canonicalize('{"x":{"2":"two","10":"ten","a":[{"1":1,"01":0}]}}')).toBe(
      '{"x":{"10":"ten","2":"two","a":[{"01":0,"1":1}]}}'
    );
  });

  it("escapes keys and strings the way JSON.stringify does", () => {
    expect(canonicalize('{"q\\"":"line\\nbreak","\\u00e9":"é"}')).toBe('{"q\\"":"line\\nbreak","é":"é"}');
  });

  it("throws on malformed JSON", () => {
    expect(() => canonicalize("{not json")).toThrow();
  });
});

describe("computeComposeHash", () => {
  it("is independent of key order", () => {
    const a = JSON.stringify({ name: "vm", flags: { kms: true, gateway: false }, allowed_envs: ["A", "B"] });
    const b = JSON.stringify({ allowed_envs: ["A", "B"], flags: { gateway: false, kms: true }, name: "vm" });
    expect(computeComposeHash(a, "img-1")).toBe(computeComposeHash(b, "img-1"));
  });

  it("hashes canonical JSON, a NUL separator and the image", () => {
    const manifest = '{"runner":"docker-compose","name":"vm"}';
    expect(computeComposeHash(manifest, "img-1")).toBe(sha256Hex('{"name":"vm","runner":"docker-compose"}\0img-1'));
  });

  it("changes when only the image changes", () => {
    const manifest = '{"name":"vm"}';
    expect(computeComposeHash(manifest, "img-1")).not.toBe(computeComposeHash(manifest, "img-2"));
  });

  it("changes when a value changes", () => {
    expect(computeComposeHash('{"allowed_envs":["A"]}', "img")).not.toBe(
      computeComposeHash('{"allowed_envs":["A","B"]}', "img")
    );
  });

  it("treats array order as significant", () => {
    expect(computeComposeHash('{"k":[1,2]}', "img")).not.toBe(computeComposeHash('{"k":[2,1]}', "img"));
  });

  it("falls back to the raw text for malformed JSON", () => {
    expect(computeComposeHash("{not json", "img")).toBe(sha256Hex("{not json\0img"));
  });

  it("produces 64 lowercase hex characters", () => {
    expect(computeComposeHash("{}", "")).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("truncateAppId", () => {
  it("keeps the first 40 characters", () => {
    const hash = "0123456789abcdef".repeat(4);
    expect(truncateAppId(hash)).toBe(hash.slice(0, 40));
    expect(truncateAppId(hash)).toHaveLength(40);
  });

  it("returns shorter values unchanged", () => {
    expect(truncateAppId("abc")).toBe("abc");
  });
});
