import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, ProtocolError } from "../../errors/updaterErrors.js";
import { FilePlatformConfigStore, loadPlatformConfigOrDefault, parsePlatformConfig } from "../platformConfigStore.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "platform-config-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("FilePlatformConfigStore", () => {
  it("writes the settings document with its on-disk field names", async () => {
    const file = path.join(dir, "nested", "config.json");
    const store = new FilePlatformConfigStore(file);
    await store.save({ vmmUrl: "http://10.0.2.2:10300/", env: { FOO: "bar" } });

    const onDisk: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    expect(onDisk).toEqual({ dstack_vmm_url: "http://10.0.2.2:10300/", env: { FOO: "bar" } });
    await expect(store.load()).resolves.toEqual({ vmmUrl: "http://10.0.2.2:10300/", env: { FOO: "bar" } });
    expect(await fs.readdir(path.dirname(file))).toEqual(["config.json"]);
  });

  it("reads nulls as absent", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, JSON.stringify({ dstack_vmm_url: null, env: null }), "utf-8");
    await expect(new FilePlatformConfigStore(file).load()).resolves.toEqual({});
  });

  it("fails with ConfigError when the file is missing", async () => {
    const store = new FilePlatformConfigStore(path.join(dir, "missing.json"));
    await expect(store.load()).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("parsePlatformConfig", () => {
  it("rejects non-string env values", () => {
    expect(() => parsePlatformConfig('{"env":{"PORT":8080}}', "config.json")).toThrow(ProtocolError);
    expect(() => parsePlatformConfig('{"env":{"PORT":8080}}', "config.json")).toThrow("config.json.env.PORT: expected a string");
  });

  it("rejects malformed JSON", () => {
    expect(() => parsePlatformConfig("{", "config.json")).toThrow(ProtocolError);
  });
});

describe("loadPlatformConfigOrDefault", () => {
  it("falls back to the defaults and reports why", async () => {
    const onFallback = vi.fn();
    const config = await loadPlatformConfigOrDefault(new FilePlatformConfigStore(path.join(dir, "missing.json")), onFallback);
    expect(config).toEqual({ vmmUrl: "http://10.0.2.2:10300/" });
    expect(onFallback).toHaveBeenCalledTimes(1);
    expect(onFallback.mock.calls[0][0]).toBeInstanceOf(ConfigError);
  });
});
