import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_GUEST_VMM_URL } from "../config/constants.js";
import { ConfigError, ProtocolError, errorMessage } from "../errors/updaterErrors.js";
import type { PlatformConfigStore } from "../types/interfaces.js";
import type { PlatformConfig } from "../types/platform.js";
import { JsonReader, isJsonObject, parseJson, type JsonObject } from "../utils/json.js";

export function defaultPlatformConfig(vmmUrl: string = DEFAULT_GUEST_VMM_URL): PlatformConfig {
  return { vmmUrl };
}

export function parsePlatformConfig(text: string, source: string): PlatformConfig {
  const doc = JsonReader.from(parseJson(text, source), source);
  const config: PlatformConfig = {};
  const vmmUrl = doc.optionalString("dstack_vmm_url");
  if (vmmUrl !== undefined) config.vmmUrl = vmmUrl;

  const envRaw = doc.raw("env");
  if (envRaw !== undefined && envRaw !== null) {
    if (!isJsonObject(envRaw)) {
      throw new ProtocolError(`${source}.env: expected an object of strings`);
    }
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(envRaw)) {
      if (typeof value !== "string") {
        throw new ProtocolError(`${source}.env.${key}: expected a string`);
      }
      env[key] = value;
    }
    config.env = env;
  }
  return config;
}

export function serializePlatformConfig(config: PlatformConfig): string {
  const doc: JsonObject = {
    dstack_vmm_url: config.vmmUrl ?? null,
    env: config.env ?? null
  };
  return JSON.stringify(doc, null, 2);
}

/**
 * Settings file shared by the engine (read-only) and the `config` CLI.
 *
 * Writes go through a temp file and rename, so a reader sees either the old or
 * the new document. There is no lock: two concurrent CLI writers can still lose
 * one update.
 */
export class FilePlatformConfigStore implements PlatformConfigStore {
  constructor(public readonly path: string) {}

  async load(): Promise<PlatformConfig> {
    let text: string;
    try {
      text = await fs.readFile(this.path, "utf-8");
    } catch (err) {
      throw new ConfigError(`Failed to read ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    return parsePlatformConfig(text, this.path);
  }

  async save(config: PlatformConfig): Promise<void> {
    const dir = path.dirname(this.path);
    const tmp = path.join(dir, `.${path.basename(this.path)}.${process.pid}.tmp`);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmp, serializePlatformConfig(config), "utf-8");
      await fs.rename(tmp, this.path);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw new ConfigError(`Failed to write to ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/** The engine's view: an unreadable file means "no local settings", never a failed cycle. */
export async function loadPlatformConfigOrDefault(
  store: PlatformConfigStore,
  onFallback: (err: unknown) => void
): Promise<PlatformConfig> {
  try {
    return await store.load();
  } catch (err) {
    onFallback(err);
    return defaultPlatformConfig();
  }
}
