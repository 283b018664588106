import { ConfigError } from "../errors/updaterErrors.js";
import {
  DEFAULT_CONFIG_API_URL,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MANAGED_VM_NAME,
  DEFAULT_PLATFORM_CONFIG_PATH,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  DEFAULT_VMM_URL
} from "./constants.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface EnvConfig {
  vmmUrl: string;
  configApiUrl: string;
  platformConfigPath: string;
  managedVmName: string;
  pollIntervalMs: number;
  httpTimeoutMs: number;
  stopTimeoutMs: number;
  /** Ask the VMM to hash the create request too (logged, never gates creation). */
  verifyComposeHash: boolean;
  logLevel: LogLevel;
  otel: {
    otlpEndpoint?: string;
    serviceName: string;
  };
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsePositiveInt = (raw: string | undefined, name: string, fallback: number) => {
    const n = Number(raw ?? String(fallback));
    if (!Number.isInteger(n) || n <= 0) {
      throw new ConfigError(`${name} must be a positive integer`);
    }
    return n;
  };

  const parseUrl = (raw: string | undefined, name: string, fallback: string) => {
    const value = (raw ?? "").trim() || fallback;
    try {
      const url = new URL(value);
      if (url.protocol !== "http:" && url.protocol !== "https:") {
        throw new ConfigError(`${name} must be an http(s) URL`);
      }
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      throw new ConfigError(`${name} must be a valid URL (got "${value}")`);
    }
    return value;
  };

  const vmmUrl = parseUrl(env.VMM_URL, "VMM_URL", DEFAULT_VMM_URL);
  const configApiUrl = parseUrl(env.CONFIG_API_URL, "CONFIG_API_URL", DEFAULT_CONFIG_API_URL);

  const platformConfigPath = (env.PLATFORM_CONFIG_PATH ?? "").trim() || DEFAULT_PLATFORM_CONFIG_PATH;
  const managedVmName = (env.MANAGED_VM_NAME ?? "").trim() || DEFAULT_MANAGED_VM_NAME;

  const verifyRaw = (env.VERIFY_COMPOSE_HASH ?? "true").toLowerCase();
  if (verifyRaw !== "true" && verifyRaw !== "false") {
    throw new ConfigError("VERIFY_COMPOSE_HASH must be true or false");
  }

  const logLevelRaw = (env.LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new ConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }

  return {
    vmmUrl,
    configApiUrl,
    platformConfigPath,
    managedVmName,
    pollIntervalMs: parsePositiveInt(env.POLL_INTERVAL_MS, "POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS),
    httpTimeoutMs: parsePositiveInt(env.HTTP_TIMEOUT_MS, "HTTP_TIMEOUT_MS", DEFAULT_HTTP_TIMEOUT_MS),
    stopTimeoutMs: parsePositiveInt(env.VMM_STOP_TIMEOUT_MS, "VMM_STOP_TIMEOUT_MS", DEFAULT_STOP_TIMEOUT_MS),
    verifyComposeHash: verifyRaw === "true",
    logLevel: logLevelRaw,
    otel: {
      otlpEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT?.trim() || undefined,
      serviceName: env.OTEL_SERVICE_NAME ?? "compose-vm-updater"
    }
  };
}
