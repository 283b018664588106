import { pino, type Logger } from "pino";
import type { LogLevel } from "../config/env.js";

export type { Logger };

export function createLogger(options: { level: LogLevel; name?: string }): Logger {
  return pino({
    name: options.name ?? "compose-vm-updater",
    level: options.level,
    // Secret material must never reach the logs, whatever object it rides on.
    redact: {
      paths: ["env", "*.env", "value", "*.value", "encrypted_env", "*.encrypted_env", "encryptedEnv", "*.encryptedEnv"],
      remove: true
    }
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
