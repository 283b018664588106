import { VMM_URL_ENV_KEY } from "../config/constants.js";
import type { EnvVar } from "../types/compose.js";
import type { PlatformConfig } from "../types/platform.js";

/**
 * Values injected into the guest: the locally configured entries first, then
 * the VMM address unless the operator already set one explicitly.
 */
export function buildEnvVars(platformConfig: PlatformConfig, defaultGuestVmmUrl: string): EnvVar[] {
  const envVars: EnvVar[] = [];
  const seen = new Set<string>();

  for (const [key, value] of Object.entries(platformConfig.env ?? {})) {
    envVars.push({ key, value });
    seen.add(key);
  }

  if (!seen.has(VMM_URL_ENV_KEY)) {
    envVars.push({ key: VMM_URL_ENV_KEY, value: platformConfig.vmmUrl ?? defaultGuestVmmUrl });
  }

  return envVars;
}

export function findMissingEnv(requiredKeys: Iterable<string>, envVars: EnvVar[]): string[] {
  const present = new Set(envVars.map((e) => e.key));
  return [...requiredKeys].filter((key) => !present.has(key));
}

/** Required-key union in first-seen order, duplicates dropped. */
export function collectRequiredEnvKeys(requiredEnv: string[], envKeys: string[]): string[] {
  return [...new Set([...requiredEnv, ...envKeys])];
}
