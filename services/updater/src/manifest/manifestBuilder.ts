import { canonicalStringify } from "../hashing/canonicalJson.js";
import { ValidationError } from "../errors/updaterErrors.js";
import type { AppManifest, ManifestDefaults, VmParameters } from "../types/compose.js";
import type { JsonObject } from "../utils/json.js";

/**
 * Union of every key source, deduplicated and sorted. The list is part of the
 * hashed manifest, so its order has to be independent of the sources' order.
 */
export function buildAllowedEnvs(
  envKeys: Iterable<string>,
  fixedRequiredKeys: Iterable<string>,
  requiredEnv: Iterable<string>
): string[] {
  const keys = new Set<string>([...envKeys, ...fixedRequiredKeys, ...requiredEnv]);
  return [...keys].sort();
}

export function resolveVmName(params: Pick<VmParameters, "name">, vmType: string): string {
  return params.name ? params.name : vmType;
}

export function buildAppManifest(
  composeContent: string,
  defaults: ManifestDefaults,
  vmName: string,
  allowedEnvs: string[]
): AppManifest {
  return {
    manifestVersion: defaults.manifestVersion,
    name: defaults.name ?? vmName,
    runner: defaults.runner,
    composeContent,
    kmsEnabled: defaults.kmsEnabled,
    gatewayEnabled: defaults.gatewayEnabled,
    localKeyProviderEnabled: defaults.localKeyProviderEnabled,
    keyProviderId: defaults.keyProviderId,
    publicLogs: defaults.publicLogs,
    publicSysinfo: defaults.publicSysinfo,
    publicTcbinfo: defaults.publicTcbinfo,
    allowedEnvs: [...allowedEnvs],
    noInstanceId: defaults.noInstanceId,
    secureTime: defaults.secureTime
  };
}

export function manifestToWire(manifest: AppManifest): JsonObject {
  return {
    manifest_version: manifest.manifestVersion,
    name: manifest.name,
    runner: manifest.runner,
    docker_compose_file: manifest.composeContent,
    kms_enabled: manifest.kmsEnabled,
    gateway_enabled: manifest.gatewayEnabled,
    local_key_provider_enabled: manifest.localKeyProviderEnabled,
    key_provider_id: manifest.keyProviderId,
    public_logs: manifest.publicLogs,
    public_sysinfo: manifest.publicSysinfo,
    public_tcbinfo: manifest.publicTcbinfo,
    allowed_envs: manifest.allowedEnvs,
    no_instance_id: manifest.noInstanceId,
    secure_time: manifest.secureTime
  };
}

/** The exact `compose_file` string sent to the VMM and fed to the hash. */
export function serializeManifest(manifest: AppManifest): string {
  return canonicalStringify(manifestToWire(manifest));
}

export function validateVmParameters(params: VmParameters): void {
  if (params.vcpu <= 0) {
    throw new ValidationError("VM configuration must specify at least one vCPU");
  }
  if (params.memory <= 0) {
    throw new ValidationError("VM configuration must specify memory in MB (> 0)");
  }
  if (params.diskSize <= 0) {
    throw new ValidationError("VM configuration must specify disk_size in GB (> 0)");
  }
}
