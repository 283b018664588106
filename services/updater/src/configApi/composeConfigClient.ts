import type { Logger } from "pino";
import { DEFAULT_MANAGED_VM_NAME } from "../config/constants.js";
import { TransientNetworkError, errorMessage } from "../errors/updaterErrors.js";
import type {
  DesiredComposeConfig,
  ManifestDefaults,
  PortMapping,
  VmParameters,
  VmProvisioningConfig
} from "../types/compose.js";
import type { ComposeConfigSource } from "../types/interfaces.js";
import { JsonReader, parseJson, type JsonValue } from "../utils/json.js";
import type { FetchFn } from "../vmmClient/rpcTransport.js";

export function defaultManifestDefaults(vmName: string = DEFAULT_MANAGED_VM_NAME): ManifestDefaults {
  return {
    manifestVersion: 2,
    name: vmName,
    runner: "docker-compose",
    kmsEnabled: true,
    gatewayEnabled: true,
    localKeyProviderEnabled: false,
    keyProviderId: "",
    publicLogs: true,
    publicSysinfo: true,
    publicTcbinfo: true,
    noInstanceId: false,
    secureTime: false
  };
}

export function defaultVmParameters(vmName: string = DEFAULT_MANAGED_VM_NAME): VmParameters {
  return {
    name: vmName,
    image: "dstack-0.5.2",
    vcpu: 16,
    memory: 16 * 1024,
    diskSize: 200,
    userConfig: "",
    ports: [],
    hugepages: false,
    pinNuma: false,
    stopped: false
  };
}

const PORT_RANGE = { min: 0, max: 65535 };

function parsePortMapping(value: JsonValue, where: string): PortMapping {
  const port = JsonReader.from(value, where);
  return {
    protocol: port.stringOr("protocol", "tcp"),
    hostPort: port.integerOr("host_port", 0, PORT_RANGE),
    vmPort: port.integerOr("vm_port", 0, PORT_RANGE),
    hostAddress: port.optionalString("host_address")
  };
}

/*
 * Absent sections take the built-in defaults as a whole. A section that is
 * present must carry its own required fields; only its optional ones default.
 */

function parseManifestDefaults(section: JsonReader | undefined, vmName: string): ManifestDefaults {
  if (!section) return defaultManifestDefaults(vmName);
  return {
    manifestVersion: section.integer("manifest_version"),
    name: section.optionalString("name"),
    runner: section.string("runner"),
    kmsEnabled: section.boolOr("kms_enabled", false),
    gatewayEnabled: section.boolOr("gateway_enabled", false),
    localKeyProviderEnabled: section.boolOr("local_key_provider_enabled", false),
    keyProviderId: section.stringOr("key_provider_id", ""),
    publicLogs: section.boolOr("public_logs", false),
    publicSysinfo: section.boolOr("public_sysinfo", false),
    publicTcbinfo: section.boolOr("public_tcbinfo", false),
    noInstanceId: section.boolOr("no_instance_id", false),
    secureTime: section.boolOr("secure_time", false)
  };
}

function parseVmParameters(section: JsonReader | undefined, vmName: string): VmParameters {
  if (!section) return defaultVmParameters(vmName);
  return {
    name: section.optionalString("name"),
    image: section.string("image"),
    vcpu: section.integer("vcpu"),
    memory: section.integer("memory"),
    diskSize: section.integer("disk_size"),
    userConfig: section.stringOr("user_config", ""),
    ports: section.arrayOr("ports", []).map((p, i) => parsePortMapping(p, `vm_parameters.ports[${i}]`)),
    hugepages: section.boolOr("hugepages", false),
    pinNuma: section.boolOr("pin_numa", false),
    stopped: section.boolOr("stopped", false)
  };
}

function parseProvisioning(section: JsonReader | undefined, vmName: string): VmProvisioningConfig {
  return {
    envKeys: section?.stringArrayOr("env_keys", []) ?? [],
    manifestDefaults: parseManifestDefaults(section?.object("manifest_defaults"), vmName),
    vmParameters: parseVmParameters(section?.object("vm_parameters"), vmName)
  };
}

export function parseComposeConfig(value: JsonValue, managedVmName: string = DEFAULT_MANAGED_VM_NAME): DesiredComposeConfig {
  const doc = JsonReader.from(value, "compose config");
  return {
    vmType: doc.string("vm_type"),
    composeContent: doc.string("compose_content"),
    description: doc.optionalString("description"),
    updatedAt: doc.string("updated_at"),
    requiredEnv: doc.stringArrayOr("required_env", []),
    provisioning: parseProvisioning(doc.object("provisioning"), managedVmName)
  };
}

export interface ComposeConfigClientOptions {
  url: string;
  timeoutMs: number;
  managedVmName?: string;
  fetchFn?: FetchFn;
  logger: Logger;
}

export class ComposeConfigClient implements ComposeConfigSource {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: ComposeConfigClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async fetch(): Promise<DesiredComposeConfig> {
    const { url, timeoutMs, logger } = this.options;
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), timeoutMs);
    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchFn(url, { method: "GET", headers: { accept: "application/json" }, signal: controller.signal });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (err) {
      const reason = controller.signal.aborted ? `no response within ${timeoutMs}ms` : errorMessage(err);
      throw new TransientNetworkError(`Failed to fetch compose config from ${url}: ${reason}`, { cause: err });
    } finally {
      clearTimeout(t);
    }

    if (!ok) {
      const body = text.slice(0, 2048) || "Unknown error";
      logger.error({ status, body }, "Config API returned an error status");
      throw new TransientNetworkError(`Config API returned status ${status}: ${body}`, { status, body });
    }

    try {
      return parseComposeConfig(parseJson(text, "Compose config response"), this.options.managedVmName);
    } catch (err) {
      logger.error({ err, response: text.slice(0, 2048) }, "Failed to parse compose config");
      throw err;
    }
  }
}
