import type { Logger } from "pino";
import { CLI_NAME, DEFAULT_GUEST_VMM_URL, FIXED_REQUIRED_ENV_KEYS } from "../config/constants.js";
import { computeComposeHash, truncateAppId } from "../hashing/canonicalJson.js";
import { buildEnvVars, collectRequiredEnvKeys, findMissingEnv } from "../manifest/envVars.js";
import {
  buildAllowedEnvs,
  buildAppManifest,
  resolveVmName,
  serializeManifest,
  validateVmParameters
} from "../manifest/manifestBuilder.js";
import { ValidationError } from "../errors/updaterErrors.js";
import { loadPlatformConfigOrDefault } from "../platformConfig/platformConfigStore.js";
import type { DesiredComposeConfig, VmParameters } from "../types/compose.js";
import type { ComposeConfigSource, EnvelopeEncryptor, PlatformConfigStore, Sleep, VmmClient } from "../types/interfaces.js";
import type { PlatformConfig } from "../types/platform.js";
import type { CreateVmRequest } from "../types/vmm.js";
import { decide, findManagedVm, type Decision } from "./decision.js";
import { VmLifecycle, type LifecycleTimings, type StopResult } from "./vmLifecycle.js";

export interface ReconcilerState {
  currentHash?: string;
  vmId?: string;
}

export interface ReconcilerDeps {
  configSource: ComposeConfigSource;
  platformConfig: PlatformConfigStore;
  vmm: VmmClient;
  encryptor: EnvelopeEncryptor;
  sleep: Sleep;
  logger: Logger;
}

export interface ReconcilerOptions {
  managedVmName: string;
  verifyComposeHash: boolean;
  /** DSTACK_VMM_URL handed to the guest when the settings file has none. */
  defaultGuestVmmUrl?: string;
  timings: LifecycleTimings;
}

export interface CycleOutcome {
  state: ReconcilerState;
  decision: Decision["kind"];
  /** True when a Keep on the first cycle took over a VM left by a previous process. */
  adopted: boolean;
  stop?: StopResult;
}

interface DesiredVm {
  config: DesiredComposeConfig;
  params: VmParameters;
  vmName: string;
  allowedEnvs: string[];
  composeFile: string;
  hash: string;
}

/**
 * One fetch/validate/build/observe/decide/act pass. State goes in and the new
 * state comes out; on any error the caller keeps the state it passed in.
 */
export class Reconciler {
  private readonly log: Logger;
  private readonly lifecycle: VmLifecycle;
  private readonly defaultGuestVmmUrl: string;

  constructor(
    private readonly deps: ReconcilerDeps,
    private readonly options: ReconcilerOptions
  ) {
    this.log = deps.logger;
    this.lifecycle = new VmLifecycle(deps.vmm, options.timings, deps.sleep, deps.logger);
    this.defaultGuestVmmUrl = options.defaultGuestVmmUrl ?? DEFAULT_GUEST_VMM_URL;
  }

  async reconcile(state: ReconcilerState): Promise<CycleOutcome> {
    const config = await this.deps.configSource.fetch();

    await this.ensureRequiredEnv(config);

    const desired = this.buildDesired(config);

    const { vms } = await this.deps.vmm.status();
    const observed = findManagedVm(vms, this.options.managedVmName);
    if (observed && observed.appId === undefined) {
      const raw = vms.find((vm) => vm.id === observed.id)?.raw;
      this.log.warn({ vmId: observed.id, vm: raw }, "Found VM but appId is missing");
    }

    const decision = decide(observed, desired.hash);
    const isFirstRun = state.currentHash === undefined;

    switch (decision.kind) {
      case "keep": {
        const hash = truncateAppId(desired.hash);
        if (isFirstRun) {
          this.log.info(
            { vmId: decision.vm.id, status: decision.vm.status, hash },
            "Existing VM found at startup with matching compose hash, keeping it"
          );
        } else {
          this.log.info({ vmId: decision.vm.id, hash }, "VM compose hash matches, no update needed");
        }
        return {
          state: { vmId: decision.vm.id, currentHash: desired.hash },
          decision: "keep",
          adopted: isFirstRun
        };
      }
      case "recreate": {
        this.log.info(
          {
            vmId: decision.vm.id,
            status: decision.vm.status,
            reason: decision.reason,
            existing: decision.vm.appId ? truncateAppId(decision.vm.appId) : undefined,
            desired: truncateAppId(desired.hash)
          },
          "VM does not match desired state, will recreate"
        );
        const stop = await this.lifecycle.killAndRemove(decision.vm.id);
        const vmId = await this.createVm(desired);
        this.log.info({ vmId, hash: desired.hash }, "VM updated");
        return { state: { vmId, currentHash: desired.hash }, decision: "recreate", adopted: false, stop };
      }
      case "create": {
        this.log.info("No existing VM found, will create new one");
        const vmId = await this.createVm(desired);
        this.log.info({ vmId, hash: desired.hash }, "VM created");
        return { state: { vmId, currentHash: desired.hash }, decision: "create", adopted: false };
      }
    }
  }

  private async ensureRequiredEnv(config: DesiredComposeConfig): Promise<void> {
    const requiredKeys = collectRequiredEnvKeys(config.requiredEnv, config.provisioning.envKeys);
    if (requiredKeys.length === 0) return;
    this.log.info({ keys: requiredKeys }, "Required environment variable keys from API");

    const envVars = buildEnvVars(await this.loadPlatformConfig(), this.defaultGuestVmmUrl);
    const missing = findMissingEnv(requiredKeys, envVars);
    if (missing.length > 0) {
      this.log.error({ missing }, "Missing values for required environment variable keys");
      throw new ValidationError(
        `Missing values for required environment variable keys: ${missing.join(", ")}. ` +
          `Please set them with '${CLI_NAME} config set-env <key> <value>'`,
        missing
      );
    }
  }

  private buildDesired(config: DesiredComposeConfig): DesiredVm {
    const allowedEnvs = buildAllowedEnvs(config.provisioning.envKeys, FIXED_REQUIRED_ENV_KEYS, config.requiredEnv);
    this.log.debug({ allowedEnvs, count: allowedEnvs.length }, "Allowed environment variables");

    const params = config.provisioning.vmParameters;
    validateVmParameters(params);
    this.log.info(
      { vmType: config.vmType, image: params.image, vcpu: params.vcpu, memoryMb: params.memory, diskGb: params.diskSize },
      "VM hardware parameters resolved"
    );

    const vmName = resolveVmName(params, config.vmType);
    const manifest = buildAppManifest(config.composeContent, config.provisioning.manifestDefaults, vmName, allowedEnvs);
    const composeFile = serializeManifest(manifest);
    const hash = computeComposeHash(composeFile, params.image);
    this.log.info({ image: params.image, hash }, "Computed compose hash");

    return { config, params, vmName, allowedEnvs, composeFile, hash };
  }

  private async createVm(desired: DesiredVm): Promise<string> {
    const { params, hash } = desired;
    const appId = truncateAppId(hash);
    this.log.info({ hash, image: params.image }, "Creating new VM");

    const platformConfig = await this.loadPlatformConfig();
    const envVars = buildEnvVars(platformConfig, this.defaultGuestVmmUrl);
    this.log.info(
      { vmmUrl: platformConfig.vmmUrl, envCount: envVars.length, keys: envVars.map((e) => e.key) },
      "Built environment variables for VM from platform config"
    );

    this.log.info({ appId }, "Getting encryption key");
    const { publicKey } = await this.deps.vmm.getAppEnvEncryptPubKey(appId);
    const encryptedEnv = this.deps.encryptor.encrypt(JSON.stringify(envVars), publicKey);

    validateVmParameters(params);
    const request: CreateVmRequest = {
      name: desired.vmName,
      image: params.image,
      compose_file: desired.composeFile,
      vcpu: params.vcpu,
      memory: params.memory,
      disk_size: params.diskSize,
      user_config: params.userConfig,
      ports: params.ports.map((p) => ({
        protocol: p.protocol,
        host_port: p.hostPort,
        vm_port: p.vmPort,
        host_address: p.hostAddress ?? null
      })),
      encrypted_env: encryptedEnv,
      hugepages: params.hugepages,
      pin_numa: params.pinNuma,
      stopped: params.stopped
    };

    if (this.options.verifyComposeHash) {
      // Informational only: creation goes ahead whatever the VMM answers.
      const { hash: vmmHash } = await this.deps.vmm.getComposeHash(request);
      if (truncateAppId(vmmHash) === appId) {
        this.log.info({ vmmHash }, "VMM computed compose hash");
      } else {
        this.log.warn({ vmmHash, localHash: hash }, "VMM computed a different compose hash");
      }
    }

    const { id } = await this.deps.vmm.createVm(request);
    this.log.info({ vmId: id }, "VM created with ID");
    return id;
  }

  private async loadPlatformConfig(): Promise<PlatformConfig> {
    return loadPlatformConfigOrDefault(this.deps.platformConfig, (err) => {
      this.log.warn({ err, path: this.deps.platformConfig.path }, "Failed to load platform config, using defaults");
    });
  }
}
