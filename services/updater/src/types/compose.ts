export interface PortMapping {
  protocol: string;
  hostPort: number;
  vmPort: number;
  hostAddress?: string;
}

export interface ManifestDefaults {
  manifestVersion: number;
  /** Overrides the manifest name; the resolved VM name is used when absent. */
  name?: string;
  runner: string;
  kmsEnabled: boolean;
  gatewayEnabled: boolean;
  localKeyProviderEnabled: boolean;
  keyProviderId: string;
  publicLogs: boolean;
  publicSysinfo: boolean;
  publicTcbinfo: boolean;
  noInstanceId: boolean;
  secureTime: boolean;
}

export interface VmParameters {
  name?: string;
  image: string;
  vcpu: number;
  /** MB */
  memory: number;
  /** GB */
  diskSize: number;
  userConfig: string;
  ports: PortMapping[];
  hugepages: boolean;
  pinNuma: boolean;
  stopped: boolean;
}

export interface VmProvisioningConfig {
  envKeys: string[];
  manifestDefaults: ManifestDefaults;
  vmParameters: VmParameters;
}

export interface DesiredComposeConfig {
  vmType: string;
  composeContent: string;
  description?: string;
  updatedAt: string;
  requiredEnv: string[];
  provisioning: VmProvisioningConfig;
}

export interface AppManifest {
  manifestVersion: number;
  name: string;
  runner: string;
  composeContent: string;
  kmsEnabled: boolean;
  gatewayEnabled: boolean;
  localKeyProviderEnabled: boolean;
  keyProviderId: string;
  publicLogs: boolean;
  publicSysinfo: boolean;
  publicTcbinfo: boolean;
  allowedEnvs: string[];
  noInstanceId: boolean;
  secureTime: boolean;
}

export interface EnvVar {
  key: string;
  value: string;
}
