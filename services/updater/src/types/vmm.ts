import type { JsonObject } from "../utils/json.js";

export type VmmMethod = "Status" | "StopVm" | "RemoveVm" | "CreateVm" | "GetAppEnvEncryptPubKey" | "GetComposeHash";

export interface VmStatusEntry {
  id?: string;
  name?: string;
  status: string;
  appId?: string;
  /** The entry as the VMM sent it; fields this client does not model live only here. */
  raw: JsonObject;
}

export interface StatusResponse {
  vms: VmStatusEntry[];
}

export interface WirePortMapping {
  protocol: string;
  host_port: number;
  vm_port: number;
  host_address: string | null;
}

/** Body of CreateVm and GetComposeHash, in the VMM's field naming. */
export interface CreateVmRequest {
  name: string;
  image: string;
  compose_file: string;
  vcpu: number;
  memory: number;
  disk_size: number;
  user_config: string;
  ports: WirePortMapping[];
  encrypted_env: string;
  hugepages: boolean;
  pin_numa: boolean;
  stopped: boolean;
}

export interface CreateVmResponse {
  id: string;
}

export interface AppEnvEncryptPubKeyResponse {
  publicKey: string;
}

export interface ComposeHashResponse {
  hash: string;
}
