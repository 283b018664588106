import type { DesiredComposeConfig } from "./compose.js";
import type { PlatformConfig } from "./platform.js";
import type {
  AppEnvEncryptPubKeyResponse,
  ComposeHashResponse,
  CreateVmRequest,
  CreateVmResponse,
  StatusResponse
} from "./vmm.js";

export interface VmmClient {
  status(): Promise<StatusResponse>;
  stopVm(id: string): Promise<void>;
  removeVm(id: string): Promise<void>;
  createVm(request: CreateVmRequest): Promise<CreateVmResponse>;
  getAppEnvEncryptPubKey(appId: string): Promise<AppEnvEncryptPubKeyResponse>;
  getComposeHash(request: CreateVmRequest): Promise<ComposeHashResponse>;
}

export interface ComposeConfigSource {
  fetch(): Promise<DesiredComposeConfig>;
}

export interface PlatformConfigStore {
  readonly path: string;
  load(): Promise<PlatformConfig>;
  save(config: PlatformConfig): Promise<void>;
}

export interface EnvelopeEncryptor {
  encrypt(payloadJson: string, remotePublicKeyHex: string): string;
}

/** Resolves after `ms`; rejects early when `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
