import type { Logger } from "pino";
import type { VmmClient } from "../types/interfaces.js";
import type {
  AppEnvEncryptPubKeyResponse,
  ComposeHashResponse,
  CreateVmRequest,
  CreateVmResponse,
  StatusResponse,
  VmStatusEntry
} from "../types/vmm.js";
import { JsonReader, isJsonObject } from "../utils/json.js";
import { RpcTransport, type FetchFn } from "./rpcTransport.js";

export interface PrpcVmmClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
  logger: Logger;
}

export class PrpcVmmClient implements VmmClient {
  private readonly transport: RpcTransport;
  private readonly log: Logger;

  constructor(options: PrpcVmmClientOptions) {
    this.transport = new RpcTransport({ baseUrl: options.baseUrl, timeoutMs: options.timeoutMs, fetchFn: options.fetchFn });
    this.log = options.logger;
  }

  async status(): Promise<StatusResponse> {
    const response = JsonReader.from(await this.call("Status", {}), "Status response");
    const vms = response.array("vms").map((item, index): VmStatusEntry => {
      if (!isJsonObject(item)) {
        return { status: "unknown", raw: {} };
      }
      const vm = JsonReader.from(item, `Status response.vms[${index}]`);
      return {
        id: stringField(vm, "id"),
        name: stringField(vm, "name"),
        status: stringField(vm, "status") ?? "unknown",
        appId: stringField(vm, "appId") ?? stringField(vm, "app_id"),
        raw: item
      };
    });
    return { vms };
  }

  async stopVm(id: string): Promise<void> {
    await this.call("StopVm", { id });
  }

  async removeVm(id: string): Promise<void> {
    await this.call("RemoveVm", { id });
  }

  async createVm(request: CreateVmRequest): Promise<CreateVmResponse> {
    const response = JsonReader.from(await this.call("CreateVm", request), "CreateVm response");
    return { id: response.string("id") };
  }

  async getAppEnvEncryptPubKey(appId: string): Promise<AppEnvEncryptPubKeyResponse> {
    const response = JsonReader.from(
      await this.call("GetAppEnvEncryptPubKey", { app_id: appId }),
      "GetAppEnvEncryptPubKey response"
    );
    return { publicKey: response.string("public_key") };
  }

  async getComposeHash(request: CreateVmRequest): Promise<ComposeHashResponse> {
    const response = JsonReader.from(await this.call("GetComposeHash", request), "GetComposeHash response");
    return { hash: response.string("hash") };
  }

  private async call(method: Parameters<RpcTransport["call"]>[0], body: object) {
    this.log.debug({ method }, "VMM RPC call");
    return this.transport.call(method, body);
  }
}

// Status entries are only partially trusted: a field of the wrong type is treated as absent.
function stringField(vm: JsonReader, key: string): string | undefined {
  const v = vm.raw(key);
  return typeof v === "string" ? v : undefined;
}
