import { RpcError, errorMessage } from "../errors/updaterErrors.js";
import type { VmmMethod } from "../types/vmm.js";
import { parseJson, type JsonValue } from "../utils/json.js";

export type FetchFn = typeof fetch;

export interface RpcTransportOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

const MAX_ERROR_BODY_CHARS = 2048;

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function rpcUrl(baseUrl: string, method: VmmMethod): string {
  return `${normalizeBaseUrl(baseUrl)}/prpc/${method}?json`;
}

/**
 * One JSON-over-HTTP call to the VMM. Every failure, transport or HTTP status,
 * becomes an RpcError carrying the method; retries are the caller's decision.
 */
export class RpcTransport {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: RpcTransportOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async call(method: VmmMethod, body: object): Promise<JsonValue> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.options.timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(rpcUrl(this.options.baseUrl, method), {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal
      });
      text = await response.text();
    } catch (err) {
      const reason = controller.signal.aborted ? `no response within ${this.options.timeoutMs}ms` : errorMessage(err);
      throw new RpcError(method, `RPC ${method} failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(t);
    }

    if (!response.ok) {
      const errText = text.slice(0, MAX_ERROR_BODY_CHARS) || "Unknown error";
      throw new RpcError(method, `RPC ${method} failed with status ${response.status}: ${errText}`, {
        status: response.status,
        body: errText
      });
    }

    // Some methods (StopVm, RemoveVm) answer with an empty body.
    if (!text.trim()) {
      return {};
    }
    return parseJson(text, `RPC ${method} response`);
  }
}
