export type UpdaterErrorKind = "network" | "timeout" | "validation" | "protocol" | "crypto" | "config";

export class UpdaterError extends Error {
  public readonly kind: UpdaterErrorKind;

  constructor(kind: UpdaterErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpdaterError";
    this.kind = kind;
  }
}

/** HTTP failure talking to the config API or the VM manager. */
export class TransientNetworkError extends UpdaterError {
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super("network", message, { cause: details.cause });
    this.name = "TransientNetworkError";
    this.status = details.status;
    this.body = details.body;
  }
}

export class RpcError extends TransientNetworkError {
  public readonly method: string;

  constructor(method: string, message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, details);
    this.name = "RpcError";
    this.method = method;
  }
}

export class TimeoutError extends UpdaterError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super("timeout", message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationError extends UpdaterError {
  public readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[] = []) {
    super("validation", message);
    this.name = "ValidationError";
    this.missingKeys = missingKeys;
  }
}

export class ProtocolError extends UpdaterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("protocol", message, options);
    this.name = "ProtocolError";
  }
}

export class CryptoError extends UpdaterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("crypto", message, options);
    this.name = "CryptoError";
  }
}

export class ConfigError extends UpdaterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
