import { ProtocolError } from "../errors/updaterErrors.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(text: string, what: string): JsonValue {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (err) {
    const preview = text.length > 512 ? `${text.slice(0, 512)}...` : text;
    throw new ProtocolError(`${what} is not valid JSON: ${preview}`, { cause: err });
  }
}

/**
 * Field readers for wire documents. Each one names the offending field in the
 * ProtocolError so a malformed response is diagnosable from the log line alone.
 */
export class JsonReader {
  constructor(
    private readonly obj: JsonObject,
    private readonly where: string
  ) {}

  static from(value: JsonValue | undefined, where: string): JsonReader {
    if (!isJsonObject(value)) {
      throw new ProtocolError(`${where}: expected a JSON object`);
    }
    return new JsonReader(value, where);
  }

  has(key: string): boolean {
    const v = this.obj[key];
    return v !== undefined && v !== null;
  }

  raw(key: string): JsonValue | undefined {
    return this.obj[key];
  }

  object(key: string): JsonReader | undefined {
    if (!this.has(key)) return undefined;
    return JsonReader.from(this.obj[key], `${this.where}.${key}`);
  }

  string(key: string): string {
    const v = this.obj[key];
    if (typeof v !== "string") {
      throw new ProtocolError(`${this.where}.${key}: expected a string`);
    }
    return v;
  }

  optionalString(key: string): string | undefined {
    if (!this.has(key)) return undefined;
    return this.string(key);
  }

  stringOr(key: string, fallback: string): string {
    return this.optionalString(key) ?? fallback;
  }

  boolOr(key: string, fallback: boolean): boolean {
    if (!this.has(key)) return fallback;
    const v = this.obj[key];
    if (typeof v !== "boolean") {
      throw new ProtocolError(`${this.where}.${key}: expected a boolean`);
    }
    return v;
  }

  integer(key: string, range: { min: number; max: number } = { min: 0, max: 0xffff_ffff }): number {
    const v = this.obj[key];
    if (typeof v !== "number" || !Number.isInteger(v) || v < range.min || v > range.max) {
      throw new ProtocolError(`${this.where}.${key}: expected an integer between ${range.min} and ${range.max}`);
    }
    return v;
  }

  integerOr(key: string, fallback: number, range?: { min: number; max: number }): number {
    if (!this.has(key)) return fallback;
    return this.integer(key, range);
  }

  stringArrayOr(key: string, fallback: string[]): string[] {
    if (!this.has(key)) return fallback;
    const v = this.obj[key];
    if (!Array.isArray(v) || !v.every((item): item is string => typeof item === "string")) {
      throw new ProtocolError(`${this.where}.${key}: expected an array of strings`);
    }
    return [...v];
  }

  array(key: string): JsonValue[] {
    const v = this.obj[key];
    if (!Array.isArray(v)) {
      throw new ProtocolError(`${this.where}.${key}: expected an array`);
    }
    return v;
  }

  arrayOr(key: string, fallback: JsonValue[]): JsonValue[] {
    if (!this.has(key)) return fallback;
    return this.array(key);
  }
}
