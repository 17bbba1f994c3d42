import { buf as crc32Buffer } from "crc-32";
import { ServiceError } from "./service-error";

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function encode(value: unknown, path: string): string {
  if (value === null) {
    return "null";
  }

  switch (typeof value) {
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) {
        throw new ServiceError("invalid_input", "non_canonical_value", `Non-finite number at ${path}.`, {
          path
        });
      }
      return JSON.stringify(value);
    case "string":
      return JSON.stringify(value);
    case "object":
      break;
    default:
      throw new ServiceError("invalid_input", "non_canonical_value", `Unsupported ${typeof value} at ${path}.`, {
        path
      });
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return `[${items.map((item, index) => encode(item === undefined ? null : item, `${path}[${index}]`)).join(",")}]`;
  }

  if (!isPlainObject(value)) {
    throw new ServiceError("invalid_input", "non_canonical_value", `Unsupported object at ${path}.`, { path });
  }

  const parts: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const entry: unknown = Reflect.get(value, key);
    if (entry === undefined) {
      continue;
    }
    parts.push(`${JSON.stringify(key)}:${encode(entry, `${path}.${key}`)}`);
  }
  return `{${parts.join(",")}}`;
}

/**
 * Canonical JSON: object keys sorted by UTF-16 code unit, no insignificant
 * whitespace, numbers in shortest round-trip form. Equal values always
 * encode to the same string.
 */
export function canonicalJson(value: unknown): string {
  return encode(value, "$");
}

export function canonicalJsonBytes(value: unknown): Buffer {
  return Buffer.from(canonicalJson(value), "utf8");
}

/** CRC-32 (IEEE 802.3) as eight lower-case hex digits. */
export function crc32Hex(data: string | Uint8Array): string {
  const bytes = typeof data === "string" ? Buffer.from(data, "utf8") : data;
  return (crc32Buffer(bytes) >>> 0).toString(16).padStart(8, "0");
}

/** `{"ver":N,"cc":"xxxxxxxx"}`, in that key order. */
export function configMetaPayload(ver: number, cc: string): string {
  return JSON.stringify({ ver, cc });
}
