/**
 * Request-side types shared by the strategies and the client façade.
 */

import { inspect, isDeepStrictEqual } from "node:util";

/** Every argument of a request besides method and url (headers, data, query params...) */
export type RequestParams = Record<string, unknown>;

/** Header values as the real client exposes them */
export type HeaderMap = Record<string, string | readonly string[]>;

/**
 * How a test declares an expected request: `["GET", "https://api.test/users", { headers }]`.
 * Params may be left out when the request has none.
 */
export type RequestKey = readonly [method: string, url: string, params?: RequestParams];

/** Normalized form of a request, compared structurally */
export interface RequestDescriptor {
  /** Always uppercase */
  method: string;
  url: string;
  params: RequestParams;
}

export function toDescriptor(
  method: string,
  url: string,
  params: RequestParams = {}
): RequestDescriptor {
  const cleaned: RequestParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) cleaned[key] = normalizeValue(value);
  }
  return { method: method.toUpperCase(), url, params: cleaned };
}

/** Byte arrays of any kind (Buffer included) become plain Uint8Array copies, at any depth */
function normalizeValue(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return Uint8Array.from(value);
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      out[key] = normalizeValue(nested);
    }
    return out;
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function descriptorFromKey(key: RequestKey): RequestDescriptor {
  const [method, url, params] = key;
  return toDescriptor(method, url, params);
}

/** Deep equality; key order in params does not matter, byte arrays compare by content */
export function descriptorsEqual(a: RequestDescriptor, b: RequestDescriptor): boolean {
  return isDeepStrictEqual(a, b);
}

export function formatDescriptor(d: RequestDescriptor): string {
  return `(${d.method}, ${d.url}, ${inspect(d.params, { breakLength: Infinity })})`;
}
