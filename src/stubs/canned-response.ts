/**
 * A pre-built response handed back by the stub client in place of a real one.
 * Only what the code under test reads is modelled: status code, headers and body.
 */

import { isDeepStrictEqual } from "node:util";
import { z } from "zod";
import type { HttpResponse } from "../http/client.js";
import type { HeaderMap } from "../domain/types.js";
import { configurationError } from "../domain/errors.js";

const statusCodeSchema = z.number().int("status code must be an integer");

export class CannedResponse implements HttpResponse {
  readonly code: number;
  readonly headers: Readonly<HeaderMap>;
  private readonly data: Uint8Array | undefined;

  /** Headers and body are copied; later changes to the arguments do not reach the response */
  constructor(code: number, headers: HeaderMap, body?: Uint8Array | string) {
    const parsed = statusCodeSchema.safeParse(code);
    if (!parsed.success) {
      const msg = parsed.error.errors.map((e) => e.message).join("; ");
      throw configurationError(`Invalid CannedResponse code ${code}: ${msg}`, undefined, parsed.error);
    }
    this.code = parsed.data;
    this.headers = freezeHeaders(headers);
    this.data = typeof body === "string" ? Buffer.from(body, "utf-8") : copyBytes(body);
  }

  /** Response carrying `value` serialized as JSON */
  static json(value: unknown, code = 200, headers: HeaderMap = {}): CannedResponse {
    return new CannedResponse(
      code,
      { "content-type": "application/json", ...headers },
      JSON.stringify(value)
    );
  }

  /** Copy of the content; not part of a real response object, read via content() */
  get body(): Uint8Array | undefined {
    return copyBytes(this.data);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof CannedResponse)) return false;
    return (
      this.code === other.code &&
      isDeepStrictEqual(this.headers, other.headers) &&
      bodiesEqual(this.data, other.data)
    );
  }

  toString(): string {
    return `CannedResponse(${this.code})`;
  }
}

function freezeHeaders(headers: HeaderMap): Readonly<HeaderMap> {
  const copy: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    copy[name] = typeof value === "string" ? value : Object.freeze([...value]);
  }
  return Object.freeze(copy);
}

function copyBytes(bytes: Uint8Array | undefined): Uint8Array | undefined {
  return bytes === undefined ? undefined : Uint8Array.from(bytes);
}

// Buffer and Uint8Array with the same bytes count as equal
function bodiesEqual(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(b);
}
