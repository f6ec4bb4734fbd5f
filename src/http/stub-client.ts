/**
 * Stub HTTP client for tests: same call surface as the real client, but every
 * request is answered from a match strategy instead of the network.
 */

import type { IHttpClient } from "./client.js";
import { loadConfig } from "../config.js";
import type { BodyEncoding } from "../config.js";
import { toDescriptor } from "../domain/types.js";
import type { RequestDescriptor, RequestParams } from "../domain/types.js";
import { malformedContentError, unsupportedAttributeError } from "../domain/errors.js";
import type { CannedResponse } from "../stubs/canned-response.js";
import type { MatchStrategy } from "../stubs/strategy.js";

export type StubLogger = Pick<Console, "debug">;

export interface StubHttpClientOptions {
  /** Defaults to console */
  logger?: StubLogger;
  /** Log each request; defaults to HTTP_STUB_DEBUG */
  debug?: boolean;
  /** Body decoding for jsonContent; defaults to HTTP_STUB_BODY_ENCODING */
  encoding?: BodyEncoding;
}

export type RequestFunction = (url: string, params?: RequestParams) => Promise<CannedResponse>;

/** Methods whose argument order matches request() after the method itself */
const PASS_THROUGH_METHODS = ["get", "head", "delete"] as const;

/**
 * Answers requests from the given strategy. Lookups happen synchronously; the
 * returned promise is already settled.
 */
export class StubHttpClient implements IHttpClient<CannedResponse> {
  private readonly recordedRequests: RequestDescriptor[] = [];
  private readonly logger: StubLogger;
  private readonly debug: boolean;
  private readonly encoding: BodyEncoding;

  constructor(
    private readonly strategy: MatchStrategy,
    options: StubHttpClientOptions = {}
  ) {
    const needsConfig = options.debug === undefined || options.encoding === undefined;
    const config = needsConfig ? loadConfig() : undefined;
    this.logger = options.logger ?? console;
    this.debug = options.debug ?? config?.HTTP_STUB_DEBUG ?? false;
    this.encoding = options.encoding ?? config?.HTTP_STUB_BODY_ENCODING ?? "utf-8";
  }

  /**
   * Look up the response for `(method, url, params)`. Every param counts toward
   * the match, not just headers and data.
   */
  async request(method: string, url: string, params?: RequestParams): Promise<CannedResponse> {
    const descriptor = toDescriptor(method, url, params);
    this.recordedRequests.push(descriptor);
    try {
      const response = this.strategy.getResponse(descriptor.method, url, descriptor.params);
      this.log(`${descriptor.method} ${url} -> ${response.code}`);
      return response;
    } catch (err) {
      this.log(`${descriptor.method} ${url} -> ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
  }

  get(url: string, params?: RequestParams): Promise<CannedResponse> {
    return this.request("GET", url, params);
  }

  head(url: string, params?: RequestParams): Promise<CannedResponse> {
    return this.request("HEAD", url, params);
  }

  delete(url: string, params?: RequestParams): Promise<CannedResponse> {
    return this.request("DELETE", url, params);
  }

  /** PUT takes its body before the other params, unlike request() */
  put(url: string, data?: unknown, params?: RequestParams): Promise<CannedResponse> {
    return this.request("PUT", url, withData(params, data));
  }

  post(url: string, data?: unknown, params?: RequestParams): Promise<CannedResponse> {
    return this.request("POST", url, withData(params, data));
  }

  /**
   * Look up a request method by name, for callers that pick the method at
   * runtime. Only the exact names get, head and delete are available this way.
   */
  method(name: string): RequestFunction {
    const known = PASS_THROUGH_METHODS.find((m) => m === name);
    if (!known) {
      throw unsupportedAttributeError(name);
    }
    const upper = known.toUpperCase();
    return (url, params) => this.request(upper, url, params);
  }

  /** Resolves to a copy of the body */
  async content(response: CannedResponse): Promise<Uint8Array | undefined> {
    return response.body;
  }

  jsonContent(response: CannedResponse): Promise<unknown> {
    return this.content(response).then((body) => decodeJson(body, this.encoding));
  }

  getRecordedRequests(): RequestDescriptor[] {
    return [...this.recordedRequests];
  }

  toString(): string {
    return `StubHttpClient with ${this.strategy.toString()}`;
  }

  private log(message: string): void {
    if (this.debug) {
      this.logger.debug(`[stub-http] ${message}`);
    }
  }
}

/** An omitted `data` leaves a `data` entry in params untouched */
function withData(params: RequestParams | undefined, data: unknown): RequestParams {
  return data === undefined ? { ...params } : { ...params, data };
}

function decodeJson(body: Uint8Array | undefined, encoding: BodyEncoding): unknown {
  if (body === undefined) {
    throw malformedContentError("Response has no body to decode as JSON");
  }
  const text = Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString(encoding);
  try {
    return JSON.parse(text) as unknown;
  } catch (e) {
    throw malformedContentError(`Response body is not valid JSON: ${text.slice(0, 200)}`, e);
  }
}
