/**
 * HTTP client call surface. Application code depends on this interface so tests
 * can hand it a StubHttpClient instead of a client that performs network I/O.
 */

import type { HeaderMap, RequestParams } from "../domain/types.js";

export interface HttpResponse {
  code: number;
  headers: Readonly<HeaderMap>;
}

export interface IHttpClient<R extends HttpResponse = HttpResponse> {
  request(method: string, url: string, params?: RequestParams): Promise<R>;
  get(url: string, params?: RequestParams): Promise<R>;
  head(url: string, params?: RequestParams): Promise<R>;
  delete(url: string, params?: RequestParams): Promise<R>;
  /** `data` is sent as the request body */
  put(url: string, data?: unknown, params?: RequestParams): Promise<R>;
  post(url: string, data?: unknown, params?: RequestParams): Promise<R>;
  /** Raw body bytes */
  content(response: R): Promise<Uint8Array | undefined>;
  /** Body parsed as JSON */
  jsonContent(response: R): Promise<unknown>;
}
