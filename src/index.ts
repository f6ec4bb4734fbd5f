/**
 * canned-http
 *
 * Public API: the stub client, its match strategies, canned responses and errors.
 */

export * from "./domain/index.js";
export { CannedResponse } from "./stubs/canned-response.js";
export type { MatchStrategy, StubEntry } from "./stubs/strategy.js";
export { ResponseMapping } from "./stubs/response-mapping.js";
export { ResponseSequence } from "./stubs/response-sequence.js";
export { StubHttpClient } from "./http/stub-client.js";
export type { StubHttpClientOptions, StubLogger, RequestFunction } from "./http/stub-client.js";
export type { IHttpClient, HttpResponse } from "./http/client.js";
export { loadConfig } from "./config.js";
export type { Config, BodyEncoding } from "./config.js";
