/**
 * Match strategies: given a request, return the canned response for it or throw.
 * The stub client delegates every lookup here; swapping the strategy changes how
 * strictly a test pins down the requests made.
 */

import type { RequestKey, RequestParams } from "../domain/types.js";
import type { CannedResponse } from "./canned-response.js";

/** An expected request paired with the response to give back */
export type StubEntry = readonly [request: RequestKey, response: CannedResponse];

export interface MatchStrategy {
  /** Throws a NO_MATCH StubClientError when the request is not expected */
  getResponse(method: string, url: string, params?: RequestParams): CannedResponse;
  toString(): string;
}
