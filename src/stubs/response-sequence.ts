/**
 * Ordered list of expected requests. Only the first unconsumed entry can match,
 * so requests must arrive exactly in the declared order. The same request may
 * appear more than once.
 */

import { descriptorFromKey, descriptorsEqual, toDescriptor } from "../domain/types.js";
import type { RequestDescriptor, RequestParams } from "../domain/types.js";
import { unexpectedRequestError } from "../domain/errors.js";
import { validateStubEntries } from "../domain/validation.js";
import type { CannedResponse } from "./canned-response.js";
import type { MatchStrategy, StubEntry } from "./strategy.js";

export class ResponseSequence implements MatchStrategy {
  private readonly entries: ReadonlyArray<{ request: RequestDescriptor; response: CannedResponse }>;
  private position = 0;

  constructor(stubs: readonly StubEntry[] = []) {
    this.entries = validateStubEntries(stubs).map(([key, response]) => ({
      request: descriptorFromKey(key),
      response,
    }));
  }

  /**
   * Returns the next entry's response and advances past it.
   * On mismatch the position stays where it was.
   */
  getResponse(method: string, url: string, params?: RequestParams): CannedResponse {
    const request = toDescriptor(method, url, params);
    const next = this.entries[this.position];
    if (next === undefined) {
      throw unexpectedRequestError(request);
    }
    if (!descriptorsEqual(next.request, request)) {
      throw unexpectedRequestError(request, next.request);
    }
    this.position += 1;
    return next.response;
  }

  /** True once every expected request has been made */
  consumed(): boolean {
    return this.position >= this.entries.length;
  }

  remaining(): number {
    return this.entries.length - this.position;
  }

  toString(): string {
    return `ResponseSequence: ${this.position}/${this.entries.length} consumed`;
  }
}
