/**
 * Association list of `(method, url, params)` to canned response.
 *
 * A plain Map cannot key on a params object, so entries are kept in a list and
 * scanned in order with structural equality. Lookups never consume an entry:
 * the same request always returns the same response.
 */

import { descriptorFromKey, descriptorsEqual, toDescriptor } from "../domain/types.js";
import type { RequestDescriptor, RequestParams } from "../domain/types.js";
import { duplicateStubError, noMatchError } from "../domain/errors.js";
import { validateStubEntries } from "../domain/validation.js";
import type { CannedResponse } from "./canned-response.js";
import type { MatchStrategy, StubEntry } from "./strategy.js";

interface NormalizedEntry {
  request: RequestDescriptor;
  response: CannedResponse;
}

export class ResponseMapping implements MatchStrategy {
  private readonly entries: readonly NormalizedEntry[];

  /** Throws CONFIGURATION_ERROR if the same request is registered twice */
  constructor(stubs: readonly StubEntry[] = []) {
    this.entries = validateStubEntries(stubs).map(([key, response]) => ({
      request: descriptorFromKey(key),
      response,
    }));

    this.entries.forEach((item, i) => {
      for (const other of this.entries.slice(i + 1)) {
        if (descriptorsEqual(item.request, other.request)) {
          throw duplicateStubError(
            { request: item.request, response: item.response.toString() },
            { request: other.request, response: other.response.toString() }
          );
        }
      }
    });
  }

  getResponse(method: string, url: string, params?: RequestParams): CannedResponse {
    const request = toDescriptor(method, url, params);
    const entry = this.entries.find((e) => descriptorsEqual(e.request, request));
    if (!entry) {
      throw noMatchError(request);
    }
    return entry.response;
  }

  get size(): number {
    return this.entries.length;
  }

  toString(): string {
    return `ResponseMapping (association list): ${this.entries.length} stubs`;
  }
}
