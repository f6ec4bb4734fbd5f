/**
 * Runtime validation of stub registrations using Zod.
 * Entries are checked when a strategy is built, before any request is matched.
 */

import { z } from "zod";
import { CannedResponse } from "../stubs/canned-response.js";
import type { StubEntry } from "../stubs/strategy.js";
import { configurationError } from "./errors.js";

const methodSchema = z.string().min(1, "method must not be empty");
const urlSchema = z.string();
const paramsSchema = z.record(z.unknown());

export const requestKeySchema = z.union([
  z.tuple([methodSchema, urlSchema]),
  z.tuple([methodSchema, urlSchema, paramsSchema]),
]);

export const stubEntrySchema = z.tuple([requestKeySchema, z.instanceof(CannedResponse)]);

export const stubEntriesSchema = z.array(stubEntrySchema);

/** Validate stub entries; throws CONFIGURATION_ERROR listing every issue */
export function validateStubEntries(input: unknown): StubEntry[] {
  const result = stubEntriesSchema.safeParse(input);
  if (!result.success) {
    const msg = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw configurationError(`Invalid stub entries: ${msg}`, undefined, result.error);
  }
  return result.data;
}
