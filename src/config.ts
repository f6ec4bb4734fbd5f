/**
 * Configuration loaded from environment variables.
 * Lets a test run turn on request logging without touching test code.
 */

import { z } from "zod";

const flagSchema = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  /** Log every stubbed request and its outcome */
  HTTP_STUB_DEBUG: flagSchema,
  /** Text encoding used when decoding bodies for jsonContent */
  HTTP_STUB_BODY_ENCODING: z.enum(["utf-8", "latin1", "ascii"]).default("utf-8"),
});

export type Config = z.infer<typeof configSchema>;

export type BodyEncoding = Config["HTTP_STUB_BODY_ENCODING"];

/** Load and validate config from process.env; throws ZodError on invalid values */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    HTTP_STUB_DEBUG: env.HTTP_STUB_DEBUG,
    HTTP_STUB_BODY_ENCODING: env.HTTP_STUB_BODY_ENCODING,
  };
  return configSchema.parse(raw);
}
