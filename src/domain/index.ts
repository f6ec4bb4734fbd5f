export * from "./types.js";
export * from "./errors.js";
export { validateStubEntries, stubEntrySchema, requestKeySchema } from "./validation.js";
