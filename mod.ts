export type { IdnaCodecErrorCode } from "./src/core/error.ts";
export { IdnaCodecError } from "./src/core/error.ts";
export type { AlgorithmInfo, Provenance, Span } from "./src/core/types.ts";
export { IMPLEMENTATION_ID, LIBRARY_VERSION } from "./src/core/version.ts";
export * from "./src/idna/mod.ts";
export * from "./src/punycode/mod.ts";
