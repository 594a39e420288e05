import type { IdnaErrorCode } from "../idna/types.ts";
import type { PunycodeErrorCode } from "../punycode/types.ts";

/**
 * IdnaCodecErrorCode defines an exported type contract.
 */
export type IdnaCodecErrorCode = PunycodeErrorCode | IdnaErrorCode;

/**
 * Error raised by the throwing front ends of the codec and the label framer.
 */
export class IdnaCodecError extends Error {
  readonly code: IdnaCodecErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: IdnaCodecErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "IdnaCodecError";
    this.code = code;
    if (details) this.details = details;
  }
}

/**
 * Collect the defined fields of a structured error record as exception details.
 */
export function errorDetails(fields: Record<string, unknown>): Record<string, unknown> | undefined {
  const details: Record<string, unknown> = {};
  let hasAny = false;
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    details[key] = value;
    hasAny = true;
  }
  return hasAny ? details : undefined;
}
