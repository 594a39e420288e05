/**
 * PunycodeErrorCode defines an exported type contract.
 */
export type PunycodeErrorCode = "OVERFLOW" | "BAD_INPUT" | "INVALID_ENCODING";

/**
 * PunycodeError defines an exported structural contract.
 */
export interface PunycodeError {
  code: PunycodeErrorCode;
  message: string;
  /** Offending value: an input code point, or the reconstructed value on decode. */
  codePoint?: number;
  /** Position in the input: code point index for encodeCodePoints, UTF-16 code units otherwise. */
  index?: number;
}

/**
 * PunycodeResult defines an exported type contract.
 */
export type PunycodeResult<T> = { ok: true; value: T } | { ok: false; error: PunycodeError };

/**
 * PunycodeDecodeOptions defines an exported structural contract.
 */
export interface PunycodeDecodeOptions {
  /**
   * Reject input that an encoder would never produce for the decoded value
   * (leading delimiter without basic code points, redundant digits, and so on).
   */
  canonical?: boolean;
}

/**
 * BootstringParameters defines an exported structural contract.
 */
export interface BootstringParameters {
  base: number;
  tMin: number;
  tMax: number;
  skew: number;
  damp: number;
  initialBias: number;
  initialN: number;
  delimiter: string;
}
