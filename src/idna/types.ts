import type { Provenance, Span } from "../core/types.ts";
import type { PunycodeErrorCode } from "../punycode/types.ts";

/**
 * IdnaErrorCode defines an exported type contract.
 */
export type IdnaErrorCode =
  | "EMPTY_LABEL"
  | "LABEL_TOO_LONG"
  | "INVALID_LABEL"
  | "PUNYCODE_ERROR"
  | "INVALID_ACE_PREFIX";

/**
 * IdnaError defines an exported structural contract.
 */
export interface IdnaError {
  code: IdnaErrorCode;
  message: string;
  span?: Span;
  labelIndex?: number;
  codePoint?: number;
  /** Codec failure behind a PUNYCODE_ERROR. */
  cause?: PunycodeErrorCode;
}

/**
 * LabelKind defines an exported type contract.
 */
export type LabelKind = "a-label" | "u-label" | "nr-ldh-label";

/**
 * IdnaResult defines an exported type contract.
 */
export type IdnaResult =
  | {
      ok: true;
      value: string;
      labels: readonly LabelKind[];
      provenance: Provenance;
    }
  | {
      ok: false;
      error: IdnaError;
      provenance: Provenance;
    };

/**
 * IdnaOptions defines an exported structural contract.
 */
export interface IdnaOptions {
  checkHyphens?: boolean;
  useStd3AsciiRules?: boolean;
  checkAceLabels?: boolean;
}
