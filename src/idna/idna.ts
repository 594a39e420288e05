import { codePointsToString, iterateCodePoints } from "../core/codepoint.ts";
import { IdnaCodecError, errorDetails } from "../core/error.ts";
import { createProvenance } from "../core/provenance.ts";
import type { Provenance } from "../core/types.ts";
import { IMPLEMENTATION_ID } from "../core/version.ts";
import { punycodeDecodeCodePoints, punycodeEncode } from "../punycode/punycode.ts";
import type { PunycodeError, PunycodeErrorCode } from "../punycode/types.ts";
import {
  ACE_PREFIX,
  LABEL_SEPARATOR,
  MAX_LABEL_OCTETS,
  MAX_U_LABEL_CODE_POINTS,
  asciiLowerCase,
  classifyLabel,
  isALabel,
  isAllAscii,
  splitDomain,
  utf8Length,
} from "./label.ts";
import type { IdnaError, IdnaErrorCode, IdnaOptions, IdnaResult, LabelKind } from "./types.ts";

const IDNA_SPEC = "https://www.rfc-editor.org/rfc/rfc5891";
const DEFAULT_REVISION = "RFC 5891 (August 2010)";

/**
 * DEFAULT_IDNA_OPTIONS is an exported constant used by public APIs.
 */
export const DEFAULT_IDNA_OPTIONS: Readonly<Required<IdnaOptions>> = Object.freeze({
  checkHyphens: false,
  useStd3AsciiRules: false,
  checkAceLabels: false,
});

/**
 * How each codec failure surfaces at the label framer boundary.
 */
export const PUNYCODE_TO_IDNA_ERROR: Readonly<Record<PunycodeErrorCode, IdnaErrorCode>> =
  Object.freeze({
    OVERFLOW: "PUNYCODE_ERROR",
    BAD_INPUT: "PUNYCODE_ERROR",
    INVALID_ENCODING: "PUNYCODE_ERROR",
  });

const ERROR_MESSAGES: Record<IdnaErrorCode, string> = {
  EMPTY_LABEL: "Empty label",
  LABEL_TOO_LONG: "Label too long",
  INVALID_LABEL: "Invalid label",
  PUNYCODE_ERROR: "Punycode error",
  INVALID_ACE_PREFIX: "Invalid ACE prefix",
};

type LabelFailure = { ok: false; error: IdnaError };

type LabelOutcome = { ok: true; value: string } | LabelFailure;

type LabelConverter = (
  label: string,
  labelIndex: number,
  options: Required<IdnaOptions>,
) => LabelOutcome;

function normalizeOptions(options?: IdnaOptions): Required<IdnaOptions> {
  return {
    checkHyphens: options?.checkHyphens ?? DEFAULT_IDNA_OPTIONS.checkHyphens,
    useStd3AsciiRules: options?.useStd3AsciiRules ?? DEFAULT_IDNA_OPTIONS.useStd3AsciiRules,
    checkAceLabels: options?.checkAceLabels ?? DEFAULT_IDNA_OPTIONS.checkAceLabels,
  };
}

function buildProvenance(name: string, options: unknown): Provenance {
  return createProvenance(
    {
      name,
      spec: IDNA_SPEC,
      revisionOrDate: DEFAULT_REVISION,
      implementationId: IMPLEMENTATION_ID,
    },
    options,
    { text: "utf16-code-unit", byte: "utf8-byte", codePoint: "unicode-code-point" },
  );
}

function failure(
  code: IdnaErrorCode,
  extras: Partial<Omit<IdnaError, "code" | "message">> = {},
  message?: string,
): LabelFailure {
  return {
    ok: false,
    error: {
      code,
      message: message ?? ERROR_MESSAGES[code],
      ...extras,
    },
  };
}

function fromPunycodeError(error: PunycodeError, labelIndex: number): LabelFailure {
  const code = PUNYCODE_TO_IDNA_ERROR[error.code];
  const message = `${ERROR_MESSAGES[code]}: ${error.message}`;
  return failure(code, { labelIndex, cause: error.code }, message);
}

function isLdh(codePoint: number): boolean {
  return (
    codePoint === 0x2d ||
    (codePoint >= 0x30 && codePoint <= 0x39) ||
    (codePoint >= 0x41 && codePoint <= 0x5a) ||
    (codePoint >= 0x61 && codePoint <= 0x7a)
  );
}

function checkHyphens(label: string, labelIndex: number): LabelFailure | undefined {
  if (label.startsWith("-")) {
    return failure(
      "INVALID_LABEL",
      { labelIndex, span: { startCU: 0, endCU: 1 }, codePoint: 0x2d },
      "Label starts with a hyphen",
    );
  }
  if (label.endsWith("-")) {
    const pos = label.length - 1;
    return failure(
      "INVALID_LABEL",
      { labelIndex, span: { startCU: pos, endCU: pos + 1 }, codePoint: 0x2d },
      "Label ends with a hyphen",
    );
  }
  if (label.length >= 4 && label[2] === "-" && label[3] === "-") {
    return failure(
      "INVALID_LABEL",
      { labelIndex, span: { startCU: 2, endCU: 4 }, codePoint: 0x2d },
      "Hyphen in third and fourth positions",
    );
  }
  return undefined;
}

function checkStd3Ascii(label: string, labelIndex: number): LabelFailure | undefined {
  for (const info of iterateCodePoints(label)) {
    if (info.codePoint <= 0x7f && !isLdh(info.codePoint)) {
      return failure(
        "INVALID_LABEL",
        {
          labelIndex,
          span: { startCU: info.indexCU, endCU: info.indexCU + info.sizeCU },
          codePoint: info.codePoint,
        },
        "Label contains ASCII outside letters, digits and hyphen",
      );
    }
  }
  return undefined;
}

/**
 * Repertoire rules for U-labels and NR-LDH-labels, as enabled by the options.
 */
function checkLabelRules(
  label: string,
  labelIndex: number,
  options: Required<IdnaOptions>,
): LabelFailure | undefined {
  if (options.checkHyphens) {
    const violation = checkHyphens(label, labelIndex);
    if (violation) return violation;
  }
  if (options.useStd3AsciiRules) {
    return checkStd3Ascii(label, labelIndex);
  }
  return undefined;
}

function decodeALabel(
  label: string,
  labelIndex: number,
  options: Required<IdnaOptions>,
): LabelOutcome {
  const payload = label.slice(ACE_PREFIX.length);
  if (options.checkAceLabels) {
    if (payload.length === 0) return failure("INVALID_ACE_PREFIX", { labelIndex });
    if (!isAllAscii(payload)) {
      return failure("INVALID_ACE_PREFIX", { labelIndex }, "A-label contains non-ASCII");
    }
  }

  // ASCII-only fold: full case mapping would turn U+212A KELVIN SIGN into "k".
  const decoded = punycodeDecodeCodePoints(asciiLowerCase(payload), {
    canonical: options.checkAceLabels,
  });
  if (!decoded.ok) return fromPunycodeError(decoded.error, labelIndex);

  const codePoints = decoded.value;
  if (codePoints.length > MAX_U_LABEL_CODE_POINTS) {
    return failure("LABEL_TOO_LONG", { labelIndex });
  }

  const value = codePointsToString(codePoints);
  if (options.checkAceLabels) {
    const violation = checkLabelRules(value, labelIndex, options);
    if (violation) return violation;
  }
  return { ok: true, value };
}

const toAsciiLabel: LabelConverter = (label, labelIndex, options) => {
  if (label.length === 0) return failure("EMPTY_LABEL", { labelIndex });

  let ascii: string;
  if (isAllAscii(label)) {
    if (isALabel(label)) {
      if (options.checkAceLabels) {
        const decoded = decodeALabel(label, labelIndex, options);
        if (!decoded.ok) return decoded;
      }
    } else {
      const violation = checkLabelRules(label, labelIndex, options);
      if (violation) return violation;
    }
    ascii = label.toLowerCase();
  } else {
    if (options.checkAceLabels && isALabel(label)) {
      return failure("INVALID_ACE_PREFIX", { labelIndex }, "A-label contains non-ASCII");
    }
    const violation = checkLabelRules(label, labelIndex, options);
    if (violation) return violation;
    const encoded = punycodeEncode(label);
    if (!encoded.ok) return fromPunycodeError(encoded.error, labelIndex);
    ascii = `${ACE_PREFIX}${encoded.value}`;
  }

  if (utf8Length(ascii) > MAX_LABEL_OCTETS) {
    return failure("LABEL_TOO_LONG", { labelIndex });
  }
  return { ok: true, value: ascii };
};

const toUnicodeLabel: LabelConverter = (label, labelIndex, options) => {
  if (label.length === 0) return failure("EMPTY_LABEL", { labelIndex });

  if (isALabel(label)) return decodeALabel(label, labelIndex, options);

  const lowered = label.toLowerCase();
  const violation = checkLabelRules(lowered, labelIndex, options);
  if (violation) return violation;
  return { ok: true, value: lowered };
};

function convertDomain(
  domain: string,
  options: Required<IdnaOptions>,
  name: string,
  convertLabel: LabelConverter,
): IdnaResult {
  const provenance = buildProvenance(name, options);
  const values: string[] = [];
  const kinds: LabelKind[] = [];

  for (const [labelIndex, label] of splitDomain(domain).entries()) {
    const outcome = convertLabel(label, labelIndex, options);
    if (!outcome.ok) {
      return { ok: false, error: outcome.error, provenance };
    }
    values.push(outcome.value);
    kinds.push(classifyLabel(label));
  }

  return {
    ok: true,
    value: values.join(LABEL_SEPARATOR),
    labels: kinds,
    provenance,
  };
}

function unwrap(result: IdnaResult): string {
  if (result.ok) return result.value;
  const { error } = result;
  throw new IdnaCodecError(
    error.code,
    error.message,
    errorDetails({
      labelIndex: error.labelIndex,
      span: error.span,
      codePoint: error.codePoint,
      cause: error.cause,
    }),
  );
}

/**
 * Convert a domain to its ASCII form: U-labels become A-labels, ASCII labels are lower-cased.
 * Conversion stops at the first failing label.
 * Units: UTF-16 code units.
 */
export function idnaToAscii(domain: string, opts?: IdnaOptions): IdnaResult {
  return convertDomain(domain, normalizeOptions(opts), "IDNA2008.ToASCII", toAsciiLabel);
}

/**
 * Convert a domain to its Unicode form: A-labels are decoded, other labels are lower-cased
 * with full Unicode case mapping.
 * Conversion stops at the first failing label.
 * Units: UTF-16 code units.
 */
export function idnaToUnicode(domain: string, opts?: IdnaOptions): IdnaResult {
  return convertDomain(domain, normalizeOptions(opts), "IDNA2008.ToUnicode", toUnicodeLabel);
}

/**
 * Throwing variant of idnaToAscii; raises IdnaCodecError.
 */
export function toASCII(domain: string, opts?: IdnaOptions): string {
  return unwrap(idnaToAscii(domain, opts));
}

/**
 * Throwing variant of idnaToUnicode; raises IdnaCodecError.
 */
export function toUnicode(domain: string, opts?: IdnaOptions): string {
  return unwrap(idnaToUnicode(domain, opts));
}
