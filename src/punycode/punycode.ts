import {
  codePointsToString,
  isScalarValue,
  isSurrogate,
  iterateCodePoints,
} from "../core/codepoint.ts";
import { IdnaCodecError, errorDetails } from "../core/error.ts";
import type {
  BootstringParameters,
  PunycodeDecodeOptions,
  PunycodeError,
  PunycodeErrorCode,
  PunycodeResult,
} from "./types.ts";

const BASE = 36;
const TMIN = 1;
const TMAX = 26;
const SKEW = 38;
const DAMP = 700;
const INITIAL_BIAS = 72;
const INITIAL_N = 128;
const DELIMITER = "-";
const MAX_INT = 0x7fffffff;

/**
 * Punycode instantiation of the Bootstring parameters (RFC 3492 section 5).
 */
export const BOOTSTRING_PARAMETERS: Readonly<BootstringParameters> = Object.freeze({
  base: BASE,
  tMin: TMIN,
  tMax: TMAX,
  skew: SKEW,
  damp: DAMP,
  initialBias: INITIAL_BIAS,
  initialN: INITIAL_N,
  delimiter: DELIMITER,
});

const ERROR_MESSAGES: Record<PunycodeErrorCode, string> = {
  OVERFLOW: "Punycode overflow",
  BAD_INPUT: "Bad punycode input",
  INVALID_ENCODING: "Non-canonical punycode encoding",
};

function fail(
  code: PunycodeErrorCode,
  message?: string,
  extras: Pick<PunycodeError, "codePoint" | "index"> = {},
): { ok: false; error: PunycodeError } {
  return {
    ok: false,
    error: {
      code,
      message: message ?? ERROR_MESSAGES[code],
      ...extras,
    },
  };
}

/**
 * Digit threshold for the k-th digit position under the current bias.
 */
export function digitThreshold(k: number, bias: number): number {
  if (k <= bias + TMIN) return TMIN;
  if (k >= bias + TMAX) return TMAX;
  return k - bias;
}

/**
 * Bias adaptation after each encoded or decoded delta (RFC 3492 section 6.1).
 */
export function adaptBias(delta: number, numPoints: number, firstTime: boolean): number {
  let adjusted = firstTime ? Math.floor(delta / DAMP) : delta >> 1;
  adjusted += Math.floor(adjusted / numPoints);
  let k = 0;
  while (adjusted > ((BASE - TMIN) * TMAX) >> 1) {
    adjusted = Math.floor(adjusted / (BASE - TMIN));
    k += BASE;
  }
  return k + Math.floor(((BASE - TMIN + 1) * adjusted) / (adjusted + SKEW));
}

function encodeDigit(digit: number): string {
  // 0-25 -> a-z, 26-35 -> 0-9
  return String.fromCharCode(digit + 22 + (digit < 26 ? 75 : 0));
}

function decodeDigit(codeUnit: number): number {
  if (codeUnit >= 0x30 && codeUnit <= 0x39) return codeUnit - 22;
  if (codeUnit >= 0x41 && codeUnit <= 0x5a) return codeUnit - 0x41;
  if (codeUnit >= 0x61 && codeUnit <= 0x7a) return codeUnit - 0x61;
  return BASE;
}

/**
 * Encode a sequence of Unicode scalar values to Punycode.
 * Units: Unicode scalar values.
 */
export function punycodeEncodeCodePoints(codePoints: readonly number[]): PunycodeResult<string> {
  for (const [index, codePoint] of codePoints.entries()) {
    if (!isScalarValue(codePoint)) {
      return fail("BAD_INPUT", "Input is not a Unicode scalar value", { codePoint, index });
    }
  }

  let output = "";
  for (const codePoint of codePoints) {
    if (codePoint < INITIAL_N) {
      output += String.fromCharCode(codePoint);
    }
  }

  const basicCount = output.length;
  let handled = basicCount;
  if (basicCount > 0 && basicCount < codePoints.length) output += DELIMITER;

  let n = INITIAL_N;
  let delta = 0;
  let bias = INITIAL_BIAS;

  while (handled < codePoints.length) {
    // Every unhandled code point is >= n, so m always lands on one of them.
    let m = MAX_INT;
    for (const codePoint of codePoints) {
      if (codePoint >= n && codePoint < m) m = codePoint;
    }
    if (m - n > Math.floor((MAX_INT - delta) / (handled + 1))) {
      return fail("OVERFLOW", undefined, { codePoint: m });
    }
    delta += (m - n) * (handled + 1);
    n = m;

    for (const codePoint of codePoints) {
      if (codePoint < n) {
        delta += 1;
        if (delta > MAX_INT) return fail("OVERFLOW", undefined, { codePoint: n });
      } else if (codePoint === n) {
        let q = delta;
        for (let k = BASE; ; k += BASE) {
          const t = digitThreshold(k, bias);
          if (q < t) break;
          output += encodeDigit(t + ((q - t) % (BASE - t)));
          q = Math.floor((q - t) / (BASE - t));
        }
        output += encodeDigit(q);
        bias = adaptBias(delta, handled + 1, handled === basicCount);
        delta = 0;
        handled += 1;
      }
    }
    delta += 1;
    n += 1;
  }

  return { ok: true, value: output };
}

/**
 * Encode a Unicode label to Punycode.
 * Units: UTF-16 code units.
 */
export function punycodeEncode(labelUnicode: string): PunycodeResult<string> {
  const codePoints: number[] = [];
  for (const info of iterateCodePoints(labelUnicode)) {
    if (isSurrogate(info.codePoint)) {
      return fail("BAD_INPUT", "Ill-formed Unicode in punycode input", {
        codePoint: info.codePoint,
        index: info.indexCU,
      });
    }
    codePoints.push(info.codePoint);
  }
  return punycodeEncodeCodePoints(codePoints);
}

/**
 * Decode a Punycode string to a sequence of Unicode scalar values.
 * Units: Unicode scalar values.
 */
export function punycodeDecodeCodePoints(
  labelAscii: string,
  options?: PunycodeDecodeOptions,
): PunycodeResult<number[]> {
  const output: number[] = [];
  const lastDelimiter = labelAscii.lastIndexOf(DELIMITER);

  for (let basicIndex = 0; basicIndex < lastDelimiter; basicIndex += 1) {
    const codeUnit = labelAscii.charCodeAt(basicIndex);
    if (codeUnit >= INITIAL_N) {
      return fail("BAD_INPUT", "Non-basic code point before delimiter", {
        codePoint: labelAscii.codePointAt(basicIndex) ?? codeUnit,
        index: basicIndex,
      });
    }
    output.push(codeUnit);
  }

  let n = INITIAL_N;
  let i = 0;
  let bias = INITIAL_BIAS;
  let index = lastDelimiter === -1 ? 0 : lastDelimiter + 1;

  while (index < labelAscii.length) {
    const oldi = i;
    let w = 1;
    for (let k = BASE; ; k += BASE) {
      if (index >= labelAscii.length) {
        return fail("BAD_INPUT", "Unexpected end of punycode input", { index });
      }
      const digit = decodeDigit(labelAscii.charCodeAt(index));
      if (digit >= BASE) {
        return fail("BAD_INPUT", "Invalid punycode digit", {
          codePoint: labelAscii.codePointAt(index) ?? 0,
          index,
        });
      }
      index += 1;
      if (digit > Math.floor((MAX_INT - i) / w)) {
        return fail("OVERFLOW", undefined, { index });
      }
      i += digit * w;
      const t = digitThreshold(k, bias);
      if (digit < t) break;
      if (w > Math.floor(MAX_INT / (BASE - t))) {
        return fail("OVERFLOW", undefined, { index });
      }
      w *= BASE - t;
    }
    const outLen = output.length + 1;
    bias = adaptBias(i - oldi, outLen, oldi === 0);
    const increment = Math.floor(i / outLen);
    if (increment > MAX_INT - n) {
      return fail("OVERFLOW", undefined, { index });
    }
    n += increment;
    i %= outLen;
    if (!isScalarValue(n)) {
      return fail("BAD_INPUT", "Decoded value is not a Unicode scalar value", {
        codePoint: n,
        index,
      });
    }
    output.splice(i, 0, n);
    i += 1;
  }

  if (options?.canonical) {
    const reencoded = punycodeEncodeCodePoints(output);
    if (!reencoded.ok || reencoded.value.toLowerCase() !== labelAscii.toLowerCase()) {
      return fail("INVALID_ENCODING");
    }
  }

  return { ok: true, value: output };
}

/**
 * Decode a Punycode label to Unicode.
 * Units: UTF-16 code units.
 */
export function punycodeDecode(
  labelAscii: string,
  options?: PunycodeDecodeOptions,
): PunycodeResult<string> {
  const decoded = punycodeDecodeCodePoints(labelAscii, options);
  if (!decoded.ok) return decoded;
  return { ok: true, value: codePointsToString(decoded.value) };
}

function toCodecError(error: PunycodeError): IdnaCodecError {
  return new IdnaCodecError(
    error.code,
    error.message,
    errorDetails({ codePoint: error.codePoint, index: error.index }),
  );
}

/**
 * Encode a Unicode label to Punycode, throwing IdnaCodecError on failure.
 */
export function punycodeEncodeOrThrow(labelUnicode: string): string {
  const result = punycodeEncode(labelUnicode);
  if (!result.ok) throw toCodecError(result.error);
  return result.value;
}

/**
 * Decode a Punycode label to Unicode, throwing IdnaCodecError on failure.
 */
export function punycodeDecodeOrThrow(labelAscii: string, options?: PunycodeDecodeOptions): string {
  const result = punycodeDecode(labelAscii, options);
  if (!result.ok) throw toCodecError(result.error);
  return result.value;
}
