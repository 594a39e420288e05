import type { LabelKind } from "./types.ts";

/**
 * ACE_PREFIX marks an A-label.
 */
export const ACE_PREFIX = "xn--";
/**
 * Longest label in octets (RFC 1035 section 2.3.4).
 */
export const MAX_LABEL_OCTETS = 63;
/**
 * Longest U-label in code points (RFC 5890 section 4.2).
 */
export const MAX_U_LABEL_CODE_POINTS = 252;
/**
 * LABEL_SEPARATOR is an exported constant used by public APIs.
 */
export const LABEL_SEPARATOR = ".";

const UTF8_ENCODER = new TextEncoder();

/**
 * True when every UTF-16 code unit is below 0x80.
 */
export function isAllAscii(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) return false;
  }
  return true;
}

/**
 * Lower-case A-Z only; every other code unit is left as it is.
 */
export function asciiLowerCase(text: string): string {
  return text.replace(/[A-Z]/g, (char) => String.fromCharCode(char.charCodeAt(0) + 0x20));
}

/**
 * Length of a label in UTF-8 octets.
 * Units: bytes (UTF-8).
 */
export function utf8Length(text: string): number {
  return UTF8_ENCODER.encode(text).length;
}

/**
 * Split a domain on "." keeping empty labels in place.
 */
export function splitDomain(domain: string): string[] {
  return domain.split(LABEL_SEPARATOR);
}

/**
 * True when the label starts with the ACE prefix, compared case-insensitively.
 */
export function isALabel(label: string): boolean {
  return asciiLowerCase(label.slice(0, ACE_PREFIX.length)) === ACE_PREFIX;
}

/**
 * True when the label carries a non-ASCII code point and no ACE prefix.
 */
export function isULabel(label: string): boolean {
  return !isAllAscii(label) && !isALabel(label);
}

/**
 * True when the label is all ASCII and carries no ACE prefix.
 */
export function isNRLDHLabel(label: string): boolean {
  return isAllAscii(label) && !isALabel(label);
}

/**
 * Kind of a label; exactly one of isALabel, isULabel and isNRLDHLabel holds.
 */
export function classifyLabel(label: string): LabelKind {
  if (isALabel(label)) return "a-label";
  return isAllAscii(label) ? "nr-ldh-label" : "u-label";
}
