/**
 * Code point and its UTF-16 index metadata.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export interface CodePointInfo {
  codePoint: number;
  indexCU: number;
  sizeCU: number;
}

/**
 * Iterate code points with UTF-16 code unit offsets.
 * Lone surrogates are yielded as their own code unit value.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export function* iterateCodePoints(text: string): Iterable<CodePointInfo> {
  for (let codeUnitIndex = 0; codeUnitIndex < text.length; ) {
    const codePoint = text.codePointAt(codeUnitIndex) ?? 0;
    const sizeCU = codePoint > 0xffff ? 2 : 1;
    yield { codePoint, indexCU: codeUnitIndex, sizeCU };
    codeUnitIndex += sizeCU;
  }
}

/**
 * True for values in the surrogate block 0xD800..0xDFFF.
 */
export function isSurrogate(codePoint: number): boolean {
  return codePoint >= 0xd800 && codePoint <= 0xdfff;
}

/**
 * True for integers in 0..0x10FFFF outside the surrogate block.
 */
export function isScalarValue(codePoint: number): boolean {
  return (
    Number.isInteger(codePoint) &&
    codePoint >= 0 &&
    codePoint <= 0x10ffff &&
    !isSurrogate(codePoint)
  );
}

/**
 * Build a string from scalar values.
 * Units: Unicode scalar values.
 */
export function codePointsToString(codePoints: readonly number[]): string {
  let output = "";
  for (const codePoint of codePoints) {
    output += String.fromCodePoint(codePoint);
  }
  return output;
}

