/**
 * Span defines an exported structural contract.
 */
export interface Span {
  startCU: number;
  endCU: number;
}

/**
 * AlgorithmInfo defines an exported structural contract.
 */
export interface AlgorithmInfo {
  name: string;
  spec: string;
  revisionOrDate: string;
  implementationId: string;
}

/**
 * Provenance defines an exported structural contract.
 */
export interface Provenance {
  algorithm: AlgorithmInfo;
  configHash: string;
  units: {
    text: "utf16-code-unit";
    byte?: "utf8-byte";
    codePoint?: "unicode-code-point";
  };
}
