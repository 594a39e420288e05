export type { IdnaError, IdnaErrorCode, IdnaOptions, IdnaResult, LabelKind } from "./types.ts";
export {
  DEFAULT_IDNA_OPTIONS,
  PUNYCODE_TO_IDNA_ERROR,
  idnaToAscii,
  idnaToUnicode,
  toASCII,
  toUnicode,
} from "./idna.ts";
export {
  ACE_PREFIX,
  LABEL_SEPARATOR,
  MAX_LABEL_OCTETS,
  MAX_U_LABEL_CODE_POINTS,
  classifyLabel,
  isALabel,
  isNRLDHLabel,
  isULabel,
  splitDomain,
} from "./label.ts";
