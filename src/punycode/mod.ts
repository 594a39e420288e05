export type {
  BootstringParameters,
  PunycodeDecodeOptions,
  PunycodeError,
  PunycodeErrorCode,
  PunycodeResult,
} from "./types.ts";
export {
  BOOTSTRING_PARAMETERS,
  adaptBias,
  digitThreshold,
  punycodeDecode,
  punycodeDecodeCodePoints,
  punycodeDecodeOrThrow,
  punycodeEncode,
  punycodeEncodeCodePoints,
  punycodeEncodeOrThrow,
} from "./punycode.ts";
