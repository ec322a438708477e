export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonNativeCodec, NonFiniteNumberError } from "./adapters/json/json-native-codec"
export { MsgpackNativeCodec, NonNativeValueError } from "./adapters/msgpack/msgpack-native-codec"
export { ObjectSource } from "./adapters/object/object-source"
export {
  createTranscoderFromConfig,
  type TranscoderFromConfigDeps,
} from "./config/create-transcoder-from-config"
export {
  type ConfigIssue,
  InvalidConfigError,
  type LoadTranscoderConfigOptions,
  loadTranscoderConfig,
  type TranscoderConfig,
  type TranscoderSettings,
  toSettings,
} from "./config/load-transcoder-config"
export {
  type NativeCodecName,
  nativeCodecNames,
  type TranscoderEnv,
  transcoderConfigKeys,
  transcoderConfigSchema,
} from "./config/schema"
export {
  type CreateTranscoderOptions,
  createNativeCodec,
  createTranscoder,
} from "./core/create-transcoder"
export { defineTranscoding, type TranscodingSpec } from "./core/define-transcoding"
export {
  DuplicateNameError,
  DuplicateTypeError,
  InvalidEnvelopeKeysError,
  InvalidTranscodingError,
  NegativeZeroError,
  type TranscodingErrorCode,
  UnknownWireNameError,
  UnregisteredNameError,
  UnregisteredTypeError,
  UnsupportedTypeError,
} from "./core/errors"
export { isNativeMapping, isNativeSequence, typeNameOf } from "./core/native-kind"
export {
  RecursiveTranscoder,
  type RecursiveTranscoderDeps,
  type RecursiveTranscoderOptions,
} from "./core/recursive-transcoder"
export { TranscodingRegistry, type TranscodingRegistryDeps } from "./core/transcoding-registry"
export type { ConfigSource } from "./ports/config-source"
export { DEFAULT_ENVELOPE_KEYS, type EnvelopeKeys } from "./ports/envelope"
export type { NativeCodec } from "./ports/native-codec"
export type { NativeMap, NativeScalar, NativeValue } from "./ports/native-value"
export type { Transcoder } from "./ports/transcoder"
export type { Transcoding, TypeKey } from "./ports/transcoding"
export {
  bigintAsString,
  builtinTranscodings,
  bytesAsBase64,
  dateAsIso,
  mapAsEntries,
  setAsList,
  Tuple,
  tupleAsList,
} from "./transcodings"
