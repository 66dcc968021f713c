export { MediaType, normalizeMediaType, isToken } from './media/media-type.js';
export { parseAccept, selectContentType, negotiateContentType } from './media/negotiation.js';
export type { AcceptRange, NegotiationResult } from './media/negotiation.js';

export type {
  Transcoder,
  EncodedBody,
  StructuredValue,
  DecodedValue,
  ByteSource,
  DumpStringFunction,
  LoadStringFunction,
  PackFunction,
  UnpackFunction,
  ContentLogger
} from './codec/types.js';
export { TextTranscoder, resolveCharset } from './codec/text.js';
export { BinaryTranscoder } from './codec/binary.js';
export { JsonTranscoder, JSON_CONTENT_TYPE, jsonDumps, jsonLoads, toJsonValue } from './codec/json.js';
export type { JsonValue, JsonOptions, JsonTranscoderOptions } from './codec/json.js';
export {
  MsgPackTranscoder,
  MsgPackEncoder,
  MsgPackDecoder,
  MSGPACK_CONTENT_TYPE,
  Format,
  packb,
  unpackb
} from './codec/msgpack.js';
export type { MsgPackOptions, MsgPackTranscoderOptions } from './codec/msgpack.js';
export { Uuid, MsgPackExtension, defineAdapter } from './codec/values.js';
export type { ValueAdapter } from './codec/values.js';
export {
  ContentRegistry,
  addTranscoder,
  addBinaryContentType,
  addTextContentType,
  setDefaultContentType,
  createDefaultRegistry
} from './codec/registry.js';
export type { ContentRegistryOptions } from './codec/registry.js';
export { checkDecodedPayload, getGuardrailsFromEnv, measureDecodedSize, measureDepth } from './codec/guards.js';
export type { DecodedGuardrails, GuardrailCheck } from './codec/guards.js';
export { ContentConfigLoader, loadContentConfig, buildRegistry, registryFromEnv, applyEnvDefaults } from './config/loader.js';
export type { ContentConfig, ContentTypeEntry, CodecName } from './config/loader.js';
export { RequestContent, startHttp, statusForError } from './connectors/http.js';
export type { ContentRequest, ResponseSink, SendOptions, ContentHandler, HttpOptions } from './connectors/http.js';
export {
  ExtendableError,
  MalformedMediaTypeError,
  ContentTypeNotFoundError,
  NoAcceptableTypeError,
  DecodeError,
  UnsupportedValueError,
  HttpError
} from './util/errors.js';
