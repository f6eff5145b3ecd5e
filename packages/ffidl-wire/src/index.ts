// Reference implementation of the ffidl wire format
//
// Generated codecs in every target language must produce and accept the
// same JSON documents as this package.

export { WireError, WireErrorKind } from "./errors.ts";

export {
  encodePrimitive,
  decodePrimitive,
  encodeMapKey,
  decodeMapKey,
  type WireValue,
} from "./primitives.ts";

export {
  encodeValue,
  decodeValue,
  serialize,
  deserialize,
  type WireCodecOptions,
} from "./codec.ts";
