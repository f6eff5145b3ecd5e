// Code generators
//
// One emitter per target language, each driven by a LanguageProfile and
// producing types plus wire codecs that agree with @ffidl/wire.

export { GenerateError, GenerateErrorKind } from "./errors.ts";

export {
  CONSTRUCTS,
  TARGET_IDS,
  PROFILES,
  TYPESCRIPT,
  RUST,
  GO,
  FSHARP,
  getProfile,
  isTargetId,
  typeIdent,
  fieldIdent,
  variantIdent,
  functionIdent,
  type Construct,
  type LanguageProfile,
  type TargetId,
} from "./profile.ts";

export { convertCase, splitWords, type CaseStyle } from "./casing.ts";

export type { GenerateOptions, GeneratedFile, GeneratedSource } from "./context.ts";

export { generate, tryGenerate, type GenerateResult } from "./generator.ts";
