// Generation errors.
//
// A generator fails for its own target only; the driver keeps going with the
// other targets and reports every failure together.

export const GenerateErrorKind = {
  /** The schema uses a construct the target profile does not support. */
  UNSUPPORTED_CONSTRUCT: "unsupported_construct",
} as const;

export type GenerateErrorKind = (typeof GenerateErrorKind)[keyof typeof GenerateErrorKind];

export class GenerateError extends Error {
  readonly kind: GenerateErrorKind;
  readonly target: string;
  /** The type (or function) using the construct. */
  readonly typeName: string;
  /** Construct name, e.g. `fixed-list` or `name-collision:id/ID`. */
  readonly construct: string;

  constructor(kind: GenerateErrorKind, target: string, typeName: string, construct: string) {
    super(`${typeName} uses ${construct}, which the ${target} target does not support`);
    this.name = "GenerateError";
    this.kind = kind;
    this.target = target;
    this.typeName = typeName;
    this.construct = construct;
  }

  static unsupportedConstruct(target: string, typeName: string, construct: string): GenerateError {
    return new GenerateError(GenerateErrorKind.UNSUPPORTED_CONSTRUCT, target, typeName, construct);
  }
}
