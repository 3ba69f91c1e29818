export class UnknownModelError extends Error {
  constructor(readonly model: string) {
    super(`Unknown device model '${model}'`);
    this.name = "UnknownModelError";
  }
}

/** Raised while evaluating a decode rule; readers turn it into an unavailable reading. */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

export class RegisterIndexOutOfRangeError extends DecodeError {
  constructor(
    readonly index: number,
    readonly length: number,
  ) {
    super(`Register index ${index} is outside a snapshot of ${length} registers`);
    this.name = "RegisterIndexOutOfRangeError";
  }
}

export class InvalidRegisterWordError extends DecodeError {
  constructor(
    readonly index: number,
    readonly word: number,
  ) {
    super(`Register ${index} holds ${word}, not an unsigned 16-bit word`);
    this.name = "InvalidRegisterWordError";
  }
}
