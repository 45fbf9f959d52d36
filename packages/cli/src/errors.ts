export type ErrorDetails = Record<string, unknown>;

/**
 * Base for every fatal error of a run. `details` is typed per subclass;
 * `sourceFile` names the record being rewritten when the error was raised.
 */
export class UnitcovError<D extends ErrorDetails = ErrorDetails> extends Error {
  sourceFile?: string;

  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: D,
  ) {
    super(message);
    this.name = "UnitcovError";
  }

  /** Attach the record's source file, unless an inner frame already did. */
  inRecord(sourceFile: string): this {
    if (this.sourceFile === undefined) this.sourceFile = sourceFile;
    return this;
  }

  toJSON(): ErrorDetails {
    return {
      error: this.code,
      message: this.message,
      ...(this.sourceFile !== undefined && { sourceFile: this.sourceFile }),
      ...this.details,
    };
  }
}

export type InvariantDetails = {
  function: string;
  counter: "FNH" | "LH";
  value: number;
  decrement: number;
};

/** An aggregate counter no longer agrees with the detail lines it summarises. */
export class InvariantError extends UnitcovError<InvariantDetails> {
  constructor(message: string, details: InvariantDetails) {
    super(message, "InvariantError", details);
    this.name = "InvariantError";
  }
}
