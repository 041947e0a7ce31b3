/**
 * Error types raised while assembling SEPA payment files.
 */

export class SepaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SepaError";
  }
}

/**
 * A setter received a value outside its closed SEPA enumeration.
 * The previously stored value is left untouched.
 */
export class InvalidConfigurationError extends SepaError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

export class InvalidArgumentError extends SepaError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class InvalidTransferFileConfigurationError extends SepaError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTransferFileConfigurationError";
  }
}

export class InvalidTransferTypeError extends SepaError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTransferTypeError";
  }
}
