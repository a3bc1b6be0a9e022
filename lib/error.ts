/**
 * Error codes for codec and blockwise-transfer failures.
 * Wire errors: 1-99, usage errors: 100+, blockwise errors: 200+
 */
export enum CoapErrorCode {
  /* Header version is not 1 */
  UNSUPPORTED_VERSION = 1,
  /* Truncated header, token or option, or reserved nibble */
  MALFORMED_MESSAGE = 2,
  /* Value cannot be represented on the wire */
  VALUE_OUT_OF_RANGE = 3,

  /* Type or message ID missing at encode time */
  INCOMPLETE_MESSAGE = 100,
  /* Request-only or response-only operation on the wrong message kind */
  INVALID_OPERATION = 101,
  /* Transmission parameter overrides rejected */
  INVALID_CONFIGURATION = 102,

  /* Incoming block does not start where the accumulated payload ends */
  BLOCK_SEQUENCE = 200,
  /* ETag changed between response blocks */
  RESOURCE_CHANGED = 201,
}

export class CoapError extends Error {
  public readonly status: CoapErrorCode;
  constructor(code: CoapErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? `CoAP error ${code}`, options);
    this.status = code;
    this.name = 'CoapError';
    Object.setPrototypeOf(this, CoapError.prototype);
  }
}

export class FatalVersionError extends CoapError {
  public readonly version: number;
  constructor(version: number) {
    super(CoapErrorCode.UNSUPPORTED_VERSION, `Protocol version must be 1, got ${version}`);
    this.version = version;
    this.name = 'FatalVersionError';
    Object.setPrototypeOf(this, FatalVersionError.prototype);
  }
}

export class MalformedMessageError extends CoapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(CoapErrorCode.MALFORMED_MESSAGE, message, options);
    this.name = 'MalformedMessageError';
    Object.setPrototypeOf(this, MalformedMessageError.prototype);
  }
}

export class ValueOutOfRangeError extends CoapError {
  constructor(message: string) {
    super(CoapErrorCode.VALUE_OUT_OF_RANGE, message);
    this.name = 'ValueOutOfRangeError';
    Object.setPrototypeOf(this, ValueOutOfRangeError.prototype);
  }
}

export class IncompleteMessageError extends CoapError {
  constructor(message = 'Message type and message ID must be set before encoding') {
    super(CoapErrorCode.INCOMPLETE_MESSAGE, message);
    this.name = 'IncompleteMessageError';
    Object.setPrototypeOf(this, IncompleteMessageError.prototype);
  }
}

export class InvalidOperationError extends CoapError {
  constructor(message: string) {
    super(CoapErrorCode.INVALID_OPERATION, message);
    this.name = 'InvalidOperationError';
    Object.setPrototypeOf(this, InvalidOperationError.prototype);
  }
}

export class InvalidConfigurationError extends CoapError {
  public readonly issues: string[];
  constructor(issues: string[]) {
    super(CoapErrorCode.INVALID_CONFIGURATION, `Invalid transmission parameters: ${issues.join('; ')}`);
    this.issues = issues;
    this.name = 'InvalidConfigurationError';
    Object.setPrototypeOf(this, InvalidConfigurationError.prototype);
  }
}

export class BlockSequenceError extends CoapError {
  public readonly expectedOffset: number;
  public readonly actualOffset: number;
  constructor(expectedOffset: number, actualOffset: number) {
    super(CoapErrorCode.BLOCK_SEQUENCE, `Block starts at offset ${actualOffset}, expected ${expectedOffset}`);
    this.expectedOffset = expectedOffset;
    this.actualOffset = actualOffset;
    this.name = 'BlockSequenceError';
    Object.setPrototypeOf(this, BlockSequenceError.prototype);
  }
}

export class ResourceChangedError extends CoapError {
  constructor() {
    super(CoapErrorCode.RESOURCE_CHANGED, 'ETag changed during blockwise transfer');
    this.name = 'ResourceChangedError';
    Object.setPrototypeOf(this, ResourceChangedError.prototype);
  }
}
