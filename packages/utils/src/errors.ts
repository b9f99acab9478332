// packages/utils/src/errors.ts

export type N3TxErrorCode =
  | 'CONFIGURATION'
  | 'FORMAT'
  | 'OUT_OF_BOUNDS'
  | 'PASSPHRASE'
  | 'PROVIDER'
  | 'SIGNING';

export class N3TxError extends Error {
  readonly code: N3TxErrorCode;

  constructor(code: N3TxErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Invalid builder state, detected before any bytes are produced. */
export class ConfigurationError extends N3TxError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIGURATION', message, options);
  }
}

/** Malformed input to a decoder: truncation, bad opcode, bad encoding, checksum. */
export class FormatError extends N3TxError {
  constructor(message: string, options?: ErrorOptions, code: N3TxErrorCode = 'FORMAT') {
    super(code, message, options);
  }
}

export class OutOfBoundsError extends FormatError {
  readonly position: number;
  readonly requested: number;
  readonly available: number;

  constructor(position: number, requested: number, available: number) {
    super(
      `read of ${requested} byte(s) at position ${position} exceeds buffer (${available} available)`,
      undefined,
      'OUT_OF_BOUNDS'
    );
    this.position = position;
    this.requested = requested;
    this.available = available;
  }
}

/** Decryption succeeded structurally but the recovered key does not match the address hash. */
export class PassphraseError extends N3TxError {
  constructor(message = 'passphrase does not match the encrypted key', options?: ErrorOptions) {
    super('PASSPHRASE', message, options);
  }
}

export class ProviderError extends N3TxError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('PROVIDER', `provider call '${operation}' failed: ${toError(cause).message}`, { cause });
    this.operation = operation;
  }
}

export class SigningError extends N3TxError {
  constructor(message: string, options?: ErrorOptions) {
    super('SIGNING', message, options);
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error('Invalid error type', { cause: err });
}
