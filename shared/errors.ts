/**
 * Instrument error taxonomy.
 *
 * Every failure a session can report is one of these classes. Each carries a
 * literal `kind` so callers can switch on it without instanceof chains.
 * Validation errors (out-of-range, incompatible-unit-family, length-mismatch,
 * invalid-argument) are always produced before any command reaches the wire.
 */

export class ConnectionError extends Error {
  readonly kind = 'connection' as const;

  constructor(readonly address: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot open ${address}: ${message}`, options);
    this.name = 'ConnectionError';
  }
}

export type TransportFailure = 'timeout' | 'io';

export class TransportError extends Error {
  readonly kind = 'transport' as const;

  constructor(readonly reason: TransportFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }

  static timeout(command: string, timeoutMs: number): TransportError {
    return new TransportError('timeout', `Timeout after ${timeoutMs}ms waiting for response to: ${command}`);
  }

  static io(cause: unknown): TransportError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new TransportError('io', message, { cause });
  }
}

export class CommandNotConfirmedError extends Error {
  readonly kind = 'command-not-confirmed' as const;

  constructor(readonly command: string, readonly elapsedMs: number) {
    super(`Instrument did not confirm "${command}" within ${elapsedMs}ms`);
    this.name = 'CommandNotConfirmedError';
  }
}

export class OutOfRangeError extends Error {
  readonly kind = 'out-of-range' as const;

  constructor(
    readonly min: number,
    readonly max: number,
    readonly value: number,
    readonly unit: string,
  ) {
    super(`Value ${value} ${unit} out of range [${min}, ${max}] ${unit}`);
    this.name = 'OutOfRangeError';
  }
}

export class IncompatibleUnitFamilyError extends Error {
  readonly kind = 'incompatible-unit-family' as const;

  constructor(readonly from: string, readonly to: string) {
    super(`Cannot convert ${from} to ${to}: different unit families`);
    this.name = 'IncompatibleUnitFamilyError';
  }
}

export class LengthMismatchError extends Error {
  readonly kind = 'length-mismatch' as const;

  constructor(readonly expected: number, readonly actual: number) {
    super(`Expected ${expected} values, got ${actual}`);
    this.name = 'LengthMismatchError';
  }
}

export class InvalidArgumentError extends Error {
  readonly kind = 'invalid-argument' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class ResponseParseError extends Error {
  readonly kind = 'response-parse' as const;

  constructor(readonly command: string, readonly response: string, reason: string) {
    super(`Unexpected response to ${command}: ${reason}`);
    this.name = 'ResponseParseError';
  }
}

export type InstrumentError =
  | ConnectionError
  | TransportError
  | CommandNotConfirmedError
  | OutOfRangeError
  | IncompatibleUnitFamilyError
  | LengthMismatchError
  | InvalidArgumentError
  | ResponseParseError;
