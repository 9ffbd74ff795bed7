import { BridgeErrorKind, BridgeFailure } from '../types';

/**
 * Error carrying a bridge failure kind.
 *
 * Components report expected failures as BridgeFailure values; this class
 * is for the places that have to throw (config loading, fatal cycle errors).
 */
export class BridgeError extends Error {
  constructor(
    readonly kind: BridgeErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BridgeError';
  }

  toFailure(): BridgeFailure {
    return { kind: this.kind, message: this.message };
  }
}

export function failure(kind: BridgeErrorKind, message: string): BridgeFailure {
  return { kind, message };
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wrap a thrown value as a failure of the given kind, keeping its message
 */
export function toFailure(kind: BridgeErrorKind, context: string, error: unknown): BridgeFailure {
  if (error instanceof BridgeError) {
    return error.toFailure();
  }
  return failure(kind, `${context}: ${errorMessage(error)}`);
}
