import { FOCUS_ERROR_CODES, type FocusErrorCode } from "./canonical_error_codes";

export interface FocusErrorOptions {
  readonly cause?: unknown;
}

export abstract class FocusError extends Error {
  abstract readonly kind: string;
  abstract readonly code: FocusErrorCode;
  readonly cause?: unknown;

  constructor(message: string, options?: FocusErrorOptions) {
    super(message);
    this.cause = options?.cause;
  }
}

/** Duration is not a positive whole number of minutes. Nothing changed. */
export class InvalidDurationError extends FocusError {
  readonly kind = "InvalidDuration";
  readonly code = FOCUS_ERROR_CODES.E_INVALID_DURATION;

  constructor(readonly received: unknown) {
    super(`INVALID_DURATION duration must be a positive integer of minutes, got ${String(received)}`);
    this.name = "InvalidDurationError";
  }
}

export class InvalidLimitError extends FocusError {
  readonly kind = "InvalidLimit";
  readonly code = FOCUS_ERROR_CODES.E_INVALID_LIMIT;

  constructor(readonly received: unknown) {
    super(`INVALID_LIMIT history limit must be a positive integer, got ${String(received)}`);
    this.name = "InvalidLimitError";
  }
}

export class InvalidStateError extends FocusError {
  readonly kind = "InvalidState";
  readonly code = FOCUS_ERROR_CODES.E_INVALID_STATE;

  constructor(
    readonly operation: string,
    readonly state: string
  ) {
    super(`INVALID_STATE ${operation} is not allowed while ${state}`);
    this.name = "InvalidStateError";
  }
}

export class StorageError extends FocusError {
  readonly kind = "Storage";
  readonly code = FOCUS_ERROR_CODES.E_STORAGE;

  constructor(message: string, options?: FocusErrorOptions) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** Audio cue failed. Reported, never fatal to the session. */
export class NotificationWarning extends FocusError {
  readonly kind = "NotificationWarning";
  readonly code = FOCUS_ERROR_CODES.E_NOTIFICATION;

  constructor(message: string, options?: FocusErrorOptions) {
    super(message, options);
    this.name = "NotificationWarning";
  }
}

export class ConfigurationError extends FocusError {
  readonly kind = "ConfigurationError";
  readonly code = FOCUS_ERROR_CODES.E_CONFIGURATION;

  constructor(message: string, options?: FocusErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export function isFocusError(value: unknown): value is FocusError {
  return value instanceof FocusError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
