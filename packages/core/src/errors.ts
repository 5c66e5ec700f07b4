/**
 * @relaykit/core — Typed Errors
 */

import type { RegistryCategory } from './types.js';

/**
 * Base error class for all pipeline errors.
 */
export class RelayError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Thrown when a generator, formatter or delivery tag has no registration.
 */
export class UnknownTagError extends RelayError {
  public readonly category: RegistryCategory;
  public readonly tag: string;

  constructor(category: RegistryCategory, tag: string) {
    super(`Unknown ${category} tag: ${tag}`, 'UNKNOWN_TAG');
    this.name = 'UnknownTagError';
    this.category = category;
    this.tag = tag;
  }
}

/**
 * Thrown when input data is missing required fields or has the wrong shape.
 */
export class InvalidPayloadError extends RelayError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_PAYLOAD', details);
    this.name = 'InvalidPayloadError';
  }
}

/**
 * Thrown by recipient validators. Delivery strategies convert it into a
 * failed DeliveryResult; it never escapes a strategy.
 */
export class InvalidRecipientError extends RelayError {
  constructor(message: string, recipient?: string) {
    super(message, 'INVALID_RECIPIENT', recipient === undefined ? undefined : { recipient });
    this.name = 'InvalidRecipientError';
  }
}

/**
 * Thrown when a request is cancelled before any delivery started.
 */
export class RequestCancelledError extends RelayError {
  constructor(requestId: string) {
    super(`Request ${requestId} was cancelled`, 'REQUEST_CANCELLED', { requestId });
    this.name = 'RequestCancelledError';
  }
}

/**
 * Thrown by validateConfig on fatal misconfiguration.
 */
export class ConfigError extends RelayError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}

/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}
