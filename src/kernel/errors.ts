/**
 * Error taxonomy shared by the scheduler, store, dispatcher and drivers.
 *
 * Provider and delivery errors stay inside the failing domain's task;
 * persistence and corruption errors degrade only that domain; command
 * errors go straight back to the user who issued the command.
 */

export type KernelErrorCode =
  | 'PROVIDER_TRANSIENT'
  | 'PROVIDER_UNAVAILABLE'
  | 'PERSISTENCE_FAILED'
  | 'DELIVERY_FAILED'
  | 'STATE_CORRUPT'
  | 'NO_CONTEXT'
  | 'INVALID_SUBSCRIPTION'
  | 'INVALID_COMMAND';

export class KernelError extends Error {
  constructor(
    message: string,
    public readonly code: KernelErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'KernelError';
  }
}

// ── Providers ────────────────────────────────────────────────────────────────

export class TransientProviderError extends KernelError {
  constructor(message: string, cause?: unknown, code: KernelErrorCode = 'PROVIDER_TRANSIENT') {
    super(message, code, cause);
    this.name = 'TransientProviderError';
  }
}

/** A data provider could not be reached or returned something unparseable. */
export class UnavailableError extends TransientProviderError {
  constructor(
    public readonly provider: string,
    message: string,
    cause?: unknown,
  ) {
    super(`${provider} unavailable: ${message}`, cause, 'PROVIDER_UNAVAILABLE');
    this.name = 'UnavailableError';
  }
}

// ── Persistence ──────────────────────────────────────────────────────────────

export class PersistenceError extends KernelError {
  constructor(
    public readonly domain: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Failed to persist ${domain}: ${message}`, 'PERSISTENCE_FAILED', cause);
    this.name = 'PersistenceError';
  }
}

export class StateCorruptionError extends KernelError {
  constructor(
    public readonly domain: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Corrupt state for ${domain}: ${message}`, 'STATE_CORRUPT', cause);
    this.name = 'StateCorruptionError';
  }
}

// ── Delivery ─────────────────────────────────────────────────────────────────

export class DeliveryError extends KernelError {
  constructor(
    public readonly sink: string,
    message: string,
    public readonly retryable: boolean,
    cause?: unknown,
  ) {
    super(`${sink} delivery failed: ${message}`, 'DELIVERY_FAILED', cause);
    this.name = 'DeliveryError';
  }
}

// ── User commands ────────────────────────────────────────────────────────────

export class NoContextError extends KernelError {
  constructor(message: string) {
    super(message, 'NO_CONTEXT');
    this.name = 'NoContextError';
  }
}

export class InvalidSubscriptionError extends KernelError {
  constructor(message: string) {
    super(message, 'INVALID_SUBSCRIPTION');
    this.name = 'InvalidSubscriptionError';
  }
}

export class InvalidCommandError extends KernelError {
  constructor(message: string) {
    super(message, 'INVALID_COMMAND');
    this.name = 'InvalidCommandError';
  }
}

/** Errors whose message is meant for the person who typed the command. */
export function isCommandError(
  error: unknown,
): error is NoContextError | InvalidSubscriptionError | InvalidCommandError {
  return (
    error instanceof NoContextError ||
    error instanceof InvalidSubscriptionError ||
    error instanceof InvalidCommandError
  );
}
