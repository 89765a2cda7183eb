/**
 * Error taxonomy shared by the poller, token generator and dispatcher.
 *
 * Each class maps onto one scheduling or retry decision:
 * - TransientNetworkError: retry at the next scheduled interval, no state change
 * - StaleKeyError: cached verification material is missing or past its TTL
 * - StaleAuthTokenError: the platform rejected the transaction token
 * - RateLimitError: back off, honouring the retry-after hint when present
 * - PersistenceError: the store operation failed, the current operation is abandoned
 * - DispatchFailure: a subscriber delivery attempt failed
 */

abstract class NotifyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

export class TransientNetworkError extends NotifyError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

export class StaleKeyError extends NotifyError {}

export class StaleAuthTokenError extends NotifyError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

export class RateLimitError extends NotifyError {
  public readonly status = 429

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

export class PersistenceError extends NotifyError {}

export class DispatchFailure extends NotifyError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

/**
 * Extracts a readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
