import { SessionCancelledError } from "../errors.js";

export function toError(maybeError: unknown): Error {
  if (maybeError instanceof Error) {
    return maybeError;
  }

  if (typeof maybeError === "object" && maybeError !== null && "message" in maybeError) {
    return new Error(String(maybeError.message));
  }

  return new Error(String(maybeError));
}

/**
 * The error a wait should reject with once `signal` has fired.
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new SessionCancelledError();
}
