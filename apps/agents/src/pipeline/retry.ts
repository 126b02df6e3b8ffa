import { setTimeout as delay } from "node:timers/promises";
import { MAX_SERVICE_ATTEMPTS } from "@adforge/shared";
import {
  EmptyArtifactError,
  ExternalServiceFailureError,
  ResponseUnparsableError,
  StoreFailureError,
  buildFailureMessage,
  isRetryable,
} from "./errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  if (ms > 0) {
    await delay(ms, undefined, { signal });
  }
};

export type AttemptContext = {
  attempt: number;
  /** True once a previous attempt came back unparsable; callers switch to the stricter template. */
  strict: boolean;
};

export type RetryOptions = {
  maxAttempts?: number;
  backoffMs: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number) => void;
};

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Runs `operation` up to three times. Unparsable responses retry immediately
 * with `strict` set; service failures and empty payloads back off
 * exponentially. Any other error propagates untouched.
 */
export async function withBoundedRetry<T>(
  operation: (context: AttemptContext) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const maxAttempts = Math.min(options.maxAttempts ?? MAX_SERVICE_ATTEMPTS, MAX_SERVICE_ATTEMPTS);
  const sleep = options.sleep ?? defaultSleep;
  let strict = false;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    options.signal?.throwIfAborted();

    try {
      return { ok: true, value: await operation({ attempt, strict }), attempts: attempt };
    } catch (error) {
      options.signal?.throwIfAborted();
      if (!isRetryable(error)) {
        throw error;
      }

      lastError = error;
      if (attempt === maxAttempts) {
        break;
      }

      options.onRetry?.(error, attempt);
      if (error instanceof ResponseUnparsableError) {
        strict = true;
      } else {
        await sleep(options.backoffMs * 2 ** (attempt - 1), options.signal);
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}

/**
 * Wraps a collaborator call so that whatever it throws (network errors,
 * timeouts, provider errors) surfaces as an ExternalServiceFailureError.
 */
export async function callService<T>(description: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof ExternalServiceFailureError || error instanceof EmptyArtifactError) {
      throw error;
    }
    throw new ExternalServiceFailureError(`${description} failed: ${buildFailureMessage(error)}`, {
      cause: error,
    });
  }
}

export async function callStore<T>(description: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw new StoreFailureError(`${description} failed: ${buildFailureMessage(error)}`, { cause: error });
  }
}
