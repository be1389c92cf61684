import { TransactionAbortedError, TransactionConflictError } from "./document-store";

export interface TransactionRetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export function retryDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * (2 ** Math.max(0, attempt - 1)), maxDelayMs);
}

export async function runWithTransactionRetry<T>(
  attempt: () => Promise<T>,
  options: TransactionRetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 5);
  const baseDelayMs = options.baseDelayMs ?? 20;
  const maxDelayMs = options.maxDelayMs ?? 1000;

  for (let attemptNumber = 1; ; attemptNumber += 1) {
    try {
      return await attempt();
    } catch (error) {
      if (!(error instanceof TransactionConflictError)) throw error;
      if (attemptNumber >= maxAttempts) throw new TransactionAbortedError(attemptNumber, { cause: error });
      const delay = retryDelayMs(attemptNumber, baseDelayMs, maxDelayMs);
      if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
