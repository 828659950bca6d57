import { DomainError, DomainErrorCode } from '../error-handling/errors';

export class DeadlineExceededError extends DomainError {
  constructor(
    public readonly timeoutMs: number,
    label = 'Operation'
  ) {
    super(`${label} exceeded deadline of ${timeoutMs}ms`, 504, undefined, DomainErrorCode.TIMEOUT, { timeoutMs });
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Runs `operation` with an abort signal that fires when the deadline passes.
 * The returned promise rejects with DeadlineExceededError at the deadline even if
 * the operation ignores the signal.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label?: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(timeoutMs, label);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
