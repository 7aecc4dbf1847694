export function getErrorMessage(
  error: unknown,
  defaultMessage = "An unknown error occurred"
): string {
  return error instanceof Error ? error.message : defaultMessage;
}

export type SafeSuccess<T> = {
  success: true;
  data: T;
};

export type SafeError = {
  success: false;
  error?: unknown;
  errorMessage?: string;
};

export type Safe<T> = SafeSuccess<T> | SafeError;

export function safeSuccess<T>(data: T): SafeSuccess<T> {
  return { success: true, data: data };
}

/** Keeps the thrown value as `error`; `errorMessage` is what gets logged. */
export function safeError(error: unknown): SafeError {
  return {
    success: false,
    error,
    errorMessage: getErrorMessage(error, String(error)),
  };
}

/**
 * Runs a function (sync or async) and returns a safe result instead of throwing.
 *
 * Treats errors as data so the pipeline doesn't need large, nested try/catch blocks.
 *
 * @example
 * ```ts
 * const result = await safe(() => cache.get(key));
 *
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.errorMessage);
 * }
 * ```
 */
export async function safe<T>(fn: () => T | Promise<T>): Promise<Safe<T>> {
  try {
    return safeSuccess(await fn());
  } catch (error) {
    return safeError(error);
  }
}
