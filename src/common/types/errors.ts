/**
 * Base error shape for the application.
 * Domain errors are plain tagged objects carried through neverthrow Results.
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Best-effort message extraction for values caught from third-party code.
 */
export const errorMessage = (error: unknown): string => {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    if (typeof error.message === 'string') {
      return error.message;
    }
  }

  return String(error);
};
