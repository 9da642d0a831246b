// Result types for service responses

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (not found)
  | { readonly success: false; readonly message: string };                        // Failure

export enum MergeRunStatus {
  COMPLETED = 'COMPLETED',
  NO_OUTPUT = 'NO_OUTPUT',
  ABORTED = 'ABORTED'
}

export interface MergeRunSummary {
  status: MergeRunStatus;
  processedFiles: number;
  errorFiles: number;
  recordCount: number;
  outputPath?: string;
}

// ============================================================================
// Type Guards - Shared utility functions for type narrowing
// ============================================================================

/**
 * Type guard to check if Result has data (success with data case).
 * Narrows type to { readonly success: true; readonly data: T; readonly message: string }
 */
export function isSuccess<T>(result: Result<T>): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success && 'data' in result;
}

/**
 * Type guard to check if Result is not found (success without data case).
 * Narrows type to { readonly success: true; readonly message: string }
 */
export function isNotFound<T>(result: Result<T>): result is { readonly success: true; readonly message: string } {
  return result.success && !('data' in result);
}

/**
 * Type guard to check if Result is a failure.
 * Narrows type to { readonly success: false; readonly message: string }
 */
export function isFailure<T>(result: Result<T>): result is { readonly success: false; readonly message: string } {
  return !result.success;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Message plus stack trace, when one is available.
 */
export function formatDiagnostic(error: unknown): string {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }
  return describeError(error);
}
