// Result types for adapter responses

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (not found)
  | { readonly success: false; readonly message: string };                        // Failure

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
