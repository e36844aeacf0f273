/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   *
   * @param error - Error of unknown type
   * @returns String representation of error message
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /** Wraps a caught value so it can be stored or rethrown as an `Error`. */
  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }
}
