/**
 * Environment detection utilities.
 */
export class EnvironmentUtils {
  /**
   * Checks if the application is running under a test runner, in which case
   * the CLI entry point does not start on import.
   */
  static isTestEnvironment(): boolean {
    return (
      process.env.NODE_ENV === 'test' ||
      !!process.env.VITEST ||
      !!process.env.JEST_WORKER_ID
    );
  }
}
