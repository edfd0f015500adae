/**
 * A centralized logging service that provides level-based logging and can be
 * controlled via environment variables.
 *
 * Every level writes to stderr so that stdout only ever carries the decoded
 * accounts.
 */

let debugEnabled = process.env.OTP_DEBUG_LOGGING === "true";

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/** Overrides `OTP_DEBUG_LOGGING`, e.g. for the `--debug` flag. */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export const logger = {
  /**
   * Logs a debug message. This will only be output to the console
   * if `OTP_DEBUG_LOGGING` is set to `true` in the environment.
   * @param message The primary message to log.
   * @param optionalParams Additional objects or values to log.
   */
  debug: (message?: unknown, ...optionalParams: unknown[]): void => {
    if (debugEnabled) {
      console.error(message, ...optionalParams);
    }
  },

  /**
   * Logs a warning message to the console.
   */
  warn: (message?: unknown, ...optionalParams: unknown[]): void => {
    console.warn(message, ...optionalParams);
  },

  /**
   * Logs an error message to the console.
   */
  error: (message?: unknown, ...optionalParams: unknown[]): void => {
    console.error(message, ...optionalParams);
  },
};
