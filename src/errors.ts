/**
 * Error taxonomy
 *
 * Every engine error is caller misuse: thrown synchronously, never retried.
 * Missing usage data is not an error (reads default to 0).
 */

export type ConfigurationErrorCode =
  | 'NO_LIMITS_CONFIGURED'
  | 'EMPTY_INTERVENTION_CATALOG'
  | 'UNKNOWN_APP'
  | 'INVALID_LIMIT'
  | 'INVALID_TIME'
  | 'INVALID_TRIGGER'
  | 'INVALID_SAMPLE'
  | 'INVALID_CATALOG';

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends EngineError {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export function isConfigurationError(
  error: unknown,
  code?: ConfigurationErrorCode
): error is ConfigurationError {
  return (
    error instanceof ConfigurationError &&
    (code === undefined || error.code === code)
  );
}
