/**
 * Raised when the process environment cannot produce a usable configuration.
 * Startup must not continue past this error.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly variables: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
