/**
 * Error types raised by settings loading and generation backends.
 * Everything between those two edges is total and never throws.
 */

/**
 * A settings table breaks a structural contract (missing default, undeclared tier, ...)
 */
export class SettingsValidationError extends Error {
  constructor(
    public readonly file: string,
    public readonly reason: string
  ) {
    super(`Invalid settings in ${file}: ${reason}`);
    this.name = 'SettingsValidationError';
  }
}

/**
 * A generation backend could not produce text
 */
export class BackendTransportError extends Error {
  constructor(
    public readonly provider: string,
    public readonly causeMessage: string
  ) {
    super(`${provider} request failed: ${causeMessage}`);
    this.name = 'BackendTransportError';
  }
}

/**
 * A live provider was selected without the credentials it needs
 */
export class BackendConfigurationError extends Error {
  constructor(
    public readonly provider: string,
    public readonly missing: string
  ) {
    super(`${missing} required for ${provider} provider`);
    this.name = 'BackendConfigurationError';
  }
}

/** Fixed prefix of machine-checkable error strings returned by the orchestration layer */
export const ERROR_PREFIX = 'Error: ';

export function isErrorResponse(text: string): boolean {
  return text.startsWith(ERROR_PREFIX);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
