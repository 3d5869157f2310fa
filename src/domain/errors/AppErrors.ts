/**
 * Base class for all domain errors.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when configuration is missing or invalid.
 */
export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Error thrown when the browser process cannot be started.
 */
export class BrowserLaunchError extends DomainError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Failed to launch browser: ${message}`);
  }
}

/**
 * Error thrown when the target page cannot be loaded.
 */
export class NavigationError extends DomainError {
  constructor(
    public readonly url: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Failed to navigate to ${url}: ${message}`);
  }
}

/**
 * Error thrown when the report cannot be persisted.
 */
export class ReportWriteError extends DomainError {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`Failed to write report to ${filePath}: ${message}`);
  }
}

/**
 * Extracts a readable message from anything thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
