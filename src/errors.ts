// ABOUTME: Error classes for fatal analyzer failures
// ABOUTME: Configuration and input errors abort a run before any report is produced

export type OgcUsageErrorCode = 'CONFIGURATION' | 'INPUT' | 'MALFORMED_LINE';

export class OgcUsageError extends Error {
  readonly code: OgcUsageErrorCode;

  constructor(code: OgcUsageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OgcUsageError';
    this.code = code;
  }
}

/**
 * Invalid time window, unknown service type or bad settings
 */
export class ConfigurationError extends OgcUsageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A log source could not be opened or read
 */
export class InputError extends OgcUsageError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('INPUT', message, options);
    this.name = 'InputError';
    this.source = source;
  }
}

export class MalformedLineError extends OgcUsageError {
  readonly reason: string;

  constructor(reason: string, message: string) {
    super('MALFORMED_LINE', message);
    this.name = 'MalformedLineError';
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
