/**
 * Collector error taxonomy
 * Configuration errors abort startup; transport and store errors abort the run.
 * Decode failures and filter rejections are not errors and never reach here.
 */

export type CollectorErrorCode =
  | 'CONFIGURATION'
  | 'UNSUPPORTED_FEATURE'
  | 'TRANSPORT'
  | 'STORE';

export class CollectorError extends Error {
  readonly code: CollectorErrorCode;

  constructor(code: CollectorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectorError';
    this.code = code;
  }
}

export class ConfigurationError extends CollectorError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

export class UnsupportedFeatureError extends CollectorError {
  constructor(message: string) {
    super('UNSUPPORTED_FEATURE', message);
    this.name = 'UnsupportedFeatureError';
  }
}

export class TransportError extends CollectorError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT', message, { cause });
    this.name = 'TransportError';
  }
}

export class StoreError extends CollectorError {
  readonly statement?: string;

  constructor(message: string, statement?: string, cause?: unknown) {
    super('STORE', message, { cause });
    this.name = 'StoreError';
    this.statement = statement;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
