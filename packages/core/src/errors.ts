export type PdfShelfErrorCode = 'io' | 'config' | 'transport' | 'link';

export class PdfShelfError extends Error {
  readonly code: PdfShelfErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: PdfShelfErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PdfShelfError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Unreadable source, disk full, permission denied while copying into the vault.
 */
export class StoreIOError extends PdfShelfError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('io', message, details);
    this.name = 'StoreIOError';
  }
}

/**
 * Malformed rule set or invalid pass option. Always raised before any work starts.
 */
export class ConfigurationError extends PdfShelfError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('config', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Completion provider unreachable, non-2xx, timed out, or returned an unusable envelope.
 */
export class CompletionTransportError extends PdfShelfError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('transport', message, details);
    this.name = 'CompletionTransportError';
  }
}

export class LinkCreationError extends PdfShelfError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('link', message, details);
    this.name = 'LinkCreationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
