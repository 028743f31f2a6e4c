export type ToolErrorKind =
  | 'InvalidIdentifierFormat'
  | 'NotFound'
  | 'HttpError'
  | 'TimeoutError'
  | 'NetworkError'
  | 'InvalidResponse'
  | 'TemplateError'
  | 'UploadError'
  | 'ConfigError';

export abstract class SalesforceToolError extends Error {
  abstract readonly kind: ToolErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidIdentifierFormatError extends SalesforceToolError {
  readonly kind = 'InvalidIdentifierFormat';
}

export class NotFoundError extends SalesforceToolError {
  readonly kind = 'NotFound';
}

export class HttpError extends SalesforceToolError {
  readonly kind = 'HttpError';
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(status: number, url: string, body: string) {
    super(`HTTP ${status} from ${url}${body ? `: ${body.substring(0, 300)}` : ''}`);
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

export class TimeoutError extends SalesforceToolError {
  readonly kind = 'TimeoutError';
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class NetworkError extends SalesforceToolError {
  readonly kind = 'NetworkError';
}

export class InvalidResponseError extends SalesforceToolError {
  readonly kind = 'InvalidResponse';
}

export class TemplateError extends SalesforceToolError {
  readonly kind = 'TemplateError';
}

export class UploadError extends SalesforceToolError {
  readonly kind = 'UploadError';
}

export class ConfigError extends SalesforceToolError {
  readonly kind = 'ConfigError';
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return JSON.stringify(err) ?? String(err);
}

/**
 * Normalize anything thrown inside a tool pipeline. Errors that are already
 * part of the taxonomy pass through untouched; everything else is wrapped
 * using `fallback` so the pipeline boundary only ever sees typed errors.
 */
export function toToolError(
  err: unknown,
  fallback: new (message: string, options?: { cause?: unknown }) => SalesforceToolError = NetworkError
): SalesforceToolError {
  if (err instanceof SalesforceToolError) return err;
  return new fallback(describe(err), { cause: err });
}
