import { z } from 'zod';
import { DEFAULT_API_VERSION, DEFAULT_REQUEST_TIMEOUT_MS } from './config';
import {
  HttpError,
  InvalidResponseError,
  NetworkError,
  SalesforceToolError,
  TimeoutError,
} from './errors';
import { createLogger } from './logger';
import type { SalesforceCredentials } from './types';

const log = createLogger('client');

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface SalesforceClientOptions {
  apiVersion?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

const CreateResponseSchema = z.object({
  id: z.string().optional(),
  success: z.boolean(),
  errors: z.array(z.unknown()).optional(),
});

export type CreateResponse = z.infer<typeof CreateResponseSchema>;

export interface ContentVersionPayload {
  Title: string;
  PathOnClient: string;
  VersionData: string;
  IsMajorVersion: boolean;
  ContentDocumentId?: string;
}

/** Quote a value for use as a SOQL string literal. */
export function soqlString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export class SalesforceClient {
  private readonly _baseUrl: string;
  private readonly _accessToken: string;
  private readonly _timeoutMs: number;
  private readonly _fetch: FetchFn;

  constructor(credentials: SalesforceCredentials, options: SalesforceClientOptions = {}) {
    const apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this._baseUrl = `${credentials.instanceUrl.replace(/\/+$/, '')}/services/data/${apiVersion}`;
    this._accessToken = credentials.accessToken;
    this._timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this._fetch = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get baseUrl(): string {
    return this._baseUrl;
  }

  // ============================================================
  // URL builders
  // ============================================================

  queryUrl(soql: string): string {
    return `${this._baseUrl}/query?${new URLSearchParams({ q: soql }).toString()}`;
  }

  contentVersionDataUrl(contentVersionId: string): string {
    return `${this._baseUrl}/sobjects/ContentVersion/${encodeURIComponent(contentVersionId)}/VersionData`;
  }

  attachmentBodyUrl(attachmentId: string): string {
    return `${this._baseUrl}/sobjects/Attachment/${encodeURIComponent(attachmentId)}/Body`;
  }

  contentVersionCreateUrl(): string {
    return `${this._baseUrl}/sobjects/ContentVersion`;
  }

  // ============================================================
  // Requests
  // ============================================================

  /**
   * Run a SOQL query and return its records, each validated against `recordSchema`.
   * Only the first page is read.
   */
  async query<T>(soql: string, recordSchema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const url = this.queryUrl(soql);
    const body = await this.request(url, { method: 'GET' }, (response): Promise<unknown> => response.json());

    const parsed = z.object({ records: z.array(recordSchema) }).safeParse(body);
    if (!parsed.success) {
      throw new InvalidResponseError(`Unexpected query response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    return parsed.data.records;
  }

  /** Stream a binary endpoint fully into memory. */
  async download(url: string): Promise<Buffer> {
    const data = await this.request(
      url,
      { method: 'GET', headers: { Accept: '*/*' } },
      (response) => response.arrayBuffer()
    );
    const content = Buffer.from(data);
    log.info(`Retrieved ${content.length} bytes from ${url}`);
    return content;
  }

  async createContentVersion(payload: ContentVersionPayload): Promise<CreateResponse> {
    const url = this.contentVersionCreateUrl();
    const body = await this.request(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
      (response): Promise<unknown> => response.json()
    );

    const parsed = CreateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidResponseError(`Unexpected create response: ${JSON.stringify(body)}`);
    }
    return parsed.data;
  }

  /**
   * Issue one request and read its body with `read`. The timeout covers both the
   * response headers and the body, so a stalled download fails the same way a
   * stalled connect does.
   */
  private async request<T>(url: string, init: RequestInit, read: (response: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this._timeoutMs);

    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${this._accessToken}`);

    try {
      const response = await this._fetch(url, { ...init, headers, signal: controller.signal });
      if (!response.ok) {
        const text = await response.text().catch(() => '');
        throw new HttpError(response.status, stripQuery(url), text);
      }
      return await read(response);
    } catch (error) {
      if (timedOut) throw new TimeoutError(stripQuery(url), this._timeoutMs);
      if (error instanceof SalesforceToolError) throw error;
      if (error instanceof SyntaxError) {
        throw new InvalidResponseError(`Malformed JSON from ${stripQuery(url)}`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request to ${stripQuery(url)} failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// Query strings carry SOQL; keep them out of error text.
function stripQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.substring(0, index);
}
