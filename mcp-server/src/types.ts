export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// Salesforce record kinds, keyed by the three-character key prefix of their IDs
export type SalesforceFileKind = 'ContentDocument' | 'ContentVersion' | 'Attachment';

export interface ResolvedFile {
  kind: SalesforceFileKind;
  /** The identifier as supplied by the caller (trimmed) */
  fileId: string;
  downloadUrl: string;
  /** Set for ContentDocument and ContentVersion lookups */
  contentVersionId?: string;
  /** Set only when the caller passed a ContentDocument ID */
  contentDocumentId?: string;
}

export interface SalesforceCredentials {
  /** Instance base URL without trailing slash */
  instanceUrl: string;
  accessToken: string;
}

/** Supplies fresh credentials for every tool call; implementations must not cache on our behalf. */
export interface ConnectionProvider {
  getCredentials(): Promise<SalesforceCredentials>;
}

export interface TemplateValues {
  companyName: string;
  tier: string;
  /** Source of the "Valid through" year */
  today: Date;
}

export interface RewriteStats {
  slides: number;
  shapes: number;
  runsChanged: number;
}

export interface UploadResult {
  success: true;
  contentVersionId: string;
  contentDocumentId: string | null;
  title: string;
  message: string;
}

export interface ToolOutput {
  content: Buffer;
  mimeType: string;
  resolved: ResolvedFile;
  stats?: RewriteStats;
  upload?: UploadResult;
}
