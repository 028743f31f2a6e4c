import { NetworkError, type SalesforceToolError, TemplateError, UploadError, toToolError } from './errors';
import { uploadContentVersion } from './CertificateUploader';
import { resolveFileId } from './FileIdResolver';
import { createLogger } from './logger';
import { rewriteCertificate } from './PptxTemplate';
import { SalesforceClient, type SalesforceClientOptions } from './SalesforceClient';
import { type ConnectionProvider, type Result, type SalesforceCredentials, type ToolOutput, err, ok } from './types';

const log = createLogger('tools');

export const PPTX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.presentationml.presentation';
export const BINARY_MIME_TYPE = 'application/octet-stream';

export const DEFAULT_COMPANY_NAME = 'Acme Corporation';
export const DEFAULT_TIER = 'Gold';
export const DEFAULT_CERTIFICATE_TITLE = 'Partner_Plus_Certificate';
export const ERROR_PREFIX = 'Error processing file from Salesforce: ';

export interface DownloadFileInput {
  fileId: string;
}

export interface GenerateCertificateInput {
  fileId: string;
  companyName: string;
  tier: string;
}

export interface UploadCertificateInput extends GenerateCertificateInput {
  uploadBack: boolean;
  title: string;
}

export interface FileToolDeps {
  connections: ConnectionProvider;
  clientOptions?: SalesforceClientOptions;
  /** Clock for the "Valid through" year */
  now?: () => Date;
}

export type PipelineStage = 'resolving' | 'retrieving' | 'rewriting' | 'uploading';

export type ToolResult = Result<ToolOutput, SalesforceToolError>;

const STAGE_FALLBACK: Record<PipelineStage, new (message: string, options?: { cause?: unknown }) => SalesforceToolError> = {
  resolving: NetworkError,
  retrieving: NetworkError,
  rewriting: TemplateError,
  uploading: UploadError,
};

/**
 * Run one tool invocation through its stages. Any failure ends the run, is
 * normalized to a typed error and returned, never thrown.
 */
async function runPipeline(
  toolName: string,
  body: (enter: (stage: PipelineStage) => void) => Promise<ToolOutput>
): Promise<ToolResult> {
  let stage: PipelineStage = 'resolving';
  const enter = (next: PipelineStage) => {
    stage = next;
    log.debug(`${toolName}: ${next}`);
  };

  try {
    const output = await body(enter);
    log.debug(`${toolName}: done`);
    return ok(output);
  } catch (error) {
    const failure = toToolError(error, STAGE_FALLBACK[stage]);
    log.error(`${toolName} failed while ${stage}: ${failure.message}`);
    return err(failure);
  }
}

async function connect(deps: FileToolDeps): Promise<SalesforceClient> {
  const credentials: SalesforceCredentials = await deps.connections.getCredentials();
  return new SalesforceClient(credentials, deps.clientOptions);
}

function today(deps: FileToolDeps): Date {
  return deps.now ? deps.now() : new Date();
}

/** Download a file as-is. */
export async function downloadFile(input: DownloadFileInput, deps: FileToolDeps): Promise<ToolResult> {
  return runPipeline('download_file', async (enter) => {
    const client = await connect(deps);
    const resolved = await resolveFileId(client, input.fileId);

    enter('retrieving');
    log.info(`Downloading file from: ${resolved.downloadUrl}`);
    const content = await client.download(resolved.downloadUrl);

    return { content, mimeType: BINARY_MIME_TYPE, resolved };
  });
}

/** Download a certificate template and fill in company, tier and validity year. */
export async function generateCertificate(input: GenerateCertificateInput, deps: FileToolDeps): Promise<ToolResult> {
  return runPipeline('generate_certificate', async (enter) => {
    const client = await connect(deps);
    const resolved = await resolveFileId(client, input.fileId);

    enter('retrieving');
    const original = await client.download(resolved.downloadUrl);

    enter('rewriting');
    const { content, stats } = await rewriteCertificate(original, {
      companyName: input.companyName.trim(),
      tier: input.tier.trim(),
      today: today(deps),
    });

    return { content, mimeType: PPTX_MIME_TYPE, resolved, stats };
  });
}

/**
 * Title used for the uploaded certificate. The default title is made unique
 * per company and tier; any other title is used verbatim.
 */
export function certificateTitle(title: string, companyName: string, tier: string): string {
  if (title !== DEFAULT_CERTIFICATE_TITLE) return title;
  const safeCompany = companyName.replace(/[ /]/g, '_');
  return `${DEFAULT_CERTIFICATE_TITLE}_${tier}_${safeCompany}`;
}

/**
 * Generate a certificate and, when `uploadBack` is set, store it in Salesforce
 * as a brand-new ContentDocument (never a new version of the template).
 */
export async function generateAndUploadCertificate(
  input: UploadCertificateInput,
  deps: FileToolDeps
): Promise<ToolResult> {
  return runPipeline('upload_certificate', async (enter) => {
    const companyName = input.companyName.trim();
    const tier = input.tier.trim();

    const client = await connect(deps);
    const resolved = await resolveFileId(client, input.fileId);

    enter('retrieving');
    const original = await client.download(resolved.downloadUrl);

    enter('rewriting');
    const { content, stats } = await rewriteCertificate(original, {
      companyName,
      tier,
      today: today(deps),
    });

    if (!input.uploadBack) {
      return { content, mimeType: PPTX_MIME_TYPE, resolved, stats };
    }

    enter('uploading');
    const upload = await uploadContentVersion(client, content, {
      title: certificateTitle(input.title.trim(), companyName, tier),
    });
    log.info(
      `Upload successful! ContentVersion ID: ${upload.contentVersionId}, ContentDocument ID: ${upload.contentDocumentId ?? 'unknown'}`
    );

    return { content, mimeType: PPTX_MIME_TYPE, resolved, stats, upload };
  });
}

/**
 * Collapse a tool result to the single byte payload hosts that only move
 * bytes expect: the document, or the UTF-8 error text.
 */
export function toResponseBytes(result: ToolResult): Buffer {
  if (result.ok) return result.value.content;
  return Buffer.from(`${ERROR_PREFIX}${result.error.message}`, 'utf-8');
}
