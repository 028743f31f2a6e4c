import { z } from 'zod';
import { UploadError, toToolError } from './errors';
import { createLogger } from './logger';
import { type ContentVersionPayload, SalesforceClient, soqlString } from './SalesforceClient';
import type { UploadResult } from './types';

const log = createLogger('upload');

const ContentDocumentRecordSchema = z.object({ ContentDocumentId: z.string().nullable() });

export interface UploadOptions {
  title: string;
  /**
   * Attach the upload as a new version of this ContentDocument instead of
   * creating a new one. No tool passes it today.
   */
  linkToContentDocumentId?: string;
}

/**
 * Upload a PPTX as a ContentVersion, then look up the ContentDocument the
 * platform created for it. A failed follow-up lookup is reported as an upload
 * failure even though the version already exists; nothing is rolled back.
 */
export async function uploadContentVersion(
  client: SalesforceClient,
  content: Buffer,
  options: UploadOptions
): Promise<UploadResult> {
  const { title, linkToContentDocumentId } = options;

  const payload: ContentVersionPayload = {
    Title: title,
    PathOnClient: `${title}.pptx`,
    VersionData: content.toString('base64'),
    IsMajorVersion: true,
  };
  if (linkToContentDocumentId) {
    payload.ContentDocumentId = linkToContentDocumentId;
    log.info(`Creating new version for ContentDocument: ${linkToContentDocumentId}`);
  } else {
    log.info('Creating new ContentDocument');
  }

  try {
    log.info(`Uploading file to Salesforce: ${title}`);
    const created = await client.createContentVersion(payload);
    if (!created.success || !created.id) {
      throw new UploadError(`Upload failed: ${JSON.stringify(created)}`);
    }
    const contentVersionId = created.id;
    log.info(`Successfully uploaded file. ContentVersion ID: ${contentVersionId}`);

    const records = await client.query(
      `SELECT ContentDocumentId FROM ContentVersion WHERE Id = ${soqlString(contentVersionId)}`,
      ContentDocumentRecordSchema
    );
    const contentDocumentId = records[0]?.ContentDocumentId ?? null;

    return {
      success: true,
      contentVersionId,
      contentDocumentId,
      title,
      message: 'File uploaded successfully to Salesforce',
    };
  } catch (error) {
    const cause = toToolError(error);
    log.error(`Error uploading file to Salesforce: ${cause.message}`);
    if (cause instanceof UploadError) throw cause;
    throw new UploadError(`Upload to Salesforce failed: ${cause.message}`, { cause });
  }
}
