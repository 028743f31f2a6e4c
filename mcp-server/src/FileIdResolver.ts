import { z } from 'zod';
import { InvalidIdentifierFormatError, NotFoundError } from './errors';
import { createLogger } from './logger';
import { SalesforceClient, soqlString } from './SalesforceClient';
import type { ResolvedFile, SalesforceFileKind } from './types';

const log = createLogger('resolver');

export const FILE_ID_PREFIXES: Record<SalesforceFileKind, string> = {
  ContentDocument: '069',
  ContentVersion: '068',
  Attachment: '00P',
};

const IdRecordSchema = z.object({ Id: z.string().min(1) });

export function detectFileKind(fileId: string): SalesforceFileKind | null {
  if (fileId.startsWith(FILE_ID_PREFIXES.ContentDocument)) return 'ContentDocument';
  if (fileId.startsWith(FILE_ID_PREFIXES.ContentVersion)) return 'ContentVersion';
  if (fileId.startsWith(FILE_ID_PREFIXES.Attachment)) return 'Attachment';
  return null;
}

/**
 * Turn a caller-supplied Salesforce ID into a download URL.
 *
 * ContentDocument IDs cost one query to find the latest ContentVersion;
 * the other two kinds map straight to their blob endpoints.
 */
export async function resolveFileId(client: SalesforceClient, rawFileId: string): Promise<ResolvedFile> {
  const fileId = rawFileId.trim();
  if (!fileId) {
    throw new InvalidIdentifierFormatError('file_id cannot be empty');
  }

  const kind = detectFileKind(fileId);
  switch (kind) {
    case 'ContentDocument': {
      log.info(`ContentDocument ID detected: ${fileId}`);
      const records = await client.query(
        `SELECT Id FROM ContentVersion WHERE ContentDocumentId = ${soqlString(fileId)} AND IsLatest = true`,
        IdRecordSchema
      );
      const latest = records[0];
      if (!latest) {
        throw new NotFoundError(`No file found with ContentDocument ID: ${fileId}`);
      }
      log.info(`Found ContentVersion ID: ${latest.Id}`);
      return {
        kind,
        fileId,
        downloadUrl: client.contentVersionDataUrl(latest.Id),
        contentVersionId: latest.Id,
        contentDocumentId: fileId,
      };
    }

    case 'ContentVersion':
      log.info(`ContentVersion ID detected: ${fileId}`);
      return {
        kind,
        fileId,
        downloadUrl: client.contentVersionDataUrl(fileId),
        contentVersionId: fileId,
      };

    case 'Attachment':
      log.info(`Attachment ID detected: ${fileId}`);
      return {
        kind,
        fileId,
        downloadUrl: client.attachmentBodyUrl(fileId),
      };

    default:
      throw new InvalidIdentifierFormatError(
        `Unknown Salesforce ID format: ${fileId}. ` +
          'Expected ContentDocument (069), ContentVersion (068), or Attachment (00P)'
      );
  }
}
