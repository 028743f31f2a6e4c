import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigError } from './errors';
import {
  BINARY_MIME_TYPE,
  PPTX_MIME_TYPE,
  type FileToolDeps,
  certificateTitle,
  downloadFile,
  generateAndUploadCertificate,
  generateCertificate,
  toResponseBytes,
} from './FileTools';
import { PptxTemplate } from './PptxTemplate';
import {
  API_BASE,
  CREDENTIALS,
  binaryResponse,
  jsonResponse,
  requestAt,
  stubFetch,
} from './testing/fetchStub';
import { buildPptx, slideXml, textShape } from './testing/pptxFixture';

const VERSION_ID = '068XXXXXXXXXXXXXXX';
const CERTIFICATE_TEXT = 'Certificate for <Company>, Tier: <Tier>. Valid through 31 December 2019.';

function depsWith(fetchMock: ReturnType<typeof stubFetch>): FileToolDeps {
  return {
    connections: { getCredentials: async () => CREDENTIALS },
    clientOptions: { fetch: fetchMock },
    now: () => new Date(2025, 2, 1),
  };
}

async function firstRunText(content: Buffer): Promise<string> {
  const doc = await PptxTemplate.createFromBuffer(content);
  return doc.getSlides()[0].shapes[0].paragraphs[0].runs[0].text;
}

describe('FileTools', () => {
  let template: Buffer;

  beforeEach(async () => {
    template = await buildPptx([slideXml([textShape('Certificate', [[CERTIFICATE_TEXT]])])]);
  });

  describe('downloadFile', () => {
    it('should download a ContentVersion directly from its blob endpoint', async () => {
      const fetchMock = stubFetch(binaryResponse(Buffer.from('raw file')));

      const result = await downloadFile({ fileId: VERSION_ID }, depsWith(fetchMock));

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(requestAt(fetchMock, 0).url).toBe(`${API_BASE}/sobjects/ContentVersion/${VERSION_ID}/VersionData`);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.content.toString()).toBe('raw file');
      expect(result.value.mimeType).toBe(BINARY_MIME_TYPE);
      expect(result.value.resolved.kind).toBe('ContentVersion');
    });

    it('should return NotFound for a ContentDocument without a current version', async () => {
      const fetchMock = stubFetch(jsonResponse({ totalSize: 0, done: true, records: [] }));

      const result = await downloadFile({ fileId: '069EMPTY' }, depsWith(fetchMock));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('NotFound');
      expect(toResponseBytes(result).toString('utf-8')).toBe(
        'Error processing file from Salesforce: No file found with ContentDocument ID: 069EMPTY'
      );
    });

    it('should return a configuration error from the connection provider', async () => {
      const deps: FileToolDeps = {
        connections: {
          getCredentials: async () => {
            throw new ConfigError('Salesforce connection is not configured: SALESFORCE_ACCESS_TOKEN: not set');
          },
        },
      };

      const result = await downloadFile({ fileId: VERSION_ID }, deps);

      expect(result).toMatchObject({ ok: false, error: { kind: 'ConfigError' } });
    });
  });

  describe('generateCertificate', () => {
    it('should fill the template with the given values', async () => {
      const fetchMock = stubFetch(binaryResponse(template));

      const result = await generateCertificate(
        { fileId: VERSION_ID, companyName: '  Acme ', tier: 'Gold' },
        depsWith(fetchMock)
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.mimeType).toBe(PPTX_MIME_TYPE);
      expect(result.value.stats).toEqual({ slides: 1, shapes: 1, runsChanged: 1 });
      expect(await firstRunText(result.value.content)).toBe(
        'Certificate for Acme, Tier: Gold. Valid through 31 December 2025.'
      );
      expect(toResponseBytes(result)).toBe(result.value.content);
    });

    it('should not fall back to the original bytes when the download is not a presentation', async () => {
      const fetchMock = stubFetch(binaryResponse(Buffer.from('plain text, not a zip')));

      const result = await generateCertificate({ fileId: VERSION_ID, companyName: 'Acme', tier: 'Gold' }, depsWith(fetchMock));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('TemplateError');
      expect(toResponseBytes(result).toString('utf-8')).toMatch(
        /^Error processing file from Salesforce: Cannot open presentation: /
      );
    });

    it('should keep the HTTP status of a failed download', async () => {
      const fetchMock = stubFetch(new Response('missing', { status: 404 }));

      const result = await generateCertificate({ fileId: VERSION_ID, companyName: 'Acme', tier: 'Gold' }, depsWith(fetchMock));

      expect(result).toMatchObject({ ok: false, error: { kind: 'HttpError', status: 404 } });
    });

    it('should reject an unknown ID before any request', async () => {
      const fetchMock = stubFetch();

      const result = await generateCertificate({ fileId: '001ACCOUNT', companyName: 'Acme', tier: 'Gold' }, depsWith(fetchMock));

      expect(result).toMatchObject({ ok: false, error: { kind: 'InvalidIdentifierFormat' } });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('generateAndUploadCertificate', () => {
    it('should upload under a title derived from tier and company', async () => {
      const fetchMock = stubFetch(
        jsonResponse({ records: [{ Id: VERSION_ID }] }),
        binaryResponse(template),
        jsonResponse({ id: '068NEW', success: true, errors: [] }, 201),
        jsonResponse({ records: [{ ContentDocumentId: '069NEW' }] })
      );

      const result = await generateAndUploadCertificate(
        {
          fileId: '069TEMPLATE',
          companyName: ' Acme Co/Ltd ',
          tier: 'Platinum',
          uploadBack: true,
          title: 'Partner_Plus_Certificate',
        },
        depsWith(fetchMock)
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.upload).toEqual({
        success: true,
        contentVersionId: '068NEW',
        contentDocumentId: '069NEW',
        title: 'Partner_Plus_Certificate_Platinum_Acme_Co_Ltd',
        message: 'File uploaded successfully to Salesforce',
      });

      const payload = JSON.parse(requestAt(fetchMock, 2).body ?? '');
      expect(payload.Title).toBe('Partner_Plus_Certificate_Platinum_Acme_Co_Ltd');
      expect(payload.PathOnClient).toBe('Partner_Plus_Certificate_Platinum_Acme_Co_Ltd.pptx');
      expect(payload.ContentDocumentId).toBeUndefined();
      expect(payload.VersionData).toBe(result.value.content.toString('base64'));
      expect(await firstRunText(result.value.content)).toBe(
        'Certificate for Acme Co/Ltd, Tier: Platinum. Valid through 31 December 2025.'
      );
    });

    it('should skip the upload when it is turned off', async () => {
      const fetchMock = stubFetch(binaryResponse(template));

      const result = await generateAndUploadCertificate(
        { fileId: VERSION_ID, companyName: 'Acme', tier: 'Gold', uploadBack: false, title: 'Partner_Plus_Certificate' },
        depsWith(fetchMock)
      );

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result.ok && result.value.upload).toBeUndefined();
    });

    it('should return an upload error instead of the document when the upload fails', async () => {
      const fetchMock = stubFetch(binaryResponse(template), new Response('denied', { status: 403 }));

      const result = await generateAndUploadCertificate(
        { fileId: VERSION_ID, companyName: 'Acme', tier: 'Gold', uploadBack: true, title: 'Quarterly' },
        depsWith(fetchMock)
      );

      expect(result).toMatchObject({ ok: false, error: { kind: 'UploadError' } });
      expect(JSON.parse(requestAt(fetchMock, 1).body ?? '').Title).toBe('Quarterly');
    });
  });

  it('should only derive a title from the default one', () => {
    expect(certificateTitle('Partner_Plus_Certificate', 'Acme Corporation', 'Gold')).toBe(
      'Partner_Plus_Certificate_Gold_Acme_Corporation'
    );
    expect(certificateTitle('Custom Title', 'Acme Corporation', 'Gold')).toBe('Custom Title');
  });
});
