import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  DEFAULT_CERTIFICATE_TITLE,
  DEFAULT_COMPANY_NAME,
  DEFAULT_TIER,
  ERROR_PREFIX,
  PPTX_MIME_TYPE,
  type FileToolDeps,
  type ToolResult,
  downloadFile,
  generateAndUploadCertificate,
  generateCertificate,
} from './FileTools';

// ============================================================
// Tool Definitions
// ============================================================

const FILE_ID_DESCRIPTION =
  'The Salesforce file ID. Supports ContentDocument (069), ContentVersion (068), or Attachment (00P) IDs';

export const tools: Tool[] = [
  {
    name: 'salesforce_download_file',
    description:
      'Download a file from Salesforce and return it as bytes. ContentDocument IDs resolve to their latest version.',
    inputSchema: {
      type: 'object',
      properties: {
        file_id: { type: 'string', description: FILE_ID_DESCRIPTION },
      },
      required: ['file_id'],
    },
  },
  {
    name: 'salesforce_generate_certificate',
    description:
      'Download a PowerPoint certificate template from Salesforce, replace <Company> and <Tier>, ' +
      'set the "Valid through" date to 31 December of the current year, and return the file.',
    inputSchema: {
      type: 'object',
      properties: {
        file_id: { type: 'string', description: FILE_ID_DESCRIPTION },
        company_name: {
          type: 'string',
          description: `Company name to replace the <Company> placeholder (default: ${DEFAULT_COMPANY_NAME})`,
        },
        tier: {
          type: 'string',
          description: `Tier level to replace the <Tier> placeholder, e.g. Silver, Gold, Platinum (default: ${DEFAULT_TIER})`,
        },
      },
      required: ['file_id'],
    },
  },
  {
    name: 'salesforce_upload_certificate',
    description:
      'Generate a certificate like salesforce_generate_certificate, then upload it to Salesforce ' +
      'as a new file and return it together with the new ContentVersion and ContentDocument IDs.',
    inputSchema: {
      type: 'object',
      properties: {
        file_id: { type: 'string', description: FILE_ID_DESCRIPTION },
        company_name: { type: 'string', description: 'Company name to replace the <Company> placeholder' },
        tier: { type: 'string', description: 'Tier level to replace the <Tier> placeholder' },
        upload_back_to_salesforce: {
          type: 'boolean',
          description: 'Upload the generated certificate to Salesforce (default: true)',
        },
        title: {
          type: 'string',
          description:
            `Title for the uploaded file (default: ${DEFAULT_CERTIFICATE_TITLE}, ` +
            'which is extended with the tier and company name)',
        },
      },
      required: ['file_id'],
    },
  },
];

// ============================================================
// Argument Schemas
// ============================================================

const DownloadArgsSchema = z.object({
  file_id: z.string({ required_error: 'file_id is required' }),
});

const GenerateArgsSchema = DownloadArgsSchema.extend({
  company_name: z.string().default(DEFAULT_COMPANY_NAME),
  tier: z.string().default(DEFAULT_TIER),
});

const UploadArgsSchema = GenerateArgsSchema.extend({
  upload_back_to_salesforce: z.boolean().default(true),
  title: z.string().default(DEFAULT_CERTIFICATE_TITLE),
});

// ============================================================
// Tool Handlers
// ============================================================

export async function handleToolCall(
  name: string,
  args: Record<string, unknown> | undefined,
  deps: FileToolDeps
): Promise<CallToolResult> {
  switch (name) {
    case 'salesforce_download_file': {
      const parsed = DownloadArgsSchema.safeParse(args ?? {});
      if (!parsed.success) return invalidArguments(name, parsed.error);

      const result = await downloadFile({ fileId: parsed.data.file_id }, deps);
      return toCallToolResult(name, result);
    }

    case 'salesforce_generate_certificate': {
      const parsed = GenerateArgsSchema.safeParse(args ?? {});
      if (!parsed.success) return invalidArguments(name, parsed.error);

      const result = await generateCertificate(
        {
          fileId: parsed.data.file_id,
          companyName: parsed.data.company_name,
          tier: parsed.data.tier,
        },
        deps
      );
      return toCallToolResult(name, result);
    }

    case 'salesforce_upload_certificate': {
      const parsed = UploadArgsSchema.safeParse(args ?? {});
      if (!parsed.success) return invalidArguments(name, parsed.error);

      const result = await generateAndUploadCertificate(
        {
          fileId: parsed.data.file_id,
          companyName: parsed.data.company_name,
          tier: parsed.data.tier,
          uploadBack: parsed.data.upload_back_to_salesforce,
          title: parsed.data.title,
        },
        deps
      );
      return toCallToolResult(name, result);
    }

    default:
      return error(`Unknown tool: ${name}`);
  }
}

// ============================================================
// Helper Functions
// ============================================================

function toCallToolResult(toolName: string, result: ToolResult): CallToolResult {
  if (!result.ok) {
    return error(`${ERROR_PREFIX}${result.error.message}`, result.error.kind);
  }

  const { content, mimeType, resolved, stats, upload } = result.value;
  let fileName = resolved.fileId;
  if (upload) fileName = `${upload.title}.pptx`;
  else if (mimeType === PPTX_MIME_TYPE) fileName = `${resolved.fileId}.pptx`;

  return {
    content: [
      {
        type: 'resource',
        resource: {
          uri: `salesforce://${resolved.kind}/${encodeURIComponent(fileName)}`,
          mimeType,
          blob: content.toString('base64'),
        },
      },
      {
        type: 'text',
        text: JSON.stringify(
          {
            tool: toolName,
            size_bytes: content.length,
            mime_type: mimeType,
            file: {
              kind: resolved.kind,
              file_id: resolved.fileId,
              content_version_id: resolved.contentVersionId ?? null,
              content_document_id: resolved.contentDocumentId ?? null,
            },
            ...(stats && { rewrite: { slides: stats.slides, shapes: stats.shapes, runs_changed: stats.runsChanged } }),
            ...(upload && {
              upload: {
                success: upload.success,
                content_version_id: upload.contentVersionId,
                content_document_id: upload.contentDocumentId,
                title: upload.title,
                message: upload.message,
              },
            }),
          },
          null,
          2
        ),
      },
    ],
  };
}

function invalidArguments(toolName: string, issues: z.ZodError): CallToolResult {
  const details = issues.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ');
  return error(`Invalid arguments for ${toolName}: ${details}`, 'InvalidArguments');
}

function error(message: string, kind?: string): CallToolResult {
  return {
    content: [
      { type: 'text', text: message },
      { type: 'text', text: JSON.stringify({ error: message, ...(kind ? { kind } : {}) }) },
    ],
    isError: true,
  };
}
