import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';
import type { ConnectionProvider, SalesforceCredentials } from './types';

export const DEFAULT_API_VERSION = 'v58.0';
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

const ConfigSchema = z.object({
  SALESFORCE_API_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, 'must look like v58.0')
    .default(DEFAULT_API_VERSION),
  SALESFORCE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

const CredentialsSchema = z.object({
  SALESFORCE_INSTANCE_URL: z
    .string({ required_error: 'not set' })
    .url('must be a URL')
    .transform((url) => url.replace(/\/+$/, '')),
  SALESFORCE_ACCESS_TOKEN: z.string({ required_error: 'not set' }).min(1, 'must not be empty'),
});

export interface ServerConfig {
  apiVersion: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/** Read `.env` (if any) into process.env without overriding what is already set. */
export function loadDotenv(): void {
  dotenv.config();
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return {
    apiVersion: parsed.data.SALESFORCE_API_VERSION,
    requestTimeoutMs: parsed.data.SALESFORCE_REQUEST_TIMEOUT_MS,
    logLevel: parsed.data.LOG_LEVEL,
  };
}

/**
 * Credentials from the environment, re-read on every call so an externally
 * refreshed token is picked up without a restart.
 */
export class EnvConnectionProvider implements ConnectionProvider {
  constructor(private readonly env: Env = process.env) {}

  async getCredentials(): Promise<SalesforceCredentials> {
    const parsed = CredentialsSchema.safeParse(this.env);
    if (!parsed.success) {
      throw new ConfigError(`Salesforce connection is not configured: ${formatIssues(parsed.error)}`);
    }
    return {
      instanceUrl: parsed.data.SALESFORCE_INSTANCE_URL,
      accessToken: parsed.data.SALESFORCE_ACCESS_TOKEN,
    };
  }
}
