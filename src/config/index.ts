import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, LogLevel } from '../lib/logger';
import { AppError } from '../utils/app-error';

dotenv.config();

export type MissingReferencePolicy = 'fail' | 'preserve';

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NOTEREF_MISSING_REFERENCE: z.enum(['fail', 'preserve']).default('fail'),
  NOTEREF_MAX_DOCX_SIZE: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  NOTEREF_MAX_XML_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  NOTEREF_MAX_ZIP_ENTRIES: z.coerce.number().int().positive().default(1000),
});

export interface Config {
  logLevel: LogLevel;
  version: string;
  missingReference: MissingReferencePolicy;
  maxDocxSize: number;
  maxXmlSize: number;
  maxZipEntries: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw AppError.invalidConfig(`Invalid configuration: ${issues.join('; ')}`, parsed.error.issues);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    version: env.npm_package_version || '1.0.0',
    missingReference: parsed.data.NOTEREF_MISSING_REFERENCE,
    maxDocxSize: parsed.data.NOTEREF_MAX_DOCX_SIZE,
    maxXmlSize: parsed.data.NOTEREF_MAX_XML_SIZE,
    maxZipEntries: parsed.data.NOTEREF_MAX_ZIP_ENTRIES,
  };
}

let cached: Config | undefined;

/**
 * Configuration from the process environment, validated on first use so an
 * invalid value surfaces as INVALID_CONFIG where the caller handles errors.
 */
export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}

/** Drop the cached configuration so the next getConfig() re-reads the environment. */
export function resetConfig(): void {
  cached = undefined;
}
