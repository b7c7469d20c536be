import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { CHECK_IDS } from '@catalogsync/sync-core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed JSON
 * value. The result still has to go through the schema.
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const bearerAuth = z
  .object({
    type: z.literal('bearer'),
    token: z.string().min(1),
  })
  .strict();

const clientCredentialsAuth = z
  .object({
    type: z.literal('client_credentials'),
    tokenUrl: z.string().url(),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    scope: z.string().min(1).optional(),
  })
  .strict();

export const catalogAuthSchema = z.discriminatedUnion('type', [bearerAuth, clientCredentialsAuth]);

const catalogSchema = z
  .object({
    baseUrl: z.string().url(),
    database: z.string().min(1),
    auth: catalogAuthSchema,
    reviewStatus: z.string().min(1).default('REVIEW'),
  })
  .strict();

const directorySchema = z
  .object({
    baseUrl: z.string().url(),
    /** Public people pages, used for the directory page link */
    webBaseUrl: z.string().url(),
    accessKey: z.string().min(1),
  })
  .strict();

const retrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(2),
    delayMs: z.number().int().min(0).default(5_000),
    backoff: z.number().min(1).default(1),
  })
  .strict();

const httpSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(60_000),
    rateLimitDelayMs: z.number().int().min(0).default(1_000),
    retry: retrySchema.default({}),
  })
  .strict();

const runSchema = z
  .object({
    checks: z.array(z.enum(CHECK_IDS)).min(1).default([...CHECK_IDS]),
    interCallDelayMs: z.number().int().min(0).default(1_000),
    reportDir: z.string().min(1).default('reports'),
    mappingDir: z.string().min(1).default('mappings'),
    auditDir: z.string().min(1).optional(),
    dryRun: z.boolean().default(false),
  })
  .strict();

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  })
  .strict();

export const configFileSchema = z
  .object({
    catalog: catalogSchema,
    directory: directorySchema,
    http: httpSchema.default({}),
    run: runSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.run.checks.forEach((id, i) => {
      if (seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate check id: ${id}`,
          path: ['run', 'checks', i],
        });
      }
      seen.add(id);
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
export type CatalogAuthConfig = z.infer<typeof catalogAuthSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid configuration:\n${issues}`;
}

/** Expand env vars in raw JSON text and validate it */
export function parseConfig(content: string, options?: EnvExpansionOptions): ConfigFile {
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(content, options);
}
