import { z } from 'zod';
import { ok, err, type Result } from './domain/result.js';
import { createAppError, ErrorCode, type AppError } from './domain/errors.js';
import { formatIssues } from './domain/schemas.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const configSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().positive().default(3000),

  OCR_PROVIDER: z.enum(['azure', 'pdf-text']).default('azure'),
  AZURE_DI_ENDPOINT: optionalString,
  AZURE_DI_KEY: optionalString,

  LLM_PROVIDER: z.enum(['azure-openai', 'groq']).default('azure-openai'),
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_KEY: optionalString,
  AZURE_OPENAI_API_VERSION: z.string().default('2024-02-15-preview'),
  AZURE_OPENAI_DEPLOYMENT_NAME: z.string().default('gpt-4o'),
  GROQ_API_KEY: optionalString,
  LLM_MODEL: optionalString,

  MAX_FILE_SIZE_MB: z.coerce.number().positive().default(10),
  DATA_OUTPUT_DIR: z.string().default('data/output'),

  LANGFUSE_PUBLIC_KEY: optionalString,
  LANGFUSE_SECRET_KEY: optionalString,
  LANGFUSE_BASE_URL: z.string().url().default('https://cloud.langfuse.com'),
});

type RawConfig = z.infer<typeof configSchema>;

export interface AppConfig {
  logLevel: RawConfig['LOG_LEVEL'];
  port: number;
  ocr: {
    provider: RawConfig['OCR_PROVIDER'];
    endpoint?: string;
    key?: string;
    maxFileSizeBytes: number;
  };
  llm: {
    provider: RawConfig['LLM_PROVIDER'];
    model?: string;
    groqApiKey?: string;
    azure: {
      endpoint?: string;
      key?: string;
      apiVersion: string;
      deployment: string;
    };
  };
  outputDir: string;
  langfuse?: {
    publicKey: string;
    secretKey: string;
    baseUrl: string;
  };
}

/** Parses the process environment once; callers pass the result down explicitly. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, AppError> {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    return err(
      createAppError(ErrorCode.CONFIG_INVALID, 'Invalid environment configuration', false, formatIssues(parsed.error)),
    );
  }

  const raw = parsed.data;
  const langfuse =
    raw.LANGFUSE_PUBLIC_KEY && raw.LANGFUSE_SECRET_KEY
      ? { publicKey: raw.LANGFUSE_PUBLIC_KEY, secretKey: raw.LANGFUSE_SECRET_KEY, baseUrl: raw.LANGFUSE_BASE_URL }
      : undefined;

  return ok({
    logLevel: raw.LOG_LEVEL,
    port: raw.PORT,
    ocr: {
      provider: raw.OCR_PROVIDER,
      endpoint: raw.AZURE_DI_ENDPOINT,
      key: raw.AZURE_DI_KEY,
      maxFileSizeBytes: Math.round(raw.MAX_FILE_SIZE_MB * 1024 * 1024),
    },
    llm: {
      provider: raw.LLM_PROVIDER,
      model: raw.LLM_MODEL,
      groqApiKey: raw.GROQ_API_KEY,
      azure: {
        endpoint: raw.AZURE_OPENAI_ENDPOINT,
        key: raw.AZURE_OPENAI_KEY,
        apiVersion: raw.AZURE_OPENAI_API_VERSION,
        deployment: raw.AZURE_OPENAI_DEPLOYMENT_NAME,
      },
    },
    outputDir: raw.DATA_OUTPUT_DIR,
    langfuse,
  });
}

export function missingSetting(name: string, provider: string): AppError {
  return createAppError(
    ErrorCode.PROVIDER_CONFIG_MISSING,
    `${name} must be set to use the ${provider} provider`,
    false,
  );
}
