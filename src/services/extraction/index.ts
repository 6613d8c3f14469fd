import { randomUUID } from 'node:crypto';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { normalizeExtractedForm } from '../../domain/schemas.js';
import { logger } from '../../infrastructure/logger.js';
import type { LLMProvider, LLMResponse } from '../../infrastructure/llm/types.js';
import { SYSTEM_MESSAGE, buildExtractionPrompt } from '../../prompts/index.js';
import type { ExtractionContext, ExtractionDeps, ExtractionResult } from './types.js';

export type { ExtractionResult, ExtractionDeps, ExtractionContext } from './types.js';

const log = logger.child({ module: 'extraction' });

export async function extractFormData(
  deps: ExtractionDeps,
  ocrText: string,
  context: ExtractionContext = {},
): Promise<Result<ExtractionResult, AppError>> {
  const ctx = { documentId: context.documentId, provider: deps.llm.name, step: 'extracting' };

  log.info({ ...ctx, ocrLength: ocrText.length }, 'Starting field extraction');

  const userPrompt = buildExtractionPrompt(ocrText);
  const startTime = new Date();

  const llmResult = await callLlm(deps.llm, userPrompt, ctx);
  if (!llmResult.ok) return llmResult;

  const { response, parsed } = llmResult.value;

  deps.tracer.traceGeneration({
    traceId: context.documentId ?? randomUUID(),
    name: 'form283-extraction',
    model: response.model,
    input: userPrompt,
    output: response.content,
    startTime,
    endTime: new Date(),
    usage: {
      input: response.usage.promptTokens,
      output: response.usage.completionTokens,
      total: response.usage.totalTokens,
    },
    metadata: { provider: deps.llm.name, filename: context.filename },
  });

  const normalized = normalizeExtractedForm(parsed);
  if (!normalized.ok) {
    log.error(
      { ...ctx, errorCode: normalized.error.code, retryable: false, details: normalized.error.details },
      'Extracted JSON does not match the form schema',
    );
    return normalized;
  }

  const result: ExtractionResult = {
    form: normalized.value,
    rawExtraction: parsed,
    rawResponse: response.content,
    metadata: {
      provider: deps.llm.name,
      model: response.model,
      promptTokens: response.usage.promptTokens,
      completionTokens: response.usage.completionTokens,
      totalTokens: response.usage.totalTokens,
      temperature: deps.llm.temperature,
      latencyMs: response.latencyMs,
    },
  };

  log.info(
    { ...ctx, model: response.model, latencyMs: response.latencyMs, totalTokens: response.usage.totalTokens },
    'Field extraction completed',
  );

  return ok(result);
}

async function callLlm(
  llm: LLMProvider,
  userPrompt: string,
  ctx: Record<string, unknown>,
): Promise<Result<{ response: LLMResponse; parsed: Record<string, unknown> }, AppError>> {
  const chatResult = await llm.chat(SYSTEM_MESSAGE, userPrompt, { responseFormat: 'json' });
  if (!chatResult.ok) return chatResult;

  const parsed = tryParseJson(chatResult.value.content);
  if (parsed) {
    return ok({ response: chatResult.value, parsed });
  }

  log.warn({ ...ctx, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE }, 'LLM returned malformed JSON, retrying once');

  const retryResult = await llm.chat(SYSTEM_MESSAGE, userPrompt, { responseFormat: 'json' });
  if (!retryResult.ok) return retryResult;

  const retryParsed = tryParseJson(retryResult.value.content);
  if (retryParsed) {
    return ok({ response: retryResult.value, parsed: retryParsed });
  }

  log.error({ ...ctx, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'LLM returned malformed JSON on both attempts');
  return err(
    createAppError(
      ErrorCode.LLM_MALFORMED_RESPONSE,
      'LLM returned invalid JSON on both attempts',
      false,
      retryResult.value.content,
    ),
  );
}

function tryParseJson(content: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(content);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
