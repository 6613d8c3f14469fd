import type { AppConfig } from './config.js';
import { ok, type Result } from './domain/result.js';
import type { AppError } from './domain/errors.js';
import { createTracer } from './infrastructure/langfuse.js';
import { createLLMProvider } from './infrastructure/llm/index.js';
import { createOcrProvider } from './infrastructure/ocr/index.js';
import type { ProcessingDeps } from './services/processing/index.js';

/** Builds the configured OCR and LLM providers and the tracer. */
export function createPipeline(config: AppConfig): Result<ProcessingDeps, AppError> {
  const ocr = createOcrProvider(config.ocr);
  if (!ocr.ok) return ocr;

  const llm = createLLMProvider(config.llm);
  if (!llm.ok) return llm;

  return ok({ ocr: ocr.value, llm: llm.value, tracer: createTracer(config.langfuse) });
}
