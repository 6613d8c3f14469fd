import type { ExtractionMetadata, FormRecord } from '../../domain/types.js';
import type { GenerationTracer } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';

export interface ExtractionResult {
  form: FormRecord;
  /** The model's JSON before label resolution and trimming. */
  rawExtraction: Record<string, unknown>;
  rawResponse: string;
  metadata: ExtractionMetadata;
}

export interface ExtractionDeps {
  llm: LLMProvider;
  tracer: GenerationTracer;
}

export interface ExtractionContext {
  documentId?: string;
  filename?: string;
}
