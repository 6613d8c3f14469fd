import type { ExtractionMetadata, FormRecord } from '../../domain/types.js';
import type { GenerationTracer } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import type { OcrProvider } from '../../infrastructure/ocr/types.js';
import type { WrittenOutputs } from '../../infrastructure/output-writer.js';
import type { FieldCorrection } from '../corrections/index.js';
import type { LabelStyle, ValidationReport } from '../validation/index.js';

export interface ProcessingDeps {
  ocr: OcrProvider;
  llm: LLMProvider;
  tracer: GenerationTracer;
}

export interface ProcessDocumentInput {
  document: Buffer;
  filename: string;
  documentId?: string;
  /** Where output files go; nothing is written when absent. */
  outputDir?: string;
  includeCorrections?: boolean;
  labels?: LabelStyle;
  currentYear?: number;
}

export interface ProcessingResult {
  documentId: string;
  filename: string;
  ocrText: string;
  ocr: { provider: string; pageCount: number };
  form: FormRecord;
  rawExtraction: Record<string, unknown>;
  metadata: ExtractionMetadata;
  report: ValidationReport;
  corrections?: FieldCorrection[];
  outputs?: WrittenOutputs;
}
