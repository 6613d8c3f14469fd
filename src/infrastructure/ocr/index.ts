export type { OcrProvider, AnalyzeOptions } from './types.js';
export {
  AzureDocumentIntelligenceProvider,
  createLayoutAnalysisClient,
  type LayoutAnalysisClient,
  type LayoutResponse,
} from './azure-document-intelligence.js';
export { PdfTextProvider } from './pdf-text.js';

import { ok, err, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import { missingSetting, type AppConfig } from '../../config.js';
import { AzureDocumentIntelligenceProvider, createLayoutAnalysisClient } from './azure-document-intelligence.js';
import { PdfTextProvider } from './pdf-text.js';
import type { OcrProvider } from './types.js';

export function createOcrProvider(config: AppConfig['ocr']): Result<OcrProvider, AppError> {
  switch (config.provider) {
    case 'pdf-text':
      return ok(new PdfTextProvider(config.maxFileSizeBytes));
    case 'azure': {
      if (!config.endpoint) return err(missingSetting('AZURE_DI_ENDPOINT', 'azure'));
      if (!config.key) return err(missingSetting('AZURE_DI_KEY', 'azure'));
      return ok(
        new AzureDocumentIntelligenceProvider(
          createLayoutAnalysisClient(config.endpoint, config.key),
          config.maxFileSizeBytes,
        ),
      );
    }
  }
}
