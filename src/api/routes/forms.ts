import { Router, type Request, type Response } from 'express';
import { formatIssues, processFormInput, toHebrewForm, validateFormInput } from '../../domain/schemas.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import { processDocument, type ProcessingDeps } from '../../services/processing/index.js';
import { toReportJson, validateForm } from '../../services/validation/index.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';

export interface FormsRouterDeps {
  /** An error here (missing provider settings) is reported on each processing request. */
  pipeline: Result<ProcessingDeps, AppError>;
  outputDir: string;
}

export function createFormsRouter(deps: FormsRouterDeps): Router {
  const router = Router();

  router.post('/forms/validate', (req: Request, res: Response) => {
    const parsed = validateFormInput.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', formatIssues(parsed.error)));
      return;
    }

    const { form, currentYear, labels } = parsed.data;
    const result = validateForm(form, { currentYear });
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse({ validationReport: toReportJson(result.value, labels) }));
  });

  router.post('/forms/process', async (req: Request, res: Response) => {
    const parsed = processFormInput.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', formatIssues(parsed.error)));
      return;
    }

    if (!deps.pipeline.ok) return sendAppError(res, deps.pipeline.error);

    const { fileBase64, filename, labels, includeCorrections, save } = parsed.data;
    const result = await processDocument(deps.pipeline.value, {
      document: Buffer.from(fileBase64, 'base64'),
      filename,
      includeCorrections,
      labels,
      outputDir: save ? deps.outputDir : undefined,
    });
    if (!result.ok) return sendAppError(res, result.error);

    const processed = result.value;
    res.json(
      successResponse({
        documentId: processed.documentId,
        filename: processed.filename,
        form: labels === 'hebrew' ? toHebrewForm(processed.form) : processed.form,
        ocr: processed.ocr,
        metadata: processed.metadata,
        validationReport: toReportJson(processed.report, labels),
        ...(processed.corrections !== undefined && { corrections: processed.corrections }),
        ...(processed.outputs !== undefined && { outputs: processed.outputs }),
      }),
    );
  });

  return router;
}
