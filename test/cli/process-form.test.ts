import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ok } from '../../src/domain/result.js';
import { toHebrewForm } from '../../src/domain/schemas.js';
import { parseCliArgs, runProcessForm, USAGE } from '../../src/cli/process-form.js';
import type { LLMProvider } from '../../src/infrastructure/llm/types.js';
import type { OcrProvider } from '../../src/infrastructure/ocr/types.js';
import { buildForm } from '../helpers/forms.js';

describe('parseCliArgs', () => {
  it('saves with canonical labels by default', () => {
    expect(parseCliArgs(['form.pdf'])).toEqual({
      ok: true,
      value: { file: 'form.pdf', save: true, outputDir: undefined, labels: 'canonical', corrections: false },
    });
  });

  it('reads every flag', () => {
    const result = parseCliArgs(['--no-save', '--labels', 'hebrew', '--output-dir', 'out', '--corrections', 'form.pdf']);

    expect(result).toEqual({
      ok: true,
      value: { file: 'form.pdf', save: false, outputDir: 'out', labels: 'hebrew', corrections: true },
    });
  });

  it('requires exactly one file', () => {
    expect(parseCliArgs([])).toEqual({ ok: false, error: USAGE });
    expect(parseCliArgs(['a.pdf', 'b.pdf'])).toEqual({ ok: false, error: USAGE });
  });

  it('rejects unknown label styles', () => {
    expect(parseCliArgs(['form.pdf', '--labels', 'english'])).toEqual({
      ok: false,
      error: '--labels must be hebrew or canonical, got english',
    });
  });

  it('rejects unknown flags', () => {
    const result = parseCliArgs(['form.pdf', '--verbose']);

    expect(result.ok).toBe(false);
  });
});

describe('runProcessForm', () => {
  let workDir: string;
  const analyze = vi.fn<OcrProvider['analyze']>();
  const chat = vi.fn<LLMProvider['chat']>();
  const deps = {
    ocr: { name: 'fake-ocr', analyze },
    llm: { name: 'fake-llm', temperature: 0.1, chat },
    tracer: { traceGeneration: vi.fn(), flush: vi.fn() },
  };

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'form283-cli-'));
    analyze.mockResolvedValue(ok({ content: 'ocr text', pageCount: 2, provider: 'fake-ocr' }));
    chat.mockResolvedValue(
      ok({
        content: JSON.stringify(toHebrewForm(buildForm())),
        model: 'gpt-4o',
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
        latencyMs: 3,
      }),
    );
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('renders the claimant and the report', async () => {
    const file = join(workDir, 'ex1.pdf');
    await writeFile(file, '%PDF-1.4 fake');

    const result = await runProcessForm(
      { file, save: false, labels: 'canonical', corrections: false },
      deps,
      join(workDir, 'out'),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      file: 'ex1.pdf',
      claimant: {
        name: 'יהודה טננבאום',
        id_number: '877524563',
        date_of_birth: '02/02/1995',
        address: 'הרמבם 16 כניסה 1 דירה 12, אבן יהודה, מיקוד 312422, ת.ד. 12',
        date_of_injury: '16/04/2022',
      },
      processing_metadata: { ocr_provider: 'fake-ocr', page_count: 2, llm_provider: 'fake-llm', model: 'gpt-4o', total_tokens: 15 },
      validation_report: { accuracy_score: 100, completeness_score: 100 },
    });
    expect(result.value).not.toHaveProperty('outputs');
  });

  it('writes outputs to the default directory when saving', async () => {
    const file = join(workDir, 'ex1.pdf');
    await writeFile(file, '%PDF-1.4 fake');

    const result = await runProcessForm({ file, save: true, labels: 'hebrew', corrections: false }, deps, join(workDir, 'out'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.outputs).toMatchObject({
      validationPath: join(workDir, 'out', 'validation_reports', 'ex1_validation.json'),
    });
  });

  it('returns DOCUMENT_NOT_FOUND for a missing file', async () => {
    const result = await runProcessForm(
      { file: join(workDir, 'missing.pdf'), save: false, labels: 'canonical', corrections: false },
      deps,
      workDir,
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DOCUMENT_NOT_FOUND');
    }
  });
});
