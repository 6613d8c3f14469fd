import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../../src/api/app.js';
import { ok, err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import { toHebrewForm } from '../../src/domain/schemas.js';
import type { LLMProvider } from '../../src/infrastructure/llm/types.js';
import type { OcrProvider } from '../../src/infrastructure/ocr/types.js';
import { buildForm, TEST_YEAR } from '../helpers/forms.js';

const analyze = vi.fn<OcrProvider['analyze']>();
const chat = vi.fn<LLMProvider['chat']>();

const app = createApp({
  pipeline: ok({
    ocr: { name: 'fake-ocr', analyze },
    llm: { name: 'fake-llm', temperature: 0.1, chat },
    tracer: { traceGeneration: vi.fn(), flush: vi.fn() },
  }),
  outputDir: 'unused',
});

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
  return address.port;
}

async function readJson(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  if (typeof body !== 'object' || body === null || Array.isArray(body)) throw new Error('Expected a JSON object');
  return Object.fromEntries(Object.entries(body));
}

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  baseUrl = `http://127.0.0.1:${portOf(server)}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
});

beforeEach(() => {
  vi.clearAllMocks();
  analyze.mockResolvedValue(ok({ content: 'ocr text', pageCount: 1, provider: 'fake-ocr' }));
  chat.mockResolvedValue(
    ok({
      content: JSON.stringify(toHebrewForm(buildForm({ mobilePhone: '502474947' }))),
      model: 'gpt-4o',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      latencyMs: 3,
    }),
  );
});

async function post(path: string, body: unknown) {
  const response = await fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
  const json = await readJson(response);
  return { status: response.status, json };
}

describe('GET /health', () => {
  it('reports ok', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const json = await readJson(response);

    expect(response.status).toBe(200);
    expect(json.status).toBe('ok');
  });
});

describe('POST /forms/validate', () => {
  it('returns the serialized report', async () => {
    const { status, json } = await post('/forms/validate', {
      form: buildForm({ idNumber: '12345678' }),
      currentYear: TEST_YEAR,
    });

    expect(status).toBe(200);
    expect(json.success).toBe(true);
    expect(json.data).toEqual({
      validationReport: {
        accuracy_score: (20 / 21) * 100,
        completeness_score: 100,
        corrections: [{ field: 'idNumber', value: '12345678', reason: 'ID number should be 9 digits, got 8' }],
        filled_count: 21,
        total_count: 21,
        missing_fields: [],
        summary:
          'Validation passed. 21/21 fields filled (100.0%). 20/21 data fields accurate (95.2%). 1 quality issue(s) detected.',
      },
    });
  });

  it('localizes paths when asked for Hebrew labels', async () => {
    const { json } = await post('/forms/validate', {
      form: buildForm({ mobilePhone: '502474947' }),
      currentYear: TEST_YEAR,
      labels: 'hebrew',
    });

    expect(json.data).toMatchObject({
      validationReport: {
        corrections: [{ field: 'טלפון נייד', value: '502474947', reason: 'Israeli phone numbers should start with 0' }],
      },
    });
  });

  it('rejects a malformed form with 422', async () => {
    const { status, json } = await post('/forms/validate', { form: { lastName: 3 } });

    expect(status).toBe(422);
    expect(json.success).toBe(false);
    expect(json.error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid request body' });
  });
});

describe('POST /forms/process', () => {
  const fileBase64 = Buffer.from('%PDF-1.4 fake').toString('base64');

  it('returns the extracted form and report', async () => {
    const { status, json } = await post('/forms/process', { fileBase64, filename: 'ex1.pdf' });

    expect(status).toBe(200);
    expect(analyze).toHaveBeenCalledWith(Buffer.from('%PDF-1.4 fake'), expect.objectContaining({}));
    expect(json.data).toMatchObject({
      filename: 'ex1.pdf',
      form: { lastName: 'טננבאום', mobilePhone: '502474947' },
      ocr: { provider: 'fake-ocr', pageCount: 1 },
      metadata: { provider: 'fake-llm', model: 'gpt-4o', totalTokens: 15 },
    });
  });

  it('returns Hebrew keys when asked', async () => {
    const { json } = await post('/forms/process', { fileBase64, labels: 'hebrew' });

    expect(json.data).toMatchObject({ form: { 'שם משפחה': 'טננבאום' } });
  });

  it('maps upstream failures to 503', async () => {
    analyze.mockResolvedValue(err(createAppError(ErrorCode.OCR_RATE_LIMITED, 'Document Intelligence rate limited', true)));

    const { status, json } = await post('/forms/process', { fileBase64 });

    expect(status).toBe(503);
    expect(json.error).toMatchObject({ code: 'OCR_RATE_LIMITED', retryable: true });
  });

  it('maps unsupported documents to 400', async () => {
    const { status, json } = await post('/forms/process', { fileBase64, filename: 'scan.png' });

    expect(status).toBe(400);
    expect(json.error).toMatchObject({ code: 'DOCUMENT_UNSUPPORTED_TYPE' });
  });

  it('rejects non-base64 data with 422', async () => {
    const { status } = await post('/forms/process', { fileBase64: 'not base64!' });

    expect(status).toBe(422);
  });
});

describe('POST /forms/process without providers', () => {
  it('answers 503 with the configuration error', async () => {
    const unconfigured = createApp({
      pipeline: err(createAppError(ErrorCode.PROVIDER_CONFIG_MISSING, 'AZURE_DI_KEY must be set to use the azure provider', false)),
      outputDir: 'unused',
    });
    const local = await new Promise<Server>((resolve) => {
      const listening = unconfigured.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const port = portOf(local);

    try {
      const response = await fetch(`http://127.0.0.1:${port}/forms/process`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ fileBase64: 'JVBERi0=' }),
      });
      const json = await readJson(response);

      expect(response.status).toBe(503);
      expect(json.error).toMatchObject({ code: 'PROVIDER_CONFIG_MISSING' });
    } finally {
      await new Promise<void>((resolve) => local.close(() => resolve()));
    }
  });
});
