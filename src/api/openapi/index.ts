import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';

const currentDir = dirname(fileURLToPath(import.meta.url));
const specPath = join(currentDir, 'openapi.yaml');
const document: unknown = YAML.parse(readFileSync(specPath, 'utf-8'));

function isDocument(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function setupOpenAPI(app: Express): void {
  if (!isDocument(document)) {
    throw new Error(`OpenAPI document at ${specPath} is not a YAML mapping`);
  }

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(document, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Form 283 Extraction API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(document);
  });
}
