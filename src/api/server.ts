import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../config.js';
import { createPipeline } from '../pipeline.js';
import { logger } from '../infrastructure/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.ok) {
    throw new Error(`${config.error.message}: ${config.error.details ?? ''}`);
  }
  logger.level = config.value.logLevel;

  const pipeline = createPipeline(config.value);
  if (!pipeline.ok) {
    logger.warn(
      { errorCode: pipeline.error.code, details: pipeline.error.message },
      'Providers not configured, /forms/process is unavailable',
    );
  }

  const app = createApp({ pipeline, outputDir: config.value.outputDir });
  const server = app.listen(config.value.port, () => {
    logger.info(
      { port: config.value.port, ocrProvider: config.value.ocr.provider, llmProvider: config.value.llm.provider },
      'Form 283 Extraction API started',
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      const flushed = pipeline.ok ? pipeline.value.tracer.flush() : Promise.resolve();
      flushed.finally(() => process.exit(0)).catch(() => process.exit(1));
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
