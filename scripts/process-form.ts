#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, runProcessForm, USAGE } from '../src/cli/process-form.js';
import { loadConfig } from '../src/config.js';
import { createPipeline } from '../src/pipeline.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'process-form' });

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args.ok) {
    console.error(args.error);
    if (args.error !== USAGE) console.error(USAGE);
    return 1;
  }

  const config = loadConfig();
  if (!config.ok) {
    console.error(`${config.error.message}: ${config.error.details ?? ''}`);
    return 1;
  }
  logger.level = config.value.logLevel;

  const pipeline = createPipeline(config.value);
  if (!pipeline.ok) {
    console.error(pipeline.error.message);
    return 1;
  }

  const result = await runProcessForm(args.value, pipeline.value, config.value.outputDir);
  await pipeline.value.tracer.flush();

  if (!result.ok) {
    log.error({ errorCode: result.error.code, retryable: result.error.retryable, details: result.error.details }, 'Processing failed');
    console.error(`${result.error.code}: ${result.error.message}`);
    return 1;
  }

  console.log(JSON.stringify(result.value, null, 2));
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((cause) => {
    log.fatal({ err: cause instanceof Error ? cause.message : String(cause) }, 'Unexpected failure');
    process.exit(1);
  });
