import pino from 'pino';

export const logger = pino({
  name: 'form283-extraction',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createDocumentLogger(documentId: string, filename?: string, provider?: string) {
  return logger.child({
    documentId,
    ...(filename !== undefined && { filename }),
    ...(provider !== undefined && { provider }),
  });
}
