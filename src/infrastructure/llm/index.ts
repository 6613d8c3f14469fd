export type { LLMProvider, LLMResponse, LLMRequestOptions, ChatCompletionClient } from './types.js';
export { ChatCompletionProvider } from './chat-completion.js';
export { GroqProvider, createGroqClient } from './groq.js';
export { AzureOpenAIProvider, createAzureOpenAIClient } from './azure-openai.js';

import { ok, err, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import { missingSetting, type AppConfig } from '../../config.js';
import { GroqProvider, createGroqClient } from './groq.js';
import { AzureOpenAIProvider, createAzureOpenAIClient } from './azure-openai.js';
import type { LLMProvider } from './types.js';

export function createLLMProvider(config: AppConfig['llm']): Result<LLMProvider, AppError> {
  switch (config.provider) {
    case 'groq': {
      if (!config.groqApiKey) return err(missingSetting('GROQ_API_KEY', 'groq'));
      return ok(new GroqProvider(createGroqClient(config.groqApiKey), config.model));
    }
    case 'azure-openai': {
      const { endpoint, key, apiVersion, deployment } = config.azure;
      if (!endpoint) return err(missingSetting('AZURE_OPENAI_ENDPOINT', 'azure-openai'));
      if (!key) return err(missingSetting('AZURE_OPENAI_KEY', 'azure-openai'));
      const model = config.model ?? deployment;
      return ok(
        new AzureOpenAIProvider(createAzureOpenAIClient({ endpoint, apiKey: key, apiVersion, deployment: model }), model),
      );
    }
  }
}
