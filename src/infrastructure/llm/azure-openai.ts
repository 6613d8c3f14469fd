import { AzureOpenAI } from 'openai';
import { ChatCompletionProvider } from './chat-completion.js';
import type { ChatCompletionClient } from './types.js';

export interface AzureOpenAISettings {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  deployment: string;
}

/** Azure routes by deployment name, so the deployment doubles as the model id. */
export class AzureOpenAIProvider extends ChatCompletionProvider {
  readonly name = 'azure-openai';

  constructor(client: ChatCompletionClient, deployment: string) {
    super(client, deployment);
  }
}

export function createAzureOpenAIClient(settings: AzureOpenAISettings): ChatCompletionClient {
  return new AzureOpenAI({
    endpoint: settings.endpoint,
    apiKey: settings.apiKey,
    apiVersion: settings.apiVersion,
    deployment: settings.deployment,
  });
}
