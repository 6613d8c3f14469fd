import Groq from 'groq-sdk';
import { ChatCompletionProvider } from './chat-completion.js';
import type { ChatCompletionClient } from './types.js';

const DEFAULT_MODEL = 'llama-3.3-70b-versatile';

export class GroqProvider extends ChatCompletionProvider {
  readonly name = 'groq';

  constructor(client: ChatCompletionClient, model?: string) {
    super(client, model ?? DEFAULT_MODEL);
  }
}

export function createGroqClient(apiKey: string): ChatCompletionClient {
  return new Groq({ apiKey });
}
