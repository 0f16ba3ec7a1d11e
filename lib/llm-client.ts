import { generateText, type ModelMessage } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { AppConfig, requireOpenAiApiKey } from './config.js';

export interface CompletionOptions {
  maxOutputTokens: number;
  temperature: number;
}

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface LlmClient {
  readonly modelName: string;
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

/** OpenAI, or any endpoint serving `/chat/completions`, through the AI SDK. */
export class OpenAiLlmClient implements LlmClient {
  private provider: ReturnType<typeof createOpenAI>;

  constructor(
    readonly modelName: string,
    apiKey: string,
    baseURL?: string
  ) {
    this.provider = createOpenAI({ apiKey, baseURL });
  }

  static fromConfig(config: AppConfig): OpenAiLlmClient {
    return new OpenAiLlmClient(config.modelName, requireOpenAiApiKey(config), config.openAiBaseUrl);
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const modelMessages: ModelMessage[] = messages.map((message): ModelMessage =>
      message.role === 'system'
        ? { role: 'system', content: message.content }
        : { role: 'user', content: message.content }
    );
    const { text } = await generateText({
      model: this.provider.chat(this.modelName),
      messages: modelMessages,
      maxOutputTokens: options.maxOutputTokens,
      temperature: options.temperature,
      // One attempt only; a failed call degrades the analysis instead.
      maxRetries: 0,
    });
    return text;
  }
}
