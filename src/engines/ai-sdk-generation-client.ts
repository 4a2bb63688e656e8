/**
 * Generation client backed by the AI SDK (Anthropic, Google or OpenAI models)
 */

import { generateText, type LanguageModel } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import type { GenerationClient, GenerationResponse, PromptMessage } from './generation-client';

export type AiSdkProvider = 'anthropic' | 'google' | 'openai';

export interface AiSdkGenerationClientOptions {
  provider: AiSdkProvider;
  model: string;
  apiKey: string;
  /** Override the provider's base URL */
  apiBase?: string;
  /** Abort a call after this many milliseconds */
  timeoutMs?: number;
  temperature?: number;
}

type ConversationMessage = { role: 'user'; content: string } | { role: 'assistant'; content: string };

function createModel(options: AiSdkGenerationClientOptions): LanguageModel {
  switch (options.provider) {
    case 'anthropic':
      return createAnthropic({ apiKey: options.apiKey, baseURL: options.apiBase })(options.model);
    case 'google':
      return createGoogleGenerativeAI({ apiKey: options.apiKey, baseURL: options.apiBase })(options.model);
    case 'openai':
      return createOpenAI({ apiKey: options.apiKey, baseURL: options.apiBase })(options.model);
  }
}

export class AiSdkGenerationClient implements GenerationClient {
  readonly name: string;
  private readonly model: LanguageModel;
  private readonly options: AiSdkGenerationClientOptions;

  constructor(options: AiSdkGenerationClientOptions) {
    this.options = options;
    this.name = `${options.provider}:${options.model}`;
    this.model = createModel(options);
  }

  async generate(messages: PromptMessage[]): Promise<GenerationResponse> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const conversation: ConversationMessage[] = messages.flatMap((m): ConversationMessage[] => {
      switch (m.role) {
        case 'system':
          return [];
        case 'user':
          return [{ role: 'user', content: m.content }];
        case 'assistant':
          return [{ role: 'assistant', content: m.content }];
      }
    });

    const result = await generateText({
      model: this.model,
      system: system || undefined,
      messages: conversation,
      temperature: this.options.temperature,
      // Retries are governed by the caller's RetryPolicy
      maxRetries: 0,
      abortSignal: this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined,
    });

    return {
      content: result.text,
      finishReason: result.finishReason,
      usage: {
        inputTokens: result.usage.inputTokens,
        outputTokens: result.usage.outputTokens,
      },
      model: this.options.model,
    };
  }
}
