/**
 * Generation capability
 * Turns a list of prompt messages into generated text
 */

export type PromptRole = 'system' | 'user' | 'assistant';

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface GenerationUsage {
  inputTokens?: number;
  outputTokens?: number;
}

export interface GenerationResponse {
  /** Generated text */
  content: string;
  finishReason?: string;
  usage?: GenerationUsage;
  /** Model that produced the text */
  model?: string;
}

/**
 * Anything that can answer a prompt. May fail with transient or permanent errors;
 * callers wrap it in a RetryPolicy.
 */
export interface GenerationClient {
  readonly name: string;
  generate(messages: PromptMessage[]): Promise<GenerationResponse>;
}
