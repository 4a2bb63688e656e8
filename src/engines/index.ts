/**
 * Engines module - clients for the external generation and render services
 */

export type { PromptRole, PromptMessage, GenerationUsage, GenerationResponse, GenerationClient } from './generation-client';
export { AiSdkGenerationClient } from './ai-sdk-generation-client';
export type { AiSdkProvider, AiSdkGenerationClientOptions } from './ai-sdk-generation-client';
export {
  MockGenerationClient,
  DEMO_PAYLOADS,
  createDemoGenerationClient,
} from './mock-generation-client';
export type { MockGenerationRule, MockGenerationClientOptions, MockGenerationCall } from './mock-generation-client';

export type { RenderClient } from './render-client';
export { HttpRenderClient, RenderHttpError } from './http-render-client';
export type { HttpRenderProvider, HttpRenderClientOptions } from './http-render-client';
export { MockRenderClient } from './mock-render-client';
export type { MockRenderClientOptions } from './mock-render-client';
