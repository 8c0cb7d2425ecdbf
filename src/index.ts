/**
 * design-judge – root export
 */
export { judge, evaluateAbsolute, evaluateRelative, version } from './lib/core';
export type { EvaluateWithModelOptions } from './lib/core';
export * from './lib/types';
export * from './lib/errors';
export * from './lib/prompts';
export * from './lib/evaluators';
export { encodePng, imageToBase64, isRawBitmap, toDataUrl, PNG_MIME_TYPE } from './lib/images/encode';
export type { ImageInput, RawBitmap } from './lib/images/encode';
export { parseStructuredReply, schemaHint, schemaInstruction, SCHEMA_HINT_PREAMBLE } from './lib/schema';
export type { Schema, Infer } from './lib/schema';
export { ModelRegistry, resolveAdapter, isModelAdapter } from './lib/models';
export { OpenAIModelAdapter, AnthropicModelAdapter, MockModelAdapter } from './lib/providers';
export type {
  OpenAIConfig,
  AnthropicConfig,
  MockConfig,
  MockCall,
  MockChatResponse,
} from './lib/providers';
export { loadConfig, parseModelSpec, DEFAULT_MODEL_SPEC } from './lib/config';
export type { DesignJudgeConfig } from './lib/config';
export { extractJson } from './lib/utils/json';
