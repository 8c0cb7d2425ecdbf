/**
 * Type definitions for the design-judge library
 */
import type { AbsoluteEvaluator } from './evaluators/absolute';
import type { RelativeEvaluator } from './evaluators/relative';
import type { OpenAIConfig } from './providers/openai';
import type { AnthropicConfig } from './providers/anthropic';
import type { MockConfig } from './providers/mock/mock';

/**
 * Supported model providers
 */
export enum ModelProvider {
  OPENAI = 'openai',
  ANTHROPIC = 'anthropic',
  MOCK = 'mock',
}

/**
 * Definition of a model including provider and model ID.
 * The provider tag decides which configuration shape applies.
 */
export type ModelDefinition =
  | { provider: ModelProvider.OPENAI; model: string; config?: OpenAIConfig }
  | { provider: ModelProvider.ANTHROPIC; model: string; config?: AnthropicConfig }
  | { provider: ModelProvider.MOCK; model: string; config?: MockConfig };

export type ModelDefinitionFor<P extends ModelProvider> = Extract<ModelDefinition, { provider: P }>;

/**
 * Common configuration options for API clients
 */
export interface ApiClientConfig {
  /** API key to use for authentication */
  apiKey?: string;

  /** Base URL to use for API requests */
  baseUrl?: string;

  /** Maximum number of retries the provider SDK performs for a failed request */
  maxRetries?: number;

  /** Timeout in milliseconds the provider SDK applies to requests */
  timeout?: number;
}

export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * One piece of a multimodal message
 */
export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image'; mimeType: 'image/png'; data: string };

export interface ChatMessage {
  role: ChatRole;
  content: string | ContentPart[];
}

/**
 * Per-request options understood by every adapter
 */
export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON-only reply where it has such a mode */
  json?: boolean;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Generic model adapter that handles communication with LLM APIs
 */
export interface ModelAdapter {
  /** Send a chat request and return the reply text */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

/**
 * Anything an evaluator accepts as its model: a registered alias,
 * a model definition, or a ready adapter
 */
export type ModelReference = string | ModelDefinition | ModelAdapter;

/**
 * Debug configuration accepted by `judge.debug`
 */
export type DebugSettings = string | { enabled: boolean; namespaces?: string[] };

/**
 * The core design-judge instance interface
 */
export interface DesignJudgeInstance {
  /**
   * Register models with simple alias names
   */
  models(modelMap: Record<string, ModelDefinition>): DesignJudgeInstance;

  /**
   * Create an OpenAI model definition
   */
  openai(model: string, config?: OpenAIConfig): ModelDefinitionFor<ModelProvider.OPENAI>;

  /**
   * Create an Anthropic model definition
   */
  anthropic(model: string, config?: AnthropicConfig): ModelDefinitionFor<ModelProvider.ANTHROPIC>;

  /**
   * Create a mock model definition (for testing)
   */
  mock(model: string, config?: MockConfig): ModelDefinitionFor<ModelProvider.MOCK>;

  /**
   * List all registered models with their aliases and definitions
   */
  listModels(): Array<{ alias: string; definition: ModelDefinition }>;

  /**
   * Configure debug logging
   */
  debug(config: DebugSettings): void;

  /**
   * Create an absolute (single image) evaluator
   */
  absolute(model?: ModelReference): AbsoluteEvaluator;

  /**
   * Create a relative (image pair) evaluator
   */
  relative(model?: ModelReference): RelativeEvaluator;
}
