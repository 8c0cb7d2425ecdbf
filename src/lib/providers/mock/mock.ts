/**
 * Mock LLM provider for testing
 */
import type {
  ApiClientConfig,
  ChatMessage,
  ChatOptions,
  ModelAdapter,
  ModelDefinitionFor,
  ModelProvider,
} from '../../types';
import { ModelRequestError } from '../../errors';
import { textOf } from '../content';

/**
 * A canned reply, or a function of the request and its 0-based call index
 */
export type MockChatResponse =
  | string
  | ((messages: ChatMessage[], callIndex: number) => string | Promise<string>);

/**
 * Mock-specific configuration options
 */
export interface MockConfig extends ApiClientConfig {
  /** Predefined responses for testing */
  responses?: {
    chat?: MockChatResponse;
  };
  /** Deliberately fail requests for testing error handling */
  shouldFail?: boolean;
  /** Delay responses to simulate network latency (ms) */
  responseDelay?: number;
}

/**
 * A request the mock received
 */
export interface MockCall {
  messages: ChatMessage[];
  options: ChatOptions;
}

/**
 * Adapter for mock models - useful for testing
 */
export class MockModelAdapter implements ModelAdapter {
  private modelDef: ModelDefinitionFor<ModelProvider.MOCK>;
  private config: MockConfig;
  /** Every request received, in arrival order */
  readonly calls: MockCall[] = [];

  constructor(modelDef: ModelDefinitionFor<ModelProvider.MOCK>) {
    this.modelDef = modelDef;
    this.config = { ...modelDef.config };
  }

  /**
   * Simulate network delay; an aborted signal cuts it short
   */
  private delay(signal?: AbortSignal): Promise<void> {
    const ms = this.config.responseDelay ?? 0;
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(resolve, ms);
      signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(new ModelRequestError('Mock', 'request aborted'));
        },
        { once: true },
      );
    });
  }

  /**
   * Replace the canned chat response
   */
  setResponses(responses: { chat?: MockChatResponse }): void {
    this.config.responses = { ...this.config.responses, ...responses };
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const callIndex = this.calls.push({ messages, options }) - 1;
    await this.delay(options.signal);

    // Simulate failures for testing error handling
    if (this.config.shouldFail) {
      throw new ModelRequestError('Mock', 'intentional test failure');
    }

    const configured = this.config.responses?.chat;
    if (typeof configured === 'function') {
      return configured(messages, callIndex);
    }
    if (configured !== undefined) {
      return configured;
    }

    let response = `Mock chat response for model ${this.modelDef.model}`;
    const lastUserMessage = [...messages].reverse().find(m => m.role === 'user');
    if (lastUserMessage) {
      const content = textOf(lastUserMessage.content);
      const preview = content.substring(0, 30) + (content.length > 30 ? '...' : '');
      response += ` responding to: "${preview}"`;
    }
    return response;
  }
}
