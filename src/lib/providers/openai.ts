/**
 * OpenAI provider adapter
 */
import OpenAI from 'openai';
import type {
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type {
  ApiClientConfig,
  ChatMessage,
  ChatOptions,
  ContentPart,
  ModelAdapter,
  ModelDefinitionFor,
  ModelProvider,
} from '../types';
import { ConfigurationError, ModelRequestError } from '../errors';
import { toDataUrl } from '../images/encode';
import { debug } from '../utils/debug';
import { countImages, errorMessage, textOf } from './content';

/**
 * OpenAI-specific configuration options
 */
export interface OpenAIConfig extends ApiClientConfig {
  /** Override organization ID */
  organization?: string;
  /** Resolution the vision model looks at images with */
  imageDetail?: 'auto' | 'low' | 'high';
}

function toContentPart(part: ContentPart, detail: 'auto' | 'low' | 'high'): ChatCompletionContentPart {
  if (part.type === 'text') {
    return { type: 'text', text: part.text };
  }
  return { type: 'image_url', image_url: { url: toDataUrl(part.data, part.mimeType), detail } };
}

export function toOpenAIMessage(
  message: ChatMessage,
  detail: 'auto' | 'low' | 'high' = 'auto',
): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: textOf(message.content) };
    case 'assistant':
      return { role: 'assistant', content: textOf(message.content) };
    case 'user':
      return {
        role: 'user',
        content:
          typeof message.content === 'string'
            ? message.content
            : message.content.map(part => toContentPart(part, detail)),
      };
  }
}

/**
 * Adapter for OpenAI chat models with vision input
 */
export class OpenAIModelAdapter implements ModelAdapter {
  private client: OpenAI;
  private modelDef: ModelDefinitionFor<ModelProvider.OPENAI>;
  private imageDetail: 'auto' | 'low' | 'high';

  constructor(modelDef: ModelDefinitionFor<ModelProvider.OPENAI>) {
    this.modelDef = modelDef;
    debug('llm', 'Creating OpenAI adapter for model: %s', modelDef.model);

    const config = modelDef.config ?? {};
    const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError('OpenAI API key missing: set OPENAI_API_KEY or pass config.apiKey');
    }
    this.imageDetail = config.imageDetail ?? 'auto';

    this.client = new OpenAI({
      apiKey,
      organization: config.organization ?? process.env.OPENAI_ORGANIZATION,
      baseURL: config.baseUrl,
      timeout: config.timeout,
      maxRetries: config.maxRetries ?? 2,
    });
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    debug('llm', 'Sending chat request to OpenAI model: %s', this.modelDef.model);
    debug(
      'llm',
      'Messages: %d, images: %d, json: %s',
      messages.length,
      messages.reduce((n, m) => n + countImages(m.content), 0),
      options.json ? 'yes' : 'no',
    );

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.modelDef.model,
          messages: messages.map(m => toOpenAIMessage(m, this.imageDetail)),
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          response_format: options.json ? { type: 'json_object' } : undefined,
        },
        { signal: options.signal },
      );

      const content = completion.choices[0]?.message?.content ?? '';
      debug('llm', 'Received chat response of %d characters', content.length);
      return content;
    } catch (error) {
      debug('llm', 'OpenAI chat completion error: %o', error);
      console.error('OpenAI chat completion error:', errorMessage(error));
      throw new ModelRequestError('OpenAI', errorMessage(error), { cause: error });
    }
  }
}
