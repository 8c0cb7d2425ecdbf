/**
 * Anthropic provider adapter
 */
import Anthropic from '@anthropic-ai/sdk';
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
import { debug } from '../utils/debug';
import { errorMessage, textOf } from './content';

/**
 * Anthropic-specific configuration options
 */
export interface AnthropicConfig extends ApiClientConfig {
  /** Reply length cap used when a request does not set maxTokens */
  defaultMaxTokens?: number;
}

// Anthropic has no JSON mode; a reply prefilled with this brace keeps the
// model in a JSON object.
const JSON_PREFILL = '{';

function toBlock(part: ContentPart): Anthropic.TextBlockParam | Anthropic.ImageBlockParam {
  if (part.type === 'text') {
    return { type: 'text', text: part.text };
  }
  return { type: 'image', source: { type: 'base64', media_type: part.mimeType, data: part.data } };
}

/**
 * Split chat messages into Anthropic's top-level system text and turn list
 */
export function toAnthropicRequest(messages: ChatMessage[]): {
  system: string | undefined;
  messages: Anthropic.MessageParam[];
} {
  const system = messages
    .filter(m => m.role === 'system')
    .map(m => textOf(m.content))
    .join('\n\n');

  const turns = messages.flatMap((m): Anthropic.MessageParam[] => {
    if (m.role === 'system') return [];
    if (m.role === 'assistant') return [{ role: 'assistant', content: textOf(m.content) }];
    return [
      {
        role: 'user',
        content: typeof m.content === 'string' ? m.content : m.content.map(toBlock),
      },
    ];
  });

  return { system: system || undefined, messages: turns };
}

/**
 * Adapter for Anthropic models
 */
export class AnthropicModelAdapter implements ModelAdapter {
  private client: Anthropic;
  private modelDef: ModelDefinitionFor<ModelProvider.ANTHROPIC>;
  private defaultMaxTokens: number;

  constructor(modelDef: ModelDefinitionFor<ModelProvider.ANTHROPIC>) {
    this.modelDef = modelDef;
    debug('llm', 'Creating Anthropic adapter for model: %s', modelDef.model);

    const config = modelDef.config ?? {};
    const apiKey = config.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError('Anthropic API key missing: set ANTHROPIC_API_KEY or pass config.apiKey');
    }
    this.defaultMaxTokens = config.defaultMaxTokens ?? 1024;

    this.client = new Anthropic({
      apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout,
      maxRetries: config.maxRetries ?? 2,
    });
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    debug('llm', 'Sending chat request to Anthropic model: %s', this.modelDef.model);
    const request = toAnthropicRequest(messages);
    if (options.json) {
      request.messages.push({ role: 'assistant', content: JSON_PREFILL });
    }

    try {
      const response = await this.client.messages.create(
        {
          model: this.modelDef.model,
          system: request.system,
          messages: request.messages,
          max_tokens: options.maxTokens ?? this.defaultMaxTokens,
          temperature: options.temperature,
        },
        { signal: options.signal },
      );

      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map(block => block.text)
        .join('');
      debug('llm', 'Received chat response of %d characters', text.length);
      return options.json ? JSON_PREFILL + text : text;
    } catch (error) {
      debug('llm', 'Anthropic chat completion error: %o', error);
      console.error('Anthropic chat completion error:', errorMessage(error));
      throw new ModelRequestError('Anthropic', errorMessage(error), { cause: error });
    }
  }
}
