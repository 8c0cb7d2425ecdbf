import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

const { create, construct } = vi.hoisted(() => ({ create: vi.fn(), construct: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
    constructor(options: unknown) {
      construct(options);
    }
  },
}));

import { OpenAIModelAdapter, toOpenAIMessage } from '../../src/lib/providers/openai';
import { judge } from '../../src/lib/core';
import { ConfigurationError, ModelRequestError } from '../../src/lib/errors';
import type { ChatMessage } from '../../src/lib/types';

const MESSAGES: ChatMessage[] = [
  { role: 'system', content: 'Grade seriously.' },
  {
    role: 'user',
    content: [
      { type: 'text', text: 'Please score the following images.' },
      { type: 'image', mimeType: 'image/png', data: 'AAAA' },
    ],
  },
];

describe('OpenAI adapter', () => {
  beforeEach(() => {
    create.mockReset();
    construct.mockReset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  test('images become data URLs', () => {
    expect(toOpenAIMessage(MESSAGES[1], 'low')).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'Please score the following images.' },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA', detail: 'low' } },
      ],
    });
    expect(toOpenAIMessage(MESSAGES[0])).toEqual({ role: 'system', content: 'Grade seriously.' });
  });

  test('requests a JSON object reply', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{"score": 6, "explanation": "ok"}' } }] });
    const adapter = new OpenAIModelAdapter(judge.openai('gpt-4o', { apiKey: 'test-secret', maxRetries: 0 }));
    const controller = new AbortController();

    const reply = await adapter.chat(MESSAGES, {
      json: true,
      temperature: 0.1,
      maxTokens: 50,
      signal: controller.signal,
    });

    expect(reply).toBe('{"score": 6, "explanation": "ok"}');
    expect(construct).toHaveBeenCalledWith(expect.objectContaining({ apiKey: 'test-secret', maxRetries: 0 }));
    expect(create).toHaveBeenCalledWith(
      {
        model: 'gpt-4o',
        messages: MESSAGES.map(m => toOpenAIMessage(m)),
        temperature: 0.1,
        max_tokens: 50,
        response_format: { type: 'json_object' },
      },
      { signal: controller.signal },
    );
  });

  test('reads the API key from the environment', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret-from-env');
    new OpenAIModelAdapter(judge.openai('gpt-4o'));
    expect(construct).toHaveBeenCalledWith(expect.objectContaining({ apiKey: 'test-secret-from-env' }));
  });

  test('a missing API key is a configuration error', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    expect(() => new OpenAIModelAdapter(judge.openai('gpt-4o'))).toThrow(ConfigurationError);
  });

  test('SDK failures are wrapped', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('rate limited');
    create.mockRejectedValue(cause);
    const adapter = new OpenAIModelAdapter(judge.openai('gpt-4o', { apiKey: 'test-secret' }));

    const error: unknown = await adapter.chat(MESSAGES).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ModelRequestError);
    if (error instanceof ModelRequestError) {
      expect(error.message).toBe('OpenAI request failed: rate limited');
      expect(error.provider).toBe('OpenAI');
      expect(error.cause).toBe(cause);
    }
  });
});
