import { describe, expect, test } from 'vitest';
import { DEFAULT_MODEL_SPEC, loadConfig, parseModelSpec } from '../src/lib/config';
import { ModelProvider } from '../src/lib/types';
import { ConfigurationError } from '../src/lib/errors';

describe('Configuration', () => {
  test('defaults to the OpenAI vision model', () => {
    expect(DEFAULT_MODEL_SPEC).toBe('openai:gpt-4o');
    expect(loadConfig({})).toEqual({
      model: { provider: ModelProvider.OPENAI, model: 'gpt-4o' },
      timeoutMs: undefined,
      temperature: undefined,
    });
  });

  test('reads model, timeout and temperature', () => {
    const config = loadConfig({
      DESIGN_JUDGE_MODEL: 'anthropic:claude-3-5-sonnet-latest',
      DESIGN_JUDGE_TIMEOUT_MS: '5000',
      DESIGN_JUDGE_TEMPERATURE: '0.3',
    });
    expect(config).toEqual({
      model: { provider: ModelProvider.ANTHROPIC, model: 'claude-3-5-sonnet-latest' },
      timeoutMs: 5000,
      temperature: 0.3,
    });
  });

  test('rejects invalid numbers', () => {
    expect(() => loadConfig({ DESIGN_JUDGE_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ DESIGN_JUDGE_TEMPERATURE: '3' })).toThrow(/^Invalid environment: DESIGN_JUDGE_TEMPERATURE: /);
  });

  test('model specs keep everything after the provider', () => {
    expect(parseModelSpec('openai:ft:gpt-4o:acme')).toEqual({ provider: ModelProvider.OPENAI, model: 'ft:gpt-4o:acme' });
    expect(parseModelSpec(' mock:local ')).toEqual({ provider: ModelProvider.MOCK, model: 'local' });
  });

  test('rejects malformed specs and unknown providers', () => {
    expect(() => parseModelSpec('gpt-4o')).toThrow('Invalid model "gpt-4o": expected "<provider>:<model>"');
    expect(() => parseModelSpec('gemini:pro')).toThrow(
      'Unknown provider "gemini" in "gemini:pro" (expected openai, anthropic or mock)',
    );
  });
});
