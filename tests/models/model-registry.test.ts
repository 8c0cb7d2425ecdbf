import { describe, expect, test, beforeEach } from 'vitest';
import { judge } from '../../src/lib/core';
import { ModelProvider } from '../../src/lib/types';
import type { ModelAdapter } from '../../src/lib/types';
import { ModelRegistry, isModelAdapter, resolveAdapter } from '../../src/lib/models';
import { MockModelAdapter } from '../../src/lib/providers/mock/mock';
import { OpenAIModelAdapter } from '../../src/lib/providers/openai';
import { ConfigurationError } from '../../src/lib/errors';

describe('Model Registry', () => {
  beforeEach(() => {
    ModelRegistry.clear();
  });

  test('model definition factories create correct provider types', () => {
    const openAiModel = judge.openai('gpt-4o');
    expect(openAiModel.provider).toBe(ModelProvider.OPENAI);
    expect(openAiModel.model).toBe('gpt-4o');

    const anthropicModel = judge.anthropic('claude-3-5-sonnet-latest');
    expect(anthropicModel.provider).toBe(ModelProvider.ANTHROPIC);
    expect(anthropicModel.model).toBe('claude-3-5-sonnet-latest');

    const mockModel = judge.mock('test-model');
    expect(mockModel.provider).toBe(ModelProvider.MOCK);
    expect(mockModel.model).toBe('test-model');
  });

  test('models method registers models by alias', () => {
    judge.models({
      test1: judge.mock('test-model-1'),
      test2: judge.mock('test-model-2'),
    });

    expect(ModelRegistry.getModel('test1')?.model).toBe('test-model-1');
    expect(ModelRegistry.getModel('test2')?.model).toBe('test-model-2');
    expect(ModelRegistry.getModel('test3')).toBeUndefined();
    expect(judge.listModels().map(m => m.alias)).toEqual(['test1', 'test2']);
  });

  test('models method is chainable', () => {
    const result = judge.models({
      test: judge.mock('test-model'),
    });

    expect(result).toBe(judge);
  });

  test('getAdapter returns the correct adapter type', () => {
    const adapter = ModelRegistry.getAdapter(judge.mock('test-model-1'));
    expect(adapter).toBeInstanceOf(MockModelAdapter);

    const openai = ModelRegistry.getAdapter(judge.openai('gpt-4o', { apiKey: 'test-secret' }));
    expect(openai).toBeInstanceOf(OpenAIModelAdapter);
  });

  test('one adapter is kept per definition', () => {
    const definition = judge.mock('shared');
    const first = ModelRegistry.getAdapter(definition);
    expect(ModelRegistry.getAdapter(definition)).toBe(first);
    expect(ModelRegistry.getAdapter(judge.mock('other'))).not.toBe(first);
  });

  test('the same model name with another config gets its own adapter', async () => {
    const quick = ModelRegistry.getAdapter(judge.mock('shared', { responses: { chat: 'quick' } }));
    const careful = ModelRegistry.getAdapter(judge.mock('shared', { responses: { chat: 'careful' } }));

    expect(careful).not.toBe(quick);
    expect(await quick.chat([{ role: 'user', content: 'x' }])).toBe('quick');
    expect(await careful.chat([{ role: 'user', content: 'x' }])).toBe('careful');
  });

  test('resolveAdapter accepts aliases, definitions and adapters', () => {
    judge.models({ alias: judge.mock('aliased') });
    const custom: ModelAdapter = { chat: async () => '{}' };

    expect(resolveAdapter('alias')).toBe(resolveAdapter('alias'));
    expect(resolveAdapter('alias')).toBeInstanceOf(MockModelAdapter);
    expect(resolveAdapter(judge.mock('direct'))).toBeInstanceOf(MockModelAdapter);
    expect(resolveAdapter(custom)).toBe(custom);
    expect(isModelAdapter(custom)).toBe(true);
    expect(isModelAdapter(judge.mock('direct'))).toBe(false);
  });

  test('an unknown alias is a configuration error', () => {
    expect(() => resolveAdapter('missing')).toThrow(ConfigurationError);
    expect(() => resolveAdapter('missing')).toThrow('Model alias not found: missing');
  });
});
