/**
 * Model registry and adapters for different LLM providers
 */
import { ModelProvider } from './types';
import type { ModelAdapter, ModelDefinition, ModelReference } from './types';
import { OpenAIModelAdapter, AnthropicModelAdapter, MockModelAdapter } from './providers';
import { ConfigurationError } from './errors';
import { debug } from './utils/debug';

/** Maps model aliases to model definitions */
const registeredModels: Map<string, ModelDefinition> = new Map();

/** One adapter per definition object; equal names with other configs get their own */
let modelAdapters: WeakMap<ModelDefinition, ModelAdapter> = new WeakMap();

/**
 * Registry for model definitions and adapters
 */
export class ModelRegistry {
  /**
   * Register multiple models with aliases
   */
  public static registerModels(modelMap: Record<string, ModelDefinition>): void {
    Object.entries(modelMap).forEach(([alias, definition]) => {
      debug('core', 'Registering model %s as %s:%s', alias, definition.provider, definition.model);
      registeredModels.set(alias, definition);
    });
  }

  /**
   * Get a model definition by its alias
   */
  public static getModel(alias: string): ModelDefinition | undefined {
    return registeredModels.get(alias);
  }

  /**
   * All registered models with their aliases
   */
  public static listModels(): Array<{ alias: string; definition: ModelDefinition }> {
    return Array.from(registeredModels, ([alias, definition]) => ({ alias, definition }));
  }

  /**
   * Get or create the adapter for a model definition.
   * An adapter is reused only for the same definition object, so a
   * registered alias always resolves to the same adapter.
   */
  public static getAdapter(modelDef: ModelDefinition): ModelAdapter {
    const cached = modelAdapters.get(modelDef);
    if (cached) return cached;
    const label = `${modelDef.provider}:${modelDef.model}`;

    let adapter: ModelAdapter;
    switch (modelDef.provider) {
      case ModelProvider.OPENAI:
        adapter = new OpenAIModelAdapter(modelDef);
        break;
      case ModelProvider.ANTHROPIC:
        adapter = new AnthropicModelAdapter(modelDef);
        break;
      case ModelProvider.MOCK:
        adapter = new MockModelAdapter(modelDef);
        break;
      default:
        throw new ConfigurationError(`Unsupported model provider in ${label}`);
    }

    debug('core', 'Created adapter for %s', label);
    modelAdapters.set(modelDef, adapter);
    return adapter;
  }

  /**
   * Clear all registered models and adapters
   * Primarily used for testing purposes
   */
  public static clear(): void {
    registeredModels.clear();
    modelAdapters = new WeakMap();
  }
}

export function isModelAdapter(model: ModelReference): model is ModelAdapter {
  return typeof model === 'object' && 'chat' in model && typeof model.chat === 'function';
}

/**
 * Turn an alias, a definition or an adapter into an adapter
 */
export function resolveAdapter(model: ModelReference): ModelAdapter {
  if (typeof model === 'string') {
    const definition = ModelRegistry.getModel(model);
    if (!definition) {
      throw new ConfigurationError(`Model alias not found: ${model}`);
    }
    return ModelRegistry.getAdapter(definition);
  }
  if (isModelAdapter(model)) return model;
  return ModelRegistry.getAdapter(model);
}
