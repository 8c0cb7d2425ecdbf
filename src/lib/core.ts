/**
 * Core functionality for the design-judge library
 */
import { ModelRegistry } from './models';
import { ModelProvider } from './types';
import type {
  DebugSettings,
  DesignJudgeInstance,
  ModelDefinition,
  ModelDefinitionFor,
  ModelReference,
} from './types';
import type { OpenAIConfig } from './providers/openai';
import type { AnthropicConfig } from './providers/anthropic';
import type { MockConfig } from './providers/mock/mock';
import { loadConfig } from './config';
import { AbsoluteEvaluator } from './evaluators/absolute';
import { RelativeEvaluator } from './evaluators/relative';
import type { AbsoluteEvaluationResult, RelativeEvaluationResult } from './evaluators/results';
import type { EvaluateOptions, PrincipleEvaluateOptions } from './evaluators/types';
import type { ImageInput } from './images/encode';
import type { DesignPrinciple } from './prompts/principles';
import { configureDebug, debug } from './utils/debug';

/**
 * Evaluator defaults taken from the environment, and the model to use when
 * the caller names none
 */
function environmentDefaults(model?: ModelReference): { model: ModelReference; defaults: EvaluateOptions } {
  const config = loadConfig();
  const resolved = model ?? config.model;
  if (!model) {
    debug('core', 'Using default model %s:%s', config.model.provider, config.model.model);
  }
  return {
    model: resolved,
    defaults: { timeoutMs: config.timeoutMs, temperature: config.temperature },
  };
}

/**
 * The main design-judge instance
 */
export const judge: DesignJudgeInstance = {
  /**
   * Register models with simple alias names
   *
   * @example
   * ```typescript
   * judge.models({
   *   fast: judge.openai("gpt-4o-mini"),
   *   careful: judge.anthropic("claude-3-5-sonnet-latest"),
   * });
   * ```
   */
  models(modelMap: Record<string, ModelDefinition>): DesignJudgeInstance {
    ModelRegistry.registerModels(modelMap);
    return this;
  },

  /**
   * Create an OpenAI model definition. The API key is read from
   * OPENAI_API_KEY when the config does not carry one.
   */
  openai(model: string, config: OpenAIConfig = {}): ModelDefinitionFor<ModelProvider.OPENAI> {
    return { provider: ModelProvider.OPENAI, model, config };
  },

  /**
   * Create an Anthropic model definition. The API key is read from
   * ANTHROPIC_API_KEY when the config does not carry one.
   */
  anthropic(model: string, config: AnthropicConfig = {}): ModelDefinitionFor<ModelProvider.ANTHROPIC> {
    return { provider: ModelProvider.ANTHROPIC, model, config };
  },

  /**
   * Create a mock model definition (for testing)
   *
   * @example
   * ```typescript
   * const scripted = judge.mock("test-model", {
   *   responses: { chat: '{"score": 7, "explanation": "Even margins."}' },
   * });
   * ```
   */
  mock(model: string, config: MockConfig = {}): ModelDefinitionFor<ModelProvider.MOCK> {
    return { provider: ModelProvider.MOCK, model, config };
  },

  listModels(): Array<{ alias: string; definition: ModelDefinition }> {
    return ModelRegistry.listModels();
  },

  /**
   * Configure debug logging
   *
   * @example
   * ```typescript
   * judge.debug('*');
   * judge.debug('llm,evaluator');
   * judge.debug({ enabled: true, namespaces: ['llm'] });
   * ```
   */
  debug(config: DebugSettings): void {
    configureDebug(config);
  },

  absolute(model?: ModelReference): AbsoluteEvaluator {
    const env = environmentDefaults(model);
    return new AbsoluteEvaluator(env.model, env.defaults);
  },

  relative(model?: ModelReference): RelativeEvaluator {
    const env = environmentDefaults(model);
    return new RelativeEvaluator(env.model, env.defaults);
  },
};

export type EvaluateWithModelOptions = PrincipleEvaluateOptions & { model?: ModelReference };

/**
 * Score one design against a catalog principle. Configuration and adapter
 * errors reject the returned promise.
 *
 * @example
 * ```typescript
 * const [result] = await evaluateAbsolute(png, 'alignment');
 * console.log(result.score, result.explanation);
 * ```
 */
export async function evaluateAbsolute(
  image: ImageInput,
  principle: DesignPrinciple,
  options: EvaluateWithModelOptions = {},
): Promise<AbsoluteEvaluationResult[]> {
  const { model, ...rest } = options;
  return judge.absolute(model).evaluatePrinciple(image, principle, rest);
}

/**
 * Compare two designs against a catalog principle
 */
export async function evaluateRelative(
  imageA: ImageInput,
  imageB: ImageInput,
  principle: DesignPrinciple,
  options: EvaluateWithModelOptions = {},
): Promise<RelativeEvaluationResult[]> {
  const { model, ...rest } = options;
  return judge.relative(model).evaluatePrinciple(imageA, imageB, principle, rest);
}

/**
 * Version information for the library
 */
export const version = {
  major: 0,
  minor: 1,
  patch: 0,
  toString: () => `${version.major}.${version.minor}.${version.patch}`,
};
