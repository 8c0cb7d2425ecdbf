/**
 * Environment configuration
 *
 *   DESIGN_JUDGE_MODEL        default model as `<provider>:<model>` (openai:gpt-4o)
 *   DESIGN_JUDGE_TIMEOUT_MS   per-request deadline applied by the evaluators
 *   DESIGN_JUDGE_TEMPERATURE  sampling temperature sent with each request
 *
 * Provider credentials (OPENAI_API_KEY, OPENAI_ORGANIZATION, ANTHROPIC_API_KEY)
 * are read by the provider adapters.
 */
import { z } from 'zod';
import { ModelProvider } from './types';
import type { ModelDefinition } from './types';
import { ConfigurationError } from './errors';

export const DEFAULT_MODEL_SPEC = 'openai:gpt-4o';

const EnvSchema = z.object({
  DESIGN_JUDGE_MODEL: z.string().default(DEFAULT_MODEL_SPEC),
  DESIGN_JUDGE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DESIGN_JUDGE_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

export interface DesignJudgeConfig {
  model: ModelDefinition;
  timeoutMs?: number;
  temperature?: number;
}

/**
 * Parse `<provider>:<model>`, e.g. `anthropic:claude-3-5-sonnet-latest`
 */
export function parseModelSpec(spec: string): ModelDefinition {
  const match = spec.trim().match(/^([a-z]+):(.+)$/);
  if (!match) {
    throw new ConfigurationError(`Invalid model "${spec}": expected "<provider>:<model>"`);
  }
  const [, provider, model] = match;
  switch (provider) {
    case ModelProvider.OPENAI:
      return { provider: ModelProvider.OPENAI, model };
    case ModelProvider.ANTHROPIC:
      return { provider: ModelProvider.ANTHROPIC, model };
    case ModelProvider.MOCK:
      return { provider: ModelProvider.MOCK, model };
    default:
      throw new ConfigurationError(
        `Unknown provider "${provider}" in "${spec}" (expected openai, anthropic or mock)`,
      );
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DesignJudgeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${detail}`);
  }
  return {
    model: parseModelSpec(parsed.data.DESIGN_JUDGE_MODEL),
    timeoutMs: parsed.data.DESIGN_JUDGE_TIMEOUT_MS,
    temperature: parsed.data.DESIGN_JUDGE_TEMPERATURE,
  };
}
