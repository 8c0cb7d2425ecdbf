/**
 * Absolute evaluation: score one design on a 1-10 scale
 */
import type { ModelAdapter, ModelReference } from '../types';
import type { EvaluationOutcome } from '../errors';
import type { ImageInput } from '../images/encode';
import { resolveAdapter } from '../models';
import { getPrincipleText } from '../prompts/principles';
import type { DesignPrinciple } from '../prompts/principles';
import { ABSOLUTE_USER_PROMPT, DEFAULT_ABSOLUTE_SYSTEM_PROMPT } from '../prompts/system';
import { debug } from '../utils/debug';
import { mergeOptions, runEvaluation, unwrapOutcomes } from './dispatch';
import { AbsoluteEvaluationResultSchema } from './results';
import type { AbsoluteEvaluationResult } from './results';
import type { DesignEvaluator, EvaluateOptions, PrincipleEvaluateOptions } from './types';

export class AbsoluteEvaluator implements DesignEvaluator<ImageInput, AbsoluteEvaluationResult> {
  private readonly adapter: ModelAdapter;
  private readonly defaults: EvaluateOptions;

  /**
   * @param model - Registered alias, model definition, or adapter
   * @param defaults - Options applied to every call unless overridden
   */
  constructor(model: ModelReference, defaults: EvaluateOptions = {}) {
    this.adapter = resolveAdapter(model);
    this.defaults = defaults;
  }

  /**
   * Score `image` against the instruction text `principleText`.
   * Resolves to `numReturn` results, or rejects if any request fails.
   */
  async evaluate(
    image: ImageInput,
    principleText: string,
    options: EvaluateOptions = {},
  ): Promise<AbsoluteEvaluationResult[]> {
    return unwrapOutcomes(await this.evaluateSettled(image, principleText, options));
  }

  /**
   * Like `evaluate`, but reports every request's outcome instead of rejecting
   */
  async evaluateSettled(
    image: ImageInput,
    principleText: string,
    options: EvaluateOptions = {},
  ): Promise<EvaluationOutcome<AbsoluteEvaluationResult>[]> {
    const opts = mergeOptions(this.defaults, options);
    debug('evaluator', 'Absolute evaluation with %d sample(s)', opts.numReturn ?? 1);
    return runEvaluation(
      this.adapter,
      {
        template: opts.promptTemplate || DEFAULT_ABSOLUTE_SYSTEM_PROMPT,
        principleText,
        userText: ABSOLUTE_USER_PROMPT,
        images: [image],
        replySchema: AbsoluteEvaluationResultSchema,
        resultSchema: AbsoluteEvaluationResultSchema,
      },
      opts,
    );
  }

  /**
   * Score `image` against a catalog principle with the default template
   */
  async evaluatePrinciple(
    image: ImageInput,
    principle: DesignPrinciple,
    options: PrincipleEvaluateOptions = {},
  ): Promise<AbsoluteEvaluationResult[]> {
    return this.evaluate(image, getPrincipleText(principle), {
      ...options,
      promptTemplate: DEFAULT_ABSOLUTE_SYSTEM_PROMPT,
    });
  }

  run(image: ImageInput, principleText: string, options?: EvaluateOptions): Promise<AbsoluteEvaluationResult[]> {
    return this.evaluate(image, principleText, options);
  }

  runSettled(
    image: ImageInput,
    principleText: string,
    options?: EvaluateOptions,
  ): Promise<EvaluationOutcome<AbsoluteEvaluationResult>[]> {
    return this.evaluateSettled(image, principleText, options);
  }
}
