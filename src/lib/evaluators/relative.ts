/**
 * Relative evaluation: compare two designs
 */
import type { ModelAdapter, ModelReference } from '../types';
import type { EvaluationOutcome } from '../errors';
import type { ImageInput } from '../images/encode';
import { resolveAdapter } from '../models';
import { getPrincipleText } from '../prompts/principles';
import type { DesignPrinciple } from '../prompts/principles';
import { DEFAULT_RELATIVE_SYSTEM_PROMPT, RELATIVE_USER_PROMPT } from '../prompts/system';
import { debug } from '../utils/debug';
import { mergeOptions, runEvaluation, unwrapOutcomes } from './dispatch';
import { RelativeEvaluationReplySchema, RelativeEvaluationResultSchema } from './results';
import type { RelativeEvaluationResult } from './results';
import type { DesignEvaluator, EvaluateOptions, ImagePair, PrincipleEvaluateOptions } from './types';

export class RelativeEvaluator implements DesignEvaluator<ImagePair, RelativeEvaluationResult> {
  private readonly adapter: ModelAdapter;
  private readonly defaults: EvaluateOptions;

  constructor(model: ModelReference, defaults: EvaluateOptions = {}) {
    this.adapter = resolveAdapter(model);
    this.defaults = defaults;
  }

  /**
   * Compare design (a) with design (b). Both images are sent, in that order.
   */
  async evaluate(
    imageA: ImageInput,
    imageB: ImageInput,
    principleText: string,
    options: EvaluateOptions = {},
  ): Promise<RelativeEvaluationResult[]> {
    return unwrapOutcomes(await this.evaluateSettled(imageA, imageB, principleText, options));
  }

  async evaluateSettled(
    imageA: ImageInput,
    imageB: ImageInput,
    principleText: string,
    options: EvaluateOptions = {},
  ): Promise<EvaluationOutcome<RelativeEvaluationResult>[]> {
    const opts = mergeOptions(this.defaults, options);
    debug('evaluator', 'Relative evaluation with %d sample(s)', opts.numReturn ?? 1);
    return runEvaluation(
      this.adapter,
      {
        template: opts.promptTemplate || DEFAULT_RELATIVE_SYSTEM_PROMPT,
        principleText,
        userText: RELATIVE_USER_PROMPT,
        images: [imageA, imageB],
        replySchema: RelativeEvaluationReplySchema,
        resultSchema: RelativeEvaluationResultSchema,
      },
      opts,
    );
  }

  async evaluatePrinciple(
    imageA: ImageInput,
    imageB: ImageInput,
    principle: DesignPrinciple,
    options: PrincipleEvaluateOptions = {},
  ): Promise<RelativeEvaluationResult[]> {
    return this.evaluate(imageA, imageB, getPrincipleText(principle), {
      ...options,
      promptTemplate: DEFAULT_RELATIVE_SYSTEM_PROMPT,
    });
  }

  run(images: ImagePair, principleText: string, options?: EvaluateOptions): Promise<RelativeEvaluationResult[]> {
    return this.evaluate(images[0], images[1], principleText, options);
  }

  runSettled(
    images: ImagePair,
    principleText: string,
    options?: EvaluateOptions,
  ): Promise<EvaluationOutcome<RelativeEvaluationResult>[]> {
    return this.evaluateSettled(images[0], images[1], principleText, options);
  }
}
