import type { EvaluationOutcome } from '../errors';
import type { ImageInput } from '../images/encode';

/**
 * Options for one evaluation call
 */
export interface EvaluateOptions {
  /** System-prompt template with a `{design_principle}` placeholder; empty means the default */
  promptTemplate?: string;
  /** Number of independent samples to request (default 1) */
  numReturn?: number;
  /** Per-request deadline; an expired request fails with `ModelTimeoutError` */
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  /** Append the reply schema to the system prompt (default true) */
  schemaHint?: boolean;
}

export type PrincipleEvaluateOptions = Omit<EvaluateOptions, 'promptTemplate'>;

export type ImagePair = readonly [ImageInput, ImageInput];

/**
 * What the absolute and relative evaluators have in common: images and
 * instruction text in, one validated result per sample out.
 */
export interface DesignEvaluator<TImages, TResult> {
  run(images: TImages, principleText: string, options?: EvaluateOptions): Promise<TResult[]>;
  runSettled(
    images: TImages,
    principleText: string,
    options?: EvaluateOptions,
  ): Promise<EvaluationOutcome<TResult>[]>;
}
