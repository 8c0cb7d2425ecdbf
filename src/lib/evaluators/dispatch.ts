/**
 * Compose, dispatch, validate
 *
 * Both evaluators describe their request as an `EvaluationPlan` and hand it
 * here: the system prompt is rendered, the images encoded once, and
 * `numReturn` identical requests are sent concurrently. Each reply is
 * validated as soon as it arrives. Nothing is retried.
 */
import type { z } from 'zod';
import type { ChatMessage, ChatOptions, ContentPart, ModelAdapter } from '../types';
import { BatchEvaluationError, ModelTimeoutError } from '../errors';
import type { EvaluationOutcome } from '../errors';
import { imageToBase64, PNG_MIME_TYPE } from '../images/encode';
import type { ImageInput } from '../images/encode';
import { renderTemplate } from '../prompts/template';
import { DESIGN_PRINCIPLE_VARIABLE } from '../prompts/system';
import { parseStructuredReply, schemaInstruction } from '../schema';
import type { Schema } from '../schema';
import { debug } from '../utils/debug';
import type { EvaluateOptions } from './types';

export interface EvaluationPlan<T> {
  template: string;
  principleText: string;
  userText: string;
  images: ImageInput[];
  /** Object schema the model is told to follow */
  replySchema: z.AnyZodObject;
  /** Schema each reply is validated with; may reshape the reply */
  resultSchema: Schema<T>;
}

export function assertSampleCount(numReturn: number): void {
  if (!Number.isInteger(numReturn) || numReturn < 0) {
    throw new RangeError(`numReturn must be a non-negative integer, got ${numReturn}`);
  }
}

/**
 * Per-call options over evaluator defaults; an option left undefined keeps the default
 */
export function mergeOptions(defaults: EvaluateOptions, overrides: EvaluateOptions = {}): EvaluateOptions {
  return {
    promptTemplate: overrides.promptTemplate ?? defaults.promptTemplate,
    numReturn: overrides.numReturn ?? defaults.numReturn,
    timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs,
    temperature: overrides.temperature ?? defaults.temperature,
    maxTokens: overrides.maxTokens ?? defaults.maxTokens,
    schemaHint: overrides.schemaHint ?? defaults.schemaHint,
  };
}

export function buildSystemPrompt(
  template: string,
  principleText: string,
  replySchema?: z.AnyZodObject,
): string {
  const rendered = renderTemplate(template, { [DESIGN_PRINCIPLE_VARIABLE]: principleText });
  return replySchema ? `${rendered}\n\n${schemaInstruction(replySchema)}` : rendered;
}

/**
 * User turn: the instruction text followed by the images, in order
 */
export function buildUserMessage(text: string, encodedImages: string[]): ChatMessage {
  return {
    role: 'user',
    content: [
      { type: 'text', text },
      ...encodedImages.map((data): ContentPart => ({ type: 'image', mimeType: PNG_MIME_TYPE, data })),
    ],
  };
}

/**
 * Run `run` with an abort signal that fires after `timeoutMs`. The call
 * rejects with `ModelTimeoutError` at the deadline even if `run` ignores the
 * signal.
 */
export async function withTimeout<T>(
  timeoutMs: number | undefined,
  run: (signal?: AbortSignal) => Promise<T>,
): Promise<T> {
  if (timeoutMs === undefined) return run();

  const controller = new AbortController();
  const deadline = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(new ModelTimeoutError(timeoutMs)),
      { once: true },
    );
  });
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } catch (error) {
    if (controller.signal.aborted && !(error instanceof ModelTimeoutError)) {
      throw new ModelTimeoutError(timeoutMs, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Send `count` identical requests and validate each reply
 */
export async function dispatchSettled<T>(
  adapter: ModelAdapter,
  messages: ChatMessage[],
  resultSchema: Schema<T>,
  count: number,
  options: Pick<EvaluateOptions, 'timeoutMs' | 'temperature' | 'maxTokens'> = {},
): Promise<EvaluationOutcome<T>[]> {
  const chatOptions: ChatOptions = {
    json: true,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
  };

  const requests = Array.from({ length: count }, async (_, index): Promise<T> => {
    const raw = await withTimeout(options.timeoutMs, signal =>
      adapter.chat(messages, { ...chatOptions, signal }),
    );
    debug('evaluator', 'Reply %d/%d: %s', index + 1, count, raw);
    return parseStructuredReply(raw, resultSchema);
  });

  const settled = await Promise.allSettled(requests);
  return settled.map((s): EvaluationOutcome<T> =>
    s.status === 'fulfilled' ? { ok: true, value: s.value } : { ok: false, error: s.reason },
  );
}

/**
 * Results of a batch in which every request succeeded. A failed single
 * request rethrows its own error; any failure in a larger batch throws
 * `BatchEvaluationError` with all outcomes.
 */
export function unwrapOutcomes<T>(outcomes: EvaluationOutcome<T>[]): T[] {
  const results: T[] = [];
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      if (outcomes.length === 1) throw outcome.error;
      throw new BatchEvaluationError(outcomes);
    }
    results.push(outcome.value);
  }
  return results;
}

export async function runEvaluation<T>(
  adapter: ModelAdapter,
  plan: EvaluationPlan<T>,
  options: EvaluateOptions = {},
): Promise<EvaluationOutcome<T>[]> {
  const numReturn = options.numReturn ?? 1;
  assertSampleCount(numReturn);
  if (numReturn === 0) return [];

  const system = buildSystemPrompt(
    plan.template,
    plan.principleText,
    options.schemaHint === false ? undefined : plan.replySchema,
  );
  const encoded = await Promise.all(plan.images.map(image => imageToBase64(image)));
  debug('evaluator', 'Dispatching %d request(s) with %d image(s)', numReturn, encoded.length);

  const messages: ChatMessage[] = [
    { role: 'system', content: system },
    buildUserMessage(plan.userText, encoded),
  ];
  return dispatchSettled(adapter, messages, plan.resultSchema, numReturn, options);
}
