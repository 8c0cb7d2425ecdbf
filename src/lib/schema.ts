/**
 * Schema helpers for structured model replies
 *
 * The model is told what JSON to return through a hint rendered from the
 * zod schema, and its reply is parsed and validated against that same schema
 * as soon as it arrives.
 */
import { z } from 'zod';
import { ResponseValidationError } from './errors';
import { extractJson } from './utils/json';
import { debug } from './utils/debug';

export { z };

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;
export type Infer<T extends z.ZodTypeAny> = z.output<T>;

export const SCHEMA_HINT_PREAMBLE =
  'IMPORTANT: You must respond with a valid JSON object that matches this structure:';

/**
 * Example value for one field: its type, numeric bounds, enum options and
 * description, nested for arrays and objects.
 */
function hintFor(schema: z.ZodTypeAny): unknown {
  let hint: unknown;

  if (schema instanceof z.ZodString) {
    hint = 'string';
  } else if (schema instanceof z.ZodNumber) {
    const bounds: string[] = [];
    if (schema.minValue !== null) bounds.push(`min: ${schema.minValue}`);
    if (schema.maxValue !== null) bounds.push(`max: ${schema.maxValue}`);
    hint = (schema.isInt ? 'integer' : 'number') + (bounds.length ? ` (${bounds.join(', ')})` : '');
  } else if (schema instanceof z.ZodBoolean) {
    hint = 'boolean';
  } else if (schema instanceof z.ZodEnum) {
    const options: readonly string[] = schema.options;
    hint = options.join(' | ');
  } else if (schema instanceof z.ZodLiteral) {
    hint = schema.value;
  } else if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    hint = hintFor(schema.unwrap());
  } else if (schema instanceof z.ZodArray) {
    hint = [hintFor(schema.element)];
  } else if (schema instanceof z.ZodObject) {
    hint = shapeHint(schema.shape);
  } else if (schema instanceof z.ZodEffects) {
    hint = hintFor(schema.innerType());
  } else {
    hint = `${schema.constructor.name.replace(/^Zod/, '').toLowerCase()}_value`;
  }

  if (typeof hint === 'string' && schema.description) {
    return `${hint} - ${schema.description}`;
  }
  return hint;
}

function shapeHint(shape: z.ZodRawShape): Record<string, unknown> {
  const example: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(shape)) {
    example[key] = hintFor(value);
  }
  return example;
}

/**
 * Render a JSON example of an object schema for the model to follow
 */
export function schemaHint(shape: z.ZodRawShape): string {
  debug('prompt', 'Building schema hint for: %o', Object.keys(shape));
  return JSON.stringify(shapeHint(shape), null, 2);
}

/**
 * The instruction block appended to a system prompt to declare the reply schema
 */
export function schemaInstruction(schema: z.AnyZodObject): string {
  return `${SCHEMA_HINT_PREAMBLE}\n${schemaHint(schema.shape)}`;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Parse a raw model reply and validate it against `schema`.
 * Throws `ResponseValidationError` when the reply holds no JSON or the JSON
 * does not satisfy the schema; values are never clamped or coerced.
 */
export function parseStructuredReply<T>(raw: string, schema: Schema<T>): T {
  const candidate = extractJson(raw);
  if (candidate === undefined) {
    throw new ResponseValidationError('Model reply is not valid JSON', raw);
  }

  const result = schema.safeParse(candidate);
  if (!result.success) {
    debug('prompt', 'Schema validation failed: %o', result.error.issues);
    throw new ResponseValidationError(
      `Model reply does not match the expected schema: ${formatIssues(result.error.issues)}`,
      raw,
      result.error.issues,
      { cause: result.error },
    );
  }
  return result.data;
}
