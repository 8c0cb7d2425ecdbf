/**
 * System-prompt templates
 *
 * Templates use format-string placeholders: `{name}` is replaced by the
 * variable of that name, while `{{` and `}}` stand for literal braces (so a
 * JSON example inside a template is written with doubled braces).
 */
import { PromptTemplateError } from '../errors';
import { debug } from '../utils/debug';
import type { ParsedTemplate, PromptSegment, PromptVariable, PromptVariables } from './types';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function parseTemplate(template: string): ParsedTemplate {
  const segments: PromptSegment[] = [];
  const variables: PromptVariable[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    const ch = template[i];
    const next = template[i + 1];

    if (ch === '{' && next === '{') {
      text += '{';
      i += 2;
      continue;
    }
    if (ch === '}' && next === '}') {
      text += '}';
      i += 2;
      continue;
    }
    if (ch === '{') {
      const end = template.indexOf('}', i + 1);
      if (end < 0) {
        throw new PromptTemplateError(`Unclosed "{" at position ${i}`);
      }
      const name = template.slice(i + 1, end).trim();
      if (!VARIABLE_NAME.test(name)) {
        throw new PromptTemplateError(`Invalid placeholder "{${name}}" at position ${i}`);
      }
      if (text) {
        segments.push(text);
        text = '';
      }
      const variable: PromptVariable = { name };
      segments.push(variable);
      if (!variables.some(v => v.name === name)) variables.push(variable);
      i = end + 1;
      continue;
    }
    if (ch === '}') {
      throw new PromptTemplateError(`Single "}" at position ${i}; write "}}" for a literal brace`);
    }
    text += ch;
    i++;
  }

  if (text) segments.push(text);
  debug('prompt', 'Template parsed with %d segments and %d variables', segments.length, variables.length);
  return { segments, variables };
}

export class PromptTemplate {
  readonly segments: PromptSegment[];
  readonly variables: PromptVariable[];

  constructor(readonly source: string) {
    const { segments, variables } = parseTemplate(source);
    this.segments = segments;
    this.variables = variables;
  }

  /**
   * Substitute every placeholder. Variables the template does not use are ignored.
   */
  render(vars: PromptVariables): string {
    const missing = this.variables.filter(v => !Object.prototype.hasOwnProperty.call(vars, v.name));
    if (missing.length) {
      throw new PromptTemplateError(
        `Missing value for template variable(s): ${missing.map(v => v.name).join(', ')}`,
      );
    }
    const rendered = this.segments
      .map(seg => (typeof seg === 'string' ? seg : vars[seg.name]))
      .join('');
    debug('prompt', 'Rendered template length: %d characters', rendered.length);
    return rendered;
  }
}

/**
 * Parse and render in one step
 */
export function renderTemplate(template: string, vars: PromptVariables): string {
  return new PromptTemplate(template).render(vars);
}
