// prompts/types.ts

export type PromptVariables = Record<string, string>;

export interface PromptVariable {
  name: string;
}

/**
 * A template is a sequence of literal text and named placeholders.
 */
export type PromptSegment = string | PromptVariable;

export interface ParsedTemplate {
  segments: PromptSegment[];
  /** Distinct placeholders in order of first appearance */
  variables: PromptVariable[];
}
