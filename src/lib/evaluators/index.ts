export * from './types';
export * from './results';
export * from './absolute';
export * from './relative';
export {
  assertSampleCount,
  buildSystemPrompt,
  buildUserMessage,
  mergeOptions,
  withTimeout,
} from './dispatch';
export type { EvaluationPlan } from './dispatch';
