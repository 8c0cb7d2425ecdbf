/**
 * Helpers shared by the provider adapters
 */
import type { ContentPart } from '../types';

/**
 * Text of a message with any image parts dropped
 */
export function textOf(content: string | ContentPart[]): string {
  if (typeof content === 'string') return content;
  return content
    .flatMap(part => (part.type === 'text' ? [part.text] : []))
    .join('\n\n');
}

export function countImages(content: string | ContentPart[]): number {
  return typeof content === 'string' ? 0 : content.filter(part => part.type === 'image').length;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
