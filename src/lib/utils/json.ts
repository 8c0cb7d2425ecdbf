/**
 * Pull a JSON value out of a model reply
 */
import { debug } from './debug';

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Extract JSON from a reply that may wrap it in a code fence, quote it,
 * or surround it with prose. Returns `undefined` when nothing parses.
 */
export function extractJson(text: string): unknown {
  debug('prompt', 'Attempting to extract JSON from text (%d chars)', text.length);
  let t = text.trim();

  const block = t.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (block) {
    debug('prompt', 'Found code block, extracting content');
    t = block[1].trim();
  }

  // A JSON document serialised once more as a string literal
  if (t.startsWith('"') && t.endsWith('"') && t.length > 1) {
    const inner = tryParse(t);
    if (inner.ok && typeof inner.value === 'string') {
      const parsed = tryParse(inner.value);
      if (parsed.ok) {
        debug('prompt', 'Parsed JSON from quoted string');
        return parsed.value;
      }
    }
  }

  if ((t.startsWith('{') && t.endsWith('}')) || (t.startsWith('[') && t.endsWith(']'))) {
    const parsed = tryParse(t);
    if (parsed.ok) {
      debug('prompt', 'Parsed JSON object/array');
      return parsed.value;
    }
  }

  const m = t.match(/\{[\s\S]*\}|\[[\s\S]*\]/);
  if (m) {
    const parsed = tryParse(m[0]);
    if (parsed.ok) {
      debug('prompt', 'Parsed JSON embedded in surrounding text');
      return parsed.value;
    }
  }

  debug('prompt', 'Could not extract JSON from text');
  return undefined;
}
