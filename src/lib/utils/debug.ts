/**
 * Namespaced debug logging
 *
 * Messages go to `console.log` (or the writer set with `setDebugWriter`) as
 * `[namespace] message` and are dropped unless
 * debugging is on for that namespace (or for `all`). Set `DEBUG=llm,evaluator`
 * or `DEBUG=*` in the environment, or call `judge.debug(...)`.
 */
import type { DebugSettings } from '../types';

export const DEBUG_NAMESPACES = ['llm', 'evaluator', 'image', 'prompt', 'core', 'cli'] as const;

export type DebugNamespace = (typeof DEBUG_NAMESPACES)[number];

interface DebugState {
  enabled: boolean;
  all: boolean;
  namespaces: Set<string>;
}

const state: DebugState = {
  enabled: false,
  all: false,
  namespaces: new Set(),
};

export type DebugWriter = (message: string, ...args: unknown[]) => void;

const toStdout: DebugWriter = (message, ...args) => console.log(message, ...args);

let writer: DebugWriter = toStdout;

/**
 * Route debug output elsewhere; no argument restores `console.log`
 */
export function setDebugWriter(next: DebugWriter = toStdout): void {
  writer = next;
}

/**
 * Log a debug message if debugging is enabled for the given namespace.
 * `message` may hold console format specifiers (%s, %d, %o).
 */
export function debug(namespace: DebugNamespace, message: string, ...args: unknown[]): void {
  if (isDebugEnabled(namespace)) {
    writer(`[${namespace}] ${message}`, ...args);
  }
}

export function isDebugEnabled(namespace: DebugNamespace): boolean {
  return state.enabled && (state.all || state.namespaces.has(namespace));
}

/**
 * Enable or disable debugging globally
 */
export function enableDebug(enabled: boolean): void {
  state.enabled = enabled;
}

/**
 * Enable or disable debugging for one namespace; `all` and `*` toggle every namespace
 */
export function enableNamespace(namespace: string, enabled: boolean): void {
  if (namespace === 'all' || namespace === '*') {
    state.all = enabled;
    return;
  }
  if (enabled) state.namespaces.add(namespace);
  else state.namespaces.delete(namespace);
}

/**
 * Parse a debug string (e.g. 'llm,evaluator') and enable those namespaces
 */
export function parseDebugString(debugString: string): void {
  if (!debugString.trim()) return;
  enableDebug(true);
  debugString
    .split(',')
    .map(ns => ns.trim())
    .filter(Boolean)
    .forEach(ns => enableNamespace(ns, true));
}

/**
 * Apply the settings accepted by `judge.debug`
 */
export function configureDebug(settings: DebugSettings): void {
  if (typeof settings === 'string') {
    parseDebugString(settings);
    return;
  }
  enableDebug(settings.enabled);
  if (settings.namespaces) {
    settings.namespaces.forEach(ns => enableNamespace(ns, settings.enabled));
  } else if (settings.enabled) {
    enableNamespace('all', true);
  }
}

/**
 * Turn everything off again
 */
export function resetDebug(): void {
  state.enabled = false;
  state.all = false;
  state.namespaces.clear();
  writer = toStdout;
}

if (typeof process !== 'undefined' && process.env.DEBUG) {
  parseDebugString(process.env.DEBUG);
}
