import { afterEach, describe, expect, test, vi } from 'vitest';
import {
  configureDebug,
  debug,
  enableDebug,
  enableNamespace,
  isDebugEnabled,
  parseDebugString,
  resetDebug,
  setDebugWriter,
} from '../../src/lib/utils/debug';

describe('Debug logging', () => {
  afterEach(() => {
    resetDebug();
    vi.restoreAllMocks();
  });

  test('is silent until enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    debug('llm', 'hidden');
    expect(log).not.toHaveBeenCalled();
  });

  test('prefixes messages with their namespace', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    parseDebugString('llm');
    debug('llm', 'Sending %d request(s)', 2);
    debug('image', 'not shown');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[llm] Sending %d request(s)', 2);
  });

  test('parses comma-separated namespaces', () => {
    parseDebugString(' evaluator , prompt ');
    expect(isDebugEnabled('evaluator')).toBe(true);
    expect(isDebugEnabled('prompt')).toBe(true);
    expect(isDebugEnabled('llm')).toBe(false);
  });

  test('a star enables every namespace', () => {
    parseDebugString('*');
    expect(isDebugEnabled('cli')).toBe(true);
    expect(isDebugEnabled('core')).toBe(true);
  });

  test('namespaces need the global switch', () => {
    enableNamespace('llm', true);
    expect(isDebugEnabled('llm')).toBe(false);
    enableDebug(true);
    expect(isDebugEnabled('llm')).toBe(true);
  });

  test('accepts object settings', () => {
    configureDebug({ enabled: true, namespaces: ['image'] });
    expect(isDebugEnabled('image')).toBe(true);
    expect(isDebugEnabled('llm')).toBe(false);

    resetDebug();
    configureDebug({ enabled: true });
    expect(isDebugEnabled('llm')).toBe(true);

    configureDebug({ enabled: false });
    expect(isDebugEnabled('llm')).toBe(false);
  });

  test('a custom writer receives prefixed lines until reset', () => {
    const lines: unknown[][] = [];
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    parseDebugString('llm');
    setDebugWriter((message, ...args) => {
      lines.push([message, ...args]);
    });

    debug('llm', 'Sent %d request(s)', 2);
    resetDebug();
    parseDebugString('llm');
    debug('llm', 'back on stdout');

    expect(lines).toEqual([['[llm] Sent %d request(s)', 2]]);
    expect(log).toHaveBeenCalledWith('[llm] back on stdout');
  });
});
