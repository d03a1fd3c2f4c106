import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.js';

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => void lines.push(line) };
}

describe('createLogger', () => {
  it('prefixes lines with scope and level', () => {
    const { lines, write } = capture();
    createLogger('delivery', 'info', write).info('sent');
    expect(lines).toEqual(['[delivery] info: sent\n']);
  });

  it('drops lines below the configured level', () => {
    const { lines, write } = capture();
    const logger = createLogger('router', 'warn', write);
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    expect(lines).toEqual(['[router] warn: c\n']);
  });

  it('appends the error message', () => {
    const { lines, write } = capture();
    createLogger('router', 'info', write).error('handler failed', new Error('boom'));
    expect(lines).toEqual(['[router] error: handler failed: boom\n']);
  });
});
