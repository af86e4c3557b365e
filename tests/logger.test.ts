import { describe, expect, it, vi } from 'vitest';

import { createLogger, Logger } from '../src/utils/logger.js';

describe('logger', () => {
  it('drops lines below the configured level', () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', sink: (l) => lines.push(l) });
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e', { code: 1 });

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\S+ warn w$/);
    expect(lines[1]).toMatch(/^\S+ error e \{"code":1\}$/);
  });

  it('writes JSON lines with nested scopes', () => {
    const lines: string[] = [];
    const logger = new Logger({ json: true, scope: 'relay', sink: (l) => lines.push(l) }).child('router');
    logger.info('picked', { file: 'sage.yaml' });

    const parsed: unknown = JSON.parse(lines[0] ?? '');
    expect(parsed).toMatchObject({ level: 'info', scope: 'relay:router', message: 'picked', data: { file: 'sage.yaml' } });
  });

  it('takes its level and format from the global flags', () => {
    const writes: string[] = [];
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });
    try {
      createLogger('x', {}).info('hidden');
      createLogger('x', { STACKRELAY_VERBOSE: '1' }).debug('shown');
      createLogger('x', { STACKRELAY_QUIET: '1' }).warn('as json');
    } finally {
      spy.mockRestore();
    }

    expect(writes).toHaveLength(2);
    expect(writes[0]).toMatch(/ debug \[x\] shown\n$/);
    const parsed: unknown = JSON.parse(writes[1] ?? '');
    expect(parsed).toMatchObject({ level: 'warn', scope: 'x', message: 'as json' });
  });
});
