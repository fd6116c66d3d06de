import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, silentLogger } from '../../../src/utils/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', { sink: (line) => lines.push(line) });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines.map((l) => l.slice(l.indexOf(']') + 2))).toEqual(['WARN: w', 'ERROR: e']);
  });

  it('prefixes an ISO timestamp, the level and the scope', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', { scope: 'monitor', sink: (line) => lines.push(line) });

    logger.debug('GET /zosmf/restjobs/jobs');

    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] DEBUG \[monitor\]: GET \/zosmf\/restjobs\/jobs$/);
  });

  it('passes extra arguments to the sink', () => {
    const sink = vi.fn();
    createLogger('info', { sink }).info('attempt', 3);
    expect(sink).toHaveBeenCalledWith(expect.stringMatching(/INFO: attempt$/), [3]);
  });

  it('writes to stderr by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('info').info('hello');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/INFO: hello$/);
  });

  it('silent drops everything', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    silentLogger.error('nothing');
    expect(spy).not.toHaveBeenCalled();
  });
});
