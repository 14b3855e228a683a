import { describe, it, expect, jest } from '@jest/globals';
import { logger, toError } from '@/lib/logger';

// LOG_LEVEL is 'warn' for the test run (see tests/setup.ts).
describe('Logger', () => {
  it('should write one JSON line per entry', () => {
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    logger.warn('Task rejected', { subjectId: 'subject-1' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toMatchObject({
      level: 'warn',
      message: 'Task rejected',
      context: { subjectId: 'subject-1' },
    });
  });

  it('should drop entries below the configured level', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.info('Run started');
    logger.debug('noise');

    expect(spy).not.toHaveBeenCalled();
  });

  it('should merge nested child context', () => {
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    logger.child({ module: 'TaskQueue' }).child({ key: 'subject-1' }).warn('Task rejected', { queued: 2 });

    expect(JSON.parse(String(spy.mock.calls[0][0])).context).toEqual({
      module: 'TaskQueue',
      key: 'subject-1',
      queued: 2,
    });
  });

  it('should attach error details', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.error('Task failed', new Error('boom'));

    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry.error).toBe('boom');
    expect(entry.stack).toContain('Error: boom');
    expect(entry.context).toBeUndefined();
  });

  it('should wrap non-error values', () => {
    expect(toError('plain').message).toBe('plain');
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
  });
});
