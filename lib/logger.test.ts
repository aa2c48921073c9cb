import { describe, it, expect, vi } from 'vitest';
import { logger } from './logger';

describe('logger', () => {
  it('writes JSON lines with nested context and bound fields', () => {
    vi.stubEnv('LOG_FORMAT', 'json');
    vi.stubEnv('LOG_LEVEL', 'info');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.child('schedule-driver', { run: 1 }).child('post').info('Slot due', { occurrenceKey: 'k' });

    expect(out).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(out.mock.calls[0][0]))).toMatchObject({
      level: 'info',
      context: 'schedule-driver:post',
      message: 'Slot due',
      data: { run: 1, occurrenceKey: 'k' },
    });
  });

  it('drops lines below LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const log = logger.child('rate-limiter');
    log.info('Admitted');
    log.warn('Denied');

    expect(out).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('uses a readable line outside JSON mode', () => {
    vi.stubEnv('LOG_FORMAT', 'text');
    vi.stubEnv('LOG_LEVEL', 'info');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.child('linkedin').info('Published post');

    expect(String(out.mock.calls[0][0]).endsWith('[linkedin] Published post')).toBe(true);
  });
});
