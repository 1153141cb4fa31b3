import { afterEach, describe, expect, it, vi } from 'vitest';

import { logEvent } from '@/lib/logging/logger';

const previousLevel = process.env.DEVICE_RECONCILE_LOG_LEVEL;

afterEach(() => {
  if (previousLevel === undefined) delete process.env.DEVICE_RECONCILE_LOG_LEVEL;
  else process.env.DEVICE_RECONCILE_LOG_LEVEL = previousLevel;
  vi.restoreAllMocks();
});

describe('logEvent', () => {
  it('emits a single JSON line and truncates *_excerpt fields', () => {
    process.env.DEVICE_RECONCILE_LOG_LEVEL = 'info';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logEvent({
      level: 'info',
      service: 'engine',
      event_type: 'sync.run_finished',
      run_id: 'run_1',
      payload_excerpt: 'x'.repeat(3000),
    });

    expect(spy).toHaveBeenCalledTimes(1);
    const line = spy.mock.calls[0]?.[0];
    expect(typeof line).toBe('string');

    const obj: unknown = JSON.parse(String(line));
    expect(obj).toMatchObject({
      event_type: 'sync.run_finished',
      run_id: 'run_1',
      ts: expect.any(String),
      payload_excerpt: 'x'.repeat(2000),
    });
  });

  it('drops debug events unless the debug level is enabled', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    process.env.DEVICE_RECONCILE_LOG_LEVEL = 'info';
    logEvent({ level: 'debug', service: 'engine', event_type: 'classify.fallback' });
    expect(spy).not.toHaveBeenCalled();

    process.env.DEVICE_RECONCILE_LOG_LEVEL = 'debug';
    logEvent({ level: 'debug', service: 'engine', event_type: 'classify.fallback' });
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
