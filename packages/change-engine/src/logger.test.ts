import { describe, expect, it, vi } from 'vitest';
import { Logger } from './logger.js';

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Logger', () => {
  it('writes nothing unless enabled', () => {
    const sink = createSink();
    const logger = new Logger(false, 'docpatch', sink);

    logger.error('failed');

    expect(logger.isEnabled).toBe(false);
    expect(sink.error).not.toHaveBeenCalled();
  });

  it('prefixes messages with the scope and forwards context', () => {
    const sink = createSink();
    const logger = new Logger(true, 'docpatch', sink);

    logger.warn('careful', { changeId: 'CHG-1' });

    expect(sink.warn).toHaveBeenCalledWith('[docpatch] careful', { changeId: 'CHG-1' });
  });

  it('nests child scopes and keeps the enabled flag', () => {
    const sink = createSink();
    const child = new Logger(true, 'docpatch', sink).child('apply');

    child.debug('step');

    expect(child.isEnabled).toBe(true);
    expect(sink.debug).toHaveBeenCalledWith('[docpatch:apply] step');
  });
});
