import { afterEach, describe, it, expect, vi } from 'vitest';
import { SharedHandle, configure, createLogger, resetConfig } from './index';
import type { DefaultBlock } from './internal';

const block: DefaultBlock = {
  id: 7,
  strong: 1,
  weak: 0,
  phase: 'live',
  kind: 'default',
  target: null,
};

afterEach(() => {
  resetConfig();
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('should stay silent when logging is off', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    const logger = createLogger({});
    logger.logBlock('allocate', block);
    logger.logFailure('makeShared', new Error('boom'));

    expect(debug).not.toHaveBeenCalled();
  });

  it('should log block events with a summary', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    createLogger({ log: true }).logBlock('allocate', block);

    expect(debug).toHaveBeenCalledWith('refhold:allocate | block#7', {
      kind: 'default',
      strong: 1,
      weak: 0,
      phase: 'live',
    });
  });

  it('should log failures with the error text', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    createLogger({ log: true }).logFailure('makeShared', new Error('boom'));

    expect(debug).toHaveBeenCalledWith('refhold:failure | makeShared', 'Error: boom');
  });

  it('should follow a handle through its lifecycle when enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    configure({ debug: { log: true } });

    const p = SharedHandle.of({ n: 1 });
    p.reset();

    const labels = debug.mock.calls.map((call) => String(call[0]));
    expect(labels).toHaveLength(3);
    expect(labels[0]).toMatch(/^refhold:allocate \| block#\d+$/);
    expect(labels[1]).toMatch(/^refhold:dispose \| block#\d+$/);
    expect(labels[2]).toMatch(/^refhold:free \| block#\d+$/);
  });
});
