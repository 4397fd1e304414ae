import { describe, expect, it, vi } from 'vitest';

import { createConsoleLogger } from '../src/index.js';

function mockSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createConsoleLogger', () => {
  it('drops messages below the threshold', () => {
    const sink = mockSink();
    const logger = createConsoleLogger({ level: 'info', sink });

    logger.debug('hidden');
    logger.info('shown', { n: 1 });
    logger.error('also shown');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('shown', { n: 1 });
    expect(sink.error).toHaveBeenCalledWith('also shown');
  });

  it('defaults to warn and prefixes the logger name', () => {
    const sink = mockSink();
    const logger = createConsoleLogger({ name: 'bid-ledger', sink });

    logger.info('quiet');
    logger.warn('audit sink failed');

    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('bid-ledger: audit sink failed');
  });

  it('silences everything at silent', () => {
    const sink = mockSink();
    createConsoleLogger({ level: 'silent', sink }).error('nothing');
    expect(sink.error).not.toHaveBeenCalled();
  });
});
