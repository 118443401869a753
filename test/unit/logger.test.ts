import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createLogger, Logger, silentLogger } from '../../src/kernel/logger.js';
import type { LogRecord } from '../../src/kernel/logger.js';

describe('Logger', () => {
  it('filters records below the configured level', () => {
    const records: LogRecord[] = [];
    const logger = new Logger({ level: 'warn', sink: (record) => records.push(record) });

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('kept', { generation: 2 });
    logger.error('also kept');

    assert.deepEqual(records, [
      { level: 'warn', context: '', message: 'kept', data: { generation: 2 } },
      { level: 'error', context: '', message: 'also kept' },
    ]);
  });

  it('joins child contexts with a colon and shares the sink', () => {
    const records: LogRecord[] = [];
    const logger = createLogger('content', { level: 'debug', sink: (record) => records.push(record) });

    logger.child('reload').child('watch').debug('tick');

    assert.deepEqual(records, [{ level: 'debug', context: 'content:reload:watch', message: 'tick' }]);
  });

  it('writes nothing when silent', () => {
    const records: LogRecord[] = [];
    const logger = new Logger({ silent: true, sink: (record) => records.push(record) });

    logger.error('nope');
    logger.child('inner').error('still nope');
    silentLogger().error('never printed');

    assert.deepEqual(records, []);
  });
});
