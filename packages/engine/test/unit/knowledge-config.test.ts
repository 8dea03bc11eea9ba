import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  appendBounded,
  DEFAULT_MAX_EVENT_LOG_ENTRIES,
  DEFAULT_MAX_INGESTION_FAILURES,
  DEFAULT_MAX_VERB_HISTORY,
  resolveKnowledgeBaseConfig,
  silentKnowledgeLogger,
} from '../../src/kernel/index.js';

describe('resolveKnowledgeBaseConfig', () => {
  it('fills in defaults', () => {
    const config = resolveKnowledgeBaseConfig();
    assert.equal(config.maxEventLogEntries, DEFAULT_MAX_EVENT_LOG_ENTRIES);
    assert.equal(config.maxVerbHistory, DEFAULT_MAX_VERB_HISTORY);
    assert.equal(config.maxIngestionFailures, DEFAULT_MAX_INGESTION_FAILURES);
    assert.equal(config.logger.enabled, false);
    assert.ok(config.clock() instanceof Date);
  });

  it('keeps supplied values', () => {
    const clock = (): Date => new Date(0);
    const config = resolveKnowledgeBaseConfig({ clock, logger: silentKnowledgeLogger, maxVerbHistory: 0 });
    assert.equal(config.clock, clock);
    assert.equal(config.logger, silentKnowledgeLogger);
    assert.equal(config.maxVerbHistory, 0);
  });

  it('rejects negative and fractional limits', () => {
    assert.throws(
      () => resolveKnowledgeBaseConfig({ maxEventLogEntries: -1 }),
      (error: unknown) =>
        error instanceof RangeError
        && error.message === 'maxEventLogEntries must be a non-negative safe integer, received -1',
    );
    assert.throws(() => resolveKnowledgeBaseConfig({ maxIngestionFailures: 2.5 }), RangeError);
  });
});

describe('appendBounded', () => {
  it('drops the oldest entries beyond the limit', () => {
    const entries = [1, 2];
    appendBounded(entries, 3, 2);
    assert.deepEqual(entries, [2, 3]);
  });

  it('keeps nothing with a zero limit', () => {
    const entries: number[] = [];
    appendBounded(entries, 1, 0);
    assert.deepEqual(entries, []);
  });
});
