import { createKnowledgeLogger, type KnowledgeLogger } from './knowledge-logger.js';

export interface KnowledgeBaseOptions {
  /** Source of instance timestamps and log record times. */
  readonly clock?: () => Date;
  readonly logger?: KnowledgeLogger;
  readonly maxEventLogEntries?: number;
  readonly maxVerbHistory?: number;
  readonly maxIngestionFailures?: number;
}

export interface KnowledgeBaseConfig {
  readonly clock: () => Date;
  readonly logger: KnowledgeLogger;
  readonly maxEventLogEntries: number;
  readonly maxVerbHistory: number;
  readonly maxIngestionFailures: number;
}

export const DEFAULT_MAX_EVENT_LOG_ENTRIES = 10_000;
export const DEFAULT_MAX_VERB_HISTORY = 10_000;
export const DEFAULT_MAX_INGESTION_FAILURES = 1_000;

const systemClock = (): Date => new Date();

function normalizeLimit(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative safe integer, received ${value}`);
  }
  return value;
}

export function resolveKnowledgeBaseConfig(options: KnowledgeBaseOptions = {}): KnowledgeBaseConfig {
  return {
    clock: options.clock ?? systemClock,
    logger: options.logger ?? createKnowledgeLogger(),
    maxEventLogEntries: normalizeLimit('maxEventLogEntries', options.maxEventLogEntries, DEFAULT_MAX_EVENT_LOG_ENTRIES),
    maxVerbHistory: normalizeLimit('maxVerbHistory', options.maxVerbHistory, DEFAULT_MAX_VERB_HISTORY),
    maxIngestionFailures: normalizeLimit(
      'maxIngestionFailures',
      options.maxIngestionFailures,
      DEFAULT_MAX_INGESTION_FAILURES,
    ),
  };
}

/** Appends and drops the oldest entries beyond `limit`; a zero limit keeps nothing. */
export function appendBounded<T>(entries: T[], entry: T, limit: number): void {
  entries.push(entry);
  if (entries.length > limit) {
    entries.splice(0, entries.length - limit);
  }
}
