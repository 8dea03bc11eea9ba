export * from './binding-template.js';
export * from './branded.js';
export * from './common-verbs.js';
export * from './definition-document.js';
export * from './diagnostics.js';
export * from './domain.js';
export * from './entity-hash.js';
export * from './entity-instance.js';
export * from './entity-schema.js';
export * from './event-ingestion.js';
export * from './export-records.js';
export * from './game-events.js';
export * from './knowledge-base.js';
export * from './knowledge-config.js';
export * from './knowledge-error.js';
export * from './knowledge-handle.js';
export * from './knowledge-logger.js';
export * from './match-seeder.js';
export * from './property-cell.js';
export * from './property-value.js';
export * from './query-condition.js';
export * from './verb-context.js';
export * from './verb-costs.js';
export * from './verb-definition.js';
export * from './verb-effects.js';
export * from './verb-instance.js';
export * from './verb-value.js';
