import { asEntityId, asVerbInstanceId, type EntityId, type VerbInstanceId } from './branded.js';
import type { InstanceDirectory } from './domain.js';
import { encodeCanonicalEntity, type CanonicalEntity, type EntityInstance } from './entity-instance.js';
import type { EntitySchema } from './entity-schema.js';
import { ingestGameEvent } from './event-ingestion.js';
import type { GameEvent } from './game-events.js';
import { appendBounded, resolveKnowledgeBaseConfig, type KnowledgeBaseConfig, type KnowledgeBaseOptions } from './knowledge-config.js';
import {
  duplicateInstanceError,
  unknownDefinitionError,
  unknownVerbError,
} from './knowledge-error.js';
import type { KnowledgeLogger } from './knowledge-logger.js';
import type { PropertyRecord } from './property-value.js';
import type { QueryCondition } from './query-condition.js';
import type { VerbDefinition } from './verb-definition.js';
import type { VerbInstance } from './verb-instance.js';

export interface EventLogRecord {
  readonly sequence: number;
  readonly type: string;
  readonly payload: PropertyRecord;
  readonly recordedAt: Date;
}

export interface IngestionFailure {
  readonly kind: string;
  readonly message: string;
  readonly error: unknown;
  readonly recordedAt: Date;
}

/**
 * Registry of schemas, instances and verbs, plus the logs ingestion and verb execution append
 * to. Every operation runs to completion synchronously, so a lookup followed by a create is
 * never interleaved with another writer.
 */
export class KnowledgeBase implements InstanceDirectory {
  readonly config: KnowledgeBaseConfig;
  private readonly definitions = new Map<string, EntitySchema>();
  private readonly instances = new Map<string, EntityInstance>();
  private readonly instancesByClass = new Map<string, EntityInstance[]>();
  private readonly verbs = new Map<string, VerbDefinition>();
  private readonly externalIds = new Map<string, EntityId>();
  private readonly verbHistory: VerbInstance[] = [];
  private readonly eventLog: EventLogRecord[] = [];
  private readonly ingestionFailures: IngestionFailure[] = [];
  private eventSequence = 0;
  private verbSequence = 0;

  constructor(options: KnowledgeBaseOptions = {}) {
    this.config = resolveKnowledgeBaseConfig(options);
  }

  get logger(): KnowledgeLogger {
    return this.config.logger;
  }

  readonly clock = (): Date => this.config.clock();

  // ---------------------------------------------------------------------------
  // Definitions
  // ---------------------------------------------------------------------------

  registerDefinition(schema: EntitySchema): void {
    const replaced = this.definitions.has(schema.className);
    this.definitions.set(schema.className, schema);
    if (!this.instancesByClass.has(schema.className)) {
      this.instancesByClass.set(schema.className, []);
    }
    this.logger.logDefinitionRegistered({
      className: schema.className,
      propertyCount: schema.propertyNames.length,
      replaced,
    });
  }

  getDefinition(className: string): EntitySchema | undefined {
    return this.definitions.get(className);
  }

  hasDefinition(className: string): boolean {
    return this.definitions.has(className);
  }

  listDefinitions(): readonly EntitySchema[] {
    return [...this.definitions.keys()].sort().flatMap((className) => {
      const schema = this.definitions.get(className);
      return schema === undefined ? [] : [schema];
    });
  }

  // ---------------------------------------------------------------------------
  // Instances
  // ---------------------------------------------------------------------------

  /** Overrides apply all-or-nothing; on failure nothing is registered. */
  createInstance(className: string, objectId: string, overrides: PropertyRecord = {}): EntityInstance {
    const schema = this.definitions.get(className);
    if (schema === undefined) {
      throw unknownDefinitionError(className, [...this.definitions.keys()].sort());
    }
    const existing = this.instances.get(objectId);
    if (existing !== undefined) {
      throw duplicateInstanceError(objectId, existing.className);
    }

    const instance = schema.createInstance(objectId, { clock: this.config.clock });
    instance.updateProperties(overrides);
    this.instances.set(objectId, instance);
    this.classBucket(className).push(instance);
    this.logger.logInstanceCreated({ className, objectId });
    return instance;
  }

  /** Returns the registered instance when its class matches; overrides only apply on creation. */
  getOrCreateInstance(className: string, objectId: string, overrides: PropertyRecord = {}): EntityInstance {
    const existing = this.instances.get(objectId);
    if (existing === undefined) {
      return this.createInstance(className, objectId, overrides);
    }
    if (existing.className !== className) {
      throw duplicateInstanceError(objectId, existing.className);
    }
    return existing;
  }

  getInstance(objectId: string): EntityInstance | undefined {
    return this.instances.get(objectId);
  }

  hasInstance(objectId: string): boolean {
    return this.instances.has(objectId);
  }

  getInstancesByClass(className: string): EntityInstance[] {
    return [...(this.instancesByClass.get(className) ?? [])];
  }

  listInstances(): EntityInstance[] {
    return [...this.instances.values()];
  }

  get instanceCount(): number {
    return this.instances.size;
  }

  /** Conditions AND together left to right; an empty intermediate result stops early. */
  query(className: string, ...conditions: readonly QueryCondition[]): EntityInstance[] {
    let results = this.getInstancesByClass(className);
    for (const condition of conditions) {
      if (results.length === 0) {
        break;
      }
      results = results.filter((instance) => instance.matches(condition));
    }
    return results;
  }

  /**
   * Drops the instance from both indexes, forgets any external id bound to it and removes it
   * from the reference cells of every remaining instance (zone contents included).
   */
  removeInstance(objectId: string): boolean {
    const instance = this.instances.get(objectId);
    if (instance === undefined) {
      return false;
    }
    this.instances.delete(objectId);
    const bucket = this.instancesByClass.get(instance.className);
    if (bucket !== undefined) {
      const index = bucket.indexOf(instance);
      if (index >= 0) {
        bucket.splice(index, 1);
      }
    }
    for (const [key, boundId] of [...this.externalIds]) {
      if (boundId === objectId) {
        this.externalIds.delete(key);
      }
    }
    for (const remaining of this.instances.values()) {
      remaining.dropReferencesTo(objectId);
    }
    return true;
  }

  pruneInstances(predicate: (instance: EntityInstance) => boolean): number {
    const doomed = this.listInstances().filter(predicate);
    for (const instance of doomed) {
      this.removeInstance(instance.objectId);
    }
    return doomed.length;
  }

  // ---------------------------------------------------------------------------
  // External identity
  // ---------------------------------------------------------------------------

  bindExternalId(externalKey: string, objectId: string): void {
    this.externalIds.set(externalKey, asEntityId(objectId));
  }

  resolveExternalId(externalKey: string): EntityInstance | undefined {
    const objectId = this.externalIds.get(externalKey);
    return objectId === undefined ? undefined : this.instances.get(objectId);
  }

  // ---------------------------------------------------------------------------
  // Verbs
  // ---------------------------------------------------------------------------

  /** A second verb under the same name replaces the first. */
  registerVerb(definition: VerbDefinition): void {
    this.verbs.set(definition.name, definition);
  }

  getVerb(name: string): VerbDefinition | undefined {
    return this.verbs.get(name);
  }

  requireVerb(name: string): VerbDefinition {
    const verb = this.verbs.get(name);
    if (verb === undefined) {
      throw unknownVerbError(name);
    }
    return verb;
  }

  listVerbs(): readonly VerbDefinition[] {
    return [...this.verbs.values()];
  }

  /** Registered verbs the instance's class advertises. */
  availableVerbs(instance: EntityInstance): readonly VerbDefinition[] {
    return [...instance.schema.verbNames].flatMap((name) => {
      const verb = this.verbs.get(name);
      return verb === undefined ? [] : [verb];
    });
  }

  nextVerbInstanceId(): VerbInstanceId {
    this.verbSequence += 1;
    return asVerbInstanceId(`verb_${this.verbSequence}`);
  }

  recordVerbExecution(verb: VerbInstance): void {
    appendBounded(this.verbHistory, verb, this.config.maxVerbHistory);
    this.logger.logVerbExecuted({
      verb: verb.name,
      sourceId: verb.source.objectId,
      targetIds: verb.targets.map((target) => target.objectId),
      outcome: verb.fizzled ? 'fizzled' : 'executed',
    });
  }

  getVerbHistory(): readonly VerbInstance[] {
    return [...this.verbHistory];
  }

  // ---------------------------------------------------------------------------
  // Event log
  // ---------------------------------------------------------------------------

  recordEvent(type: string, payload: PropertyRecord): EventLogRecord {
    this.eventSequence += 1;
    const record: EventLogRecord = {
      sequence: this.eventSequence,
      type,
      payload: { ...payload },
      recordedAt: this.config.clock(),
    };
    appendBounded(this.eventLog, record, this.config.maxEventLogEntries);
    return record;
  }

  getEventLog(): readonly EventLogRecord[] {
    return [...this.eventLog];
  }

  recordIngestionFailure(kind: string, error: unknown): IngestionFailure {
    const failure: IngestionFailure = {
      kind,
      message: error instanceof Error ? error.message : String(error),
      error,
      recordedAt: this.config.clock(),
    };
    appendBounded(this.ingestionFailures, failure, this.config.maxIngestionFailures);
    this.logger.logIngestionFailure({ kind, message: failure.message });
    return failure;
  }

  getIngestionFailures(): readonly IngestionFailure[] {
    return [...this.ingestionFailures];
  }

  // ---------------------------------------------------------------------------
  // Ingestion and state
  // ---------------------------------------------------------------------------

  /** Never throws; a failed event is logged and recorded, and `false` is returned. */
  ingest(event: GameEvent): boolean {
    return ingestGameEvent(this, event);
  }

  /** Returns how many events were ingested without failure. */
  ingestAll(events: Iterable<GameEvent>): number {
    let succeeded = 0;
    for (const event of events) {
      if (this.ingest(event)) {
        succeeded += 1;
      }
    }
    return succeeded;
  }

  /** Canonical forms of every instance, ordered by object id. */
  canonicalState(): readonly CanonicalEntity[] {
    return this.listInstances()
      .map((instance) => instance.toCanonicalForm())
      .sort((left, right) => (left.objectId < right.objectId ? -1 : left.objectId > right.objectId ? 1 : 0));
  }

  /** Text form of `canonicalState`, for comparing two knowledge bases. */
  encodeCanonicalState(): string {
    return this.canonicalState().map((entity) => encodeCanonicalEntity(entity)).join('\n');
  }

  private classBucket(className: string): EntityInstance[] {
    const existing = this.instancesByClass.get(className);
    if (existing !== undefined) {
      return existing;
    }
    const created: EntityInstance[] = [];
    this.instancesByClass.set(className, created);
    return created;
  }
}
