import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  bindVerb,
  condition,
  createKnowledgeLogger,
  defineVerb,
  isKnowledgeErrorCode,
  KnowledgeBase,
} from '../../src/kernel/index.js';
import {
  buildCreatureSchema,
  buildPlayerSchema,
  createRecordingConsole,
  createTestKnowledgeBase,
} from '../helpers/knowledge-fixtures.js';

const withSchemas = (kb = createTestKnowledgeBase()): KnowledgeBase => {
  kb.registerDefinition(buildCreatureSchema());
  kb.registerDefinition(buildPlayerSchema());
  return kb;
};

describe('KnowledgeBase definitions', () => {
  it('lists definitions by class name', () => {
    const kb = withSchemas();
    assert.deepEqual(kb.listDefinitions().map((schema) => schema.className), ['Creature', 'Player']);
    assert.equal(kb.hasDefinition('Creature'), true);
    assert.equal(kb.getDefinition('Card'), undefined);
  });

  it('logs registration and replacement', () => {
    const cons = createRecordingConsole();
    const kb = createTestKnowledgeBase({ logger: createKnowledgeLogger({ console: cons, enabled: true }) });
    kb.registerDefinition(buildPlayerSchema());
    kb.registerDefinition(buildPlayerSchema());
    assert.deepEqual(cons.logs, [
      '[KbDefinition] Registered Player (5 properties)',
      '[KbDefinition] Replaced Player (5 properties)',
    ]);
  });
});

describe('KnowledgeBase instances', () => {
  it('creates instances with overrides and indexes them by id and class', () => {
    const kb = withSchemas();
    const bear = kb.createInstance('Creature', 'card_1', { name: 'Bear', power: 2 });
    assert.equal(bear.getProperty('power'), 2);
    assert.equal(kb.getInstance('card_1'), bear);
    assert.equal(kb.hasInstance('card_1'), true);
    assert.deepEqual(kb.getInstancesByClass('Creature'), [bear]);
    assert.deepEqual(kb.getInstancesByClass('Player'), []);
    assert.deepEqual(kb.getInstancesByClass('Unknown'), []);
    assert.equal(kb.instanceCount, 1);
  });

  it('stamps instances from the configured clock', () => {
    const kb = withSchemas();
    const bear = kb.createInstance('Creature', 'card_1', { name: 'Bear' });
    assert.equal(bear.createdAt.toISOString(), '2024-01-01T00:00:00.000Z');
    assert.equal(bear.lastModified.toISOString(), '2024-01-01T00:00:01.000Z');
  });

  it('names the registered classes when the class is unknown', () => {
    const kb = withSchemas();
    assert.throws(
      () => kb.createInstance('Planeswalker', 'pw_1'),
      (error: unknown) =>
        isKnowledgeErrorCode(error, 'UNKNOWN_DEFINITION')
        && error.message === 'No definition found for class: Planeswalker'
        && error.context.availableClassNames?.join(',') === 'Creature,Player',
    );
  });

  it('rejects a duplicate id', () => {
    const kb = withSchemas();
    kb.createInstance('Creature', 'card_1', { name: 'Bear' });
    assert.throws(
      () => kb.createInstance('Player', 'card_1'),
      (error: unknown) =>
        isKnowledgeErrorCode(error, 'DUPLICATE_INSTANCE')
        && error.message === "Instance id 'card_1' is already registered (class 'Creature')",
    );
  });

  it('registers nothing when an override is rejected', () => {
    const kb = withSchemas();
    assert.throws(() => kb.createInstance('Creature', 'card_1', { name: 'Bear', power: 1000 }));
    assert.equal(kb.hasInstance('card_1'), false);
    assert.deepEqual(kb.getInstancesByClass('Creature'), []);
  });

  it('returns an existing instance from getOrCreateInstance and ignores its overrides', () => {
    const kb = withSchemas();
    const first = kb.getOrCreateInstance('Creature', 'card_1', { name: 'Bear' });
    const second = kb.getOrCreateInstance('Creature', 'card_1', { name: 'Wolf' });
    assert.equal(second, first);
    assert.equal(second.getProperty('name'), 'Bear');
    assert.equal(kb.instanceCount, 1);
    assert.throws(
      () => kb.getOrCreateInstance('Player', 'card_1'),
      (error: unknown) => isKnowledgeErrorCode(error, 'DUPLICATE_INSTANCE'),
    );
  });

  it('hands out copies of the class index', () => {
    const kb = withSchemas();
    kb.createInstance('Creature', 'card_1', { name: 'Bear' });
    kb.getInstancesByClass('Creature').pop();
    assert.equal(kb.getInstancesByClass('Creature').length, 1);
  });

  it('queries a class with conditions combined', () => {
    const kb = withSchemas();
    kb.createInstance('Creature', 'card_1', { name: 'Bear', power: 2, zone: 'Battlefield' });
    kb.createInstance('Creature', 'card_2', { name: 'Wolf', power: 3, zone: 'Battlefield' });
    kb.createInstance('Creature', 'card_3', { name: 'Giant', power: 5, zone: 'Hand' });
    const found = kb.query('Creature', condition('zone', 'eq', 'Battlefield'), condition('power', 'gte', 3));
    assert.deepEqual(found.map((instance) => instance.objectId), ['card_2']);
    assert.equal(kb.query('Creature').length, 3);
    assert.deepEqual(kb.query('Player', condition('life', 'eq', 20)), []);
  });

  it('removes an instance along with its external bindings', () => {
    const kb = withSchemas();
    kb.createInstance('Creature', 'card_1', { name: 'Bear' });
    kb.bindExternalId('card:1', 'card_1');
    assert.equal(kb.resolveExternalId('card:1')?.objectId, 'card_1');
    assert.equal(kb.removeInstance('card_1'), true);
    assert.equal(kb.removeInstance('card_1'), false);
    assert.equal(kb.resolveExternalId('card:1'), undefined);
    assert.deepEqual(kb.getInstancesByClass('Creature'), []);
    kb.createInstance('Creature', 'card_1', { name: 'Bear again' });
    assert.equal(kb.resolveExternalId('card:1'), undefined);
  });

  it('prunes instances matching a predicate', () => {
    const kb = withSchemas();
    kb.createInstance('Creature', 'card_1', { name: 'Bear', zone: 'Graveyard' });
    kb.createInstance('Creature', 'card_2', { name: 'Wolf' });
    assert.equal(kb.pruneInstances((instance) => instance.getProperty('zone') === 'Graveyard'), 1);
    assert.deepEqual(kb.listInstances().map((instance) => instance.objectId), ['card_2']);
  });

  it('logs instance creation', () => {
    const cons = createRecordingConsole();
    const kb = withSchemas(createTestKnowledgeBase({ logger: createKnowledgeLogger({ console: cons }) }));
    kb.logger.setEnabled(true);
    kb.createInstance('Creature', 'card_1', { name: 'Bear' });
    assert.deepEqual(cons.logs, ['[KbInstance] Created card_1 of Creature']);
  });
});

describe('KnowledgeBase verbs', () => {
  const tap = defineVerb({ name: 'Tap', targets: [{}], effects: [{ setProperty: { path: 'tapped', value: true } }] });

  it('registers, replaces and looks verbs up', () => {
    const kb = withSchemas();
    kb.registerVerb(tap);
    const replacement = defineVerb({ name: 'Tap', description: 'Replacement.' });
    kb.registerVerb(replacement);
    assert.equal(kb.getVerb('Tap'), replacement);
    assert.equal(kb.requireVerb('Tap'), replacement);
    assert.equal(kb.listVerbs().length, 1);
    assert.throws(
      () => kb.requireVerb('Scry'),
      (error: unknown) => isKnowledgeErrorCode(error, 'UNKNOWN_VERB'),
    );
  });

  it('offers only registered verbs the class advertises', () => {
    const kb = withSchemas();
    kb.registerVerb(tap);
    kb.registerVerb(defineVerb({ name: 'PayMana' }));
    const bear = kb.createInstance('Creature', 'card_1', { name: 'Bear' });
    assert.deepEqual(kb.availableVerbs(bear).map((verb) => verb.name), ['Tap']);
  });

  it('keeps a bounded verb history and logs each execution', () => {
    const cons = createRecordingConsole();
    const kb = withSchemas(
      createTestKnowledgeBase({ logger: createKnowledgeLogger({ console: cons, enabled: true }), maxVerbHistory: 1 }),
    );
    const player = kb.createInstance('Player', 'player_1', { displayName: 'Alice' });
    const bear = kb.createInstance('Creature', 'card_1', { name: 'Bear' });
    cons.logs.length = 0;
    const first = bindVerb(tap, player, [bear], kb);
    first.apply(kb);
    kb.recordVerbExecution(first);
    const second = bindVerb(tap, player, [bear], kb);
    second.apply(kb);
    kb.recordVerbExecution(second);
    assert.deepEqual(kb.getVerbHistory(), [second]);
    assert.deepEqual(cons.logs, [
      '[KbVerb] Tap executed source=player_1 targets=card_1',
      '[KbVerb] Tap executed source=player_1 targets=card_1',
    ]);
  });
});

describe('KnowledgeBase logs', () => {
  it('numbers events from one and drops the oldest beyond the limit', () => {
    const kb = createTestKnowledgeBase({ maxEventLogEntries: 2 });
    assert.equal(kb.recordEvent('A', {}).sequence, 1);
    kb.recordEvent('B', { x: 1 });
    kb.recordEvent('C', {});
    assert.deepEqual(kb.getEventLog().map((record) => [record.sequence, record.type]), [
      [2, 'B'],
      [3, 'C'],
    ]);
  });

  it('copies the recorded payload', () => {
    const kb = createTestKnowledgeBase();
    const payload: Record<string, number> = { amount: 1 };
    kb.recordEvent('Damage', payload);
    payload.amount = 2;
    assert.deepEqual(kb.getEventLog()[0]?.payload, { amount: 1 });
  });

  it('records and warns about ingestion failures', () => {
    const cons = createRecordingConsole();
    const kb = createTestKnowledgeBase({ logger: createKnowledgeLogger({ console: cons }) });
    const failure = kb.recordIngestionFailure('cardDamaged', new Error('boom'));
    assert.equal(failure.message, 'boom');
    assert.equal(kb.getIngestionFailures().length, 1);
    assert.deepEqual(cons.warnings, ['[KbEvent] Failed to ingest cardDamaged: boom']);
  });

  it('accepts unmodelled events without touching state', () => {
    const cons = createRecordingConsole();
    const kb = createTestKnowledgeBase({ logger: createKnowledgeLogger({ console: cons, enabled: true }) });
    assert.equal(kb.ingest({ kind: 'shuffle' }), true);
    assert.equal(kb.instanceCount, 0);
    assert.deepEqual(cons.logs, ['[KbEvent] shuffle (not modelled)']);
  });
});

describe('KnowledgeBase canonical state', () => {
  it('is independent of creation and write order', () => {
    const left = withSchemas();
    left.createInstance('Creature', 'card_2', { name: 'Wolf' });
    left.createInstance('Creature', 'card_1', { name: 'Bear', power: 2 });

    const right = withSchemas(createTestKnowledgeBase({ clock: () => new Date(0) }));
    const bear = right.createInstance('Creature', 'card_1', { name: 'Bear' });
    right.createInstance('Creature', 'card_2', { name: 'Wolf' });
    bear.setProperty('power', 2);

    assert.deepEqual(right.canonicalState().map((entity) => entity.objectId), ['card_1', 'card_2']);
    assert.equal(left.encodeCanonicalState(), right.encodeCanonicalState());
  });

  it('differs when any value differs', () => {
    const left = withSchemas();
    const right = withSchemas();
    left.createInstance('Creature', 'card_1', { name: 'Bear' });
    right.createInstance('Creature', 'card_1', { name: 'Bear', tapped: true });
    assert.notEqual(left.encodeCanonicalState(), right.encodeCanonicalState());
  });
});
