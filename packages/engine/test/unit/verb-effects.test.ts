import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  applyVerbCost,
  applyVerbEffect,
  applyVerbEffects,
  canPayVerbCost,
  costTypeOf,
  effectTypeOf,
  isKnowledgeErrorCode,
  VerbExecutionContext,
  type EntityInstance,
  type PropertyValue,
  type UndoEntry,
  type VerbExecutionMode,
} from '../../src/kernel/index.js';
import { buildCreatureSchema, buildPlayerSchema, steppingClock } from '../helpers/knowledge-fixtures.js';

interface Table {
  readonly player: EntityInstance;
  readonly bear: EntityInstance;
  readonly wolf: EntityInstance;
}

const makeTable = (): Table => {
  const clock = steppingClock();
  const creatures = buildCreatureSchema();
  const bear = creatures.createInstance('card_1', { clock });
  const wolf = creatures.createInstance('card_2', { clock });
  bear.setProperty('zone', 'Battlefield');
  return { player: buildPlayerSchema().createInstance('player_1', { clock }), bear, wolf };
};

const contextFor = (
  table: Table,
  mode: VerbExecutionMode,
  bindings: Readonly<Record<string, PropertyValue>> = {},
  undoLog?: UndoEntry[],
): VerbExecutionContext =>
  new VerbExecutionContext({
    mode,
    verb: 'Test',
    source: table.player,
    targets: [table.bear, table.wolf],
    bindings,
    ...(undoLog === undefined ? {} : { undoLog }),
  });

describe('effect and cost type tags', () => {
  it('name each variant', () => {
    assert.equal(effectTypeOf({ setProperty: { path: 'x', value: 1 } }), 'setProperty');
    assert.equal(effectTypeOf({ incProperty: { path: 'x', delta: 1 } }), 'incProperty');
    assert.equal(effectTypeOf({ moveZone: { to: 'Hand' } }), 'moveZone');
    assert.equal(effectTypeOf({ emitEvent: { type: 'X' } }), 'emitEvent');
    assert.equal(costTypeOf({ spendProperty: { path: 'x', amount: 1 } }), 'spendProperty');
    assert.equal(costTypeOf({ changeProperty: { path: 'x', from: 1, to: 2 } }), 'changeProperty');
  });
});

describe('applyVerbEffect', () => {
  it('writes to the first target by default and records the change and undo entry', () => {
    const table = makeTable();
    const undoLog: UndoEntry[] = [];
    const ctx = contextFor(table, 'apply', {}, undoLog);
    applyVerbEffect({ setProperty: { path: 'tapped', value: true } }, ctx);
    assert.equal(table.bear.getProperty('tapped'), true);
    assert.equal(table.wolf.getProperty('tapped'), false);
    assert.deepEqual(ctx.changes, [{ objectId: 'card_1', path: 'tapped', previous: false, next: true }]);
    assert.equal(undoLog.length, 1);
    assert.equal(undoLog[0]?.previous, false);
  });

  it('fans out over every target and can address the source', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'apply');
    applyVerbEffects(
      [
        { setProperty: { on: 'targets', path: 'attacking', value: true } },
        { setProperty: { on: 'source', path: 'life', value: 15 } },
        { setProperty: { on: 'target', index: 1, path: 'power', value: 4 } },
      ],
      ctx,
    );
    assert.equal(table.bear.getProperty('attacking'), true);
    assert.equal(table.wolf.getProperty('attacking'), true);
    assert.equal(table.player.getProperty('life'), 15);
    assert.equal(table.wolf.getProperty('power'), 4);
    assert.equal(table.bear.getProperty('power'), 0);
  });

  it('resolves placeholders in the path from bindings', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'apply', { counterType: 'poison', amount: 3 });
    applyVerbEffect(
      { setProperty: { path: 'counters.{counterType}', value: { ref: 'var', name: 'amount' } } },
      ctx,
    );
    assert.deepEqual(table.bear.getProperty('counters'), { poison: 3 });
  });

  it('increments from zero when the entry is absent', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'apply');
    applyVerbEffect({ incProperty: { path: 'counters.charge', delta: 2 } }, ctx);
    applyVerbEffect({ incProperty: { path: 'damageMarked', delta: 3 } }, ctx);
    assert.equal(table.bear.getPropertyPath('counters.charge'), 2);
    assert.equal(table.bear.getProperty('damageMarked'), 3);
  });

  it('rejects a non-numeric delta', () => {
    const table = makeTable();
    assert.throws(
      () => applyVerbEffect({ incProperty: { path: 'damageMarked', delta: 'two' } }, contextFor(table, 'apply')),
      (error: unknown) =>
        isKnowledgeErrorCode(error, 'VALUE_TYPE_MISMATCH') && error.context.field === 'incProperty.delta',
    );
  });

  it('moves only subjects whose zone matches from', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'apply');
    applyVerbEffect({ moveZone: { on: 'targets', from: 'Battlefield', to: 'Graveyard' } }, ctx);
    assert.equal(table.bear.getProperty('zone'), 'Graveyard');
    assert.equal(table.wolf.getProperty('zone'), 'Library');
  });

  it('moves unconditionally without from', () => {
    const table = makeTable();
    applyVerbEffect({ moveZone: { index: 1, to: 'Hand' } }, contextFor(table, 'apply'));
    assert.equal(table.wolf.getProperty('zone'), 'Hand');
  });

  it('collects emitted events with evaluated payloads', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'apply', { amount: 2 });
    applyVerbEffect(
      { emitEvent: { type: 'Damage', payload: { from: { ref: 'source' }, amount: { ref: 'var', name: 'amount' } } } },
      ctx,
    );
    assert.deepEqual(ctx.events, [{ type: 'Damage', payload: { from: 'player_1', amount: 2 } }]);
  });

  it('records predicted writes in preview mode without touching instances', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'preview');
    applyVerbEffects(
      [{ incProperty: { path: 'damageMarked', delta: 2 } }, { incProperty: { path: 'damageMarked', delta: 2 } }],
      ctx,
    );
    assert.equal(table.bear.getProperty('damageMarked'), 0);
    assert.equal(ctx.read(table.bear, 'damageMarked'), 4);
    assert.deepEqual(ctx.changes, [
      { objectId: 'card_1', path: 'damageMarked', previous: 0, next: 2 },
      { objectId: 'card_1', path: 'damageMarked', previous: 2, next: 4 },
    ]);
  });

  it('writes and emits nothing in probe mode but still rejects unknown properties', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'probe');
    applyVerbEffect({ setProperty: { path: 'tapped', value: true } }, ctx);
    applyVerbEffect({ emitEvent: { type: 'X' } }, ctx);
    assert.equal(table.bear.getProperty('tapped'), false);
    assert.deepEqual(ctx.changes, []);
    assert.deepEqual(ctx.events, []);
    assert.throws(
      () => applyVerbEffect({ setProperty: { path: 'colour', value: 'green' } }, ctx),
      (error: unknown) => isKnowledgeErrorCode(error, 'UNKNOWN_PROPERTY'),
    );
  });
});

describe('verb costs', () => {
  it('spends from the source by default', () => {
    const table = makeTable();
    table.player.setPropertyPath('manaPool.R', 3);
    const cost = { spendProperty: { path: 'manaPool.R', amount: 2 } };
    const ctx = contextFor(table, 'apply');
    assert.equal(canPayVerbCost(cost, ctx), true);
    applyVerbCost(cost, ctx);
    assert.equal(table.player.getPropertyPath('manaPool.R'), 1);
    assert.equal(canPayVerbCost(cost, ctx), false);
  });

  it('cannot spend a non-numeric amount or from a non-numeric property', () => {
    const table = makeTable();
    const ctx = contextFor(table, 'apply');
    assert.equal(canPayVerbCost({ spendProperty: { path: 'manaPool.R', amount: 'x' } }, ctx), false);
    assert.equal(canPayVerbCost({ spendProperty: { path: 'displayName', amount: 0 } }, ctx), false);
  });

  it('changes a property that holds the expected value', () => {
    const table = makeTable();
    const cost = { changeProperty: { on: 'target', path: 'tapped', from: false, to: true } } as const;
    const ctx = contextFor(table, 'apply');
    assert.equal(canPayVerbCost(cost, ctx), true);
    applyVerbCost(cost, ctx);
    assert.equal(table.bear.getProperty('tapped'), true);
    assert.equal(canPayVerbCost(cost, ctx), false);
  });
});
