import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  exportKnowledgeBase,
  isKnowledgeErrorCode,
  parseMatchSnapshot,
  seedMatch,
  type EntityInstance,
  type KnowledgeBase,
  type MatchSnapshot,
} from '../../src/kernel/index.js';
import { diagnosticCodes } from '../helpers/diagnostic-helpers.js';
import { createStandardKnowledgeBase } from '../helpers/knowledge-fixtures.js';

const snapshot: MatchSnapshot = {
  matchId: 'm1',
  players: [
    {
      name: 'Alice',
      life: 18,
      manaPool: { G: 2 },
      zones: {
        Library: [
          { id: 8, name: 'Island' },
          { id: 9, name: 'Swamp' },
        ],
        Hand: [{ id: 7, name: 'Forest' }],
      },
      battlefield: [{ id: 10, name: 'Llanowar Elves', tapped: true, power: 1, toughness: 1 }],
    },
    {
      name: 'Bob',
      isAI: true,
      counters: { poison: 1 },
      zones: { Graveyard: [{ id: 20, name: 'Shock' }] },
    },
  ],
};

const instanceOf = (kb: KnowledgeBase, objectId: string): EntityInstance => {
  const instance = kb.getInstance(objectId);
  assert.ok(instance !== undefined, objectId);
  return instance;
};

const ids = (instances: readonly EntityInstance[]): string[] => instances.map((instance) => instance.objectId);

describe('match seeding', () => {
  it('creates players, cards and zones under match-scoped ids', () => {
    const kb = createStandardKnowledgeBase();
    const seeded = seedMatch(kb, snapshot);

    assert.deepEqual(ids(seeded.players), ['m1::Player_1', 'm1::Player_2']);
    assert.deepEqual(ids(seeded.cards), ['card_8', 'card_9', 'card_7', 'card_10', 'card_20']);
    assert.deepEqual(ids(seeded.zones), [
      'm1::Zone_Library@Player_1',
      'm1::Zone_Hand@Player_1',
      'm1::Zone_Graveyard@Player_1',
      'm1::Zone_Exile@Player_1',
      'm1::Zone_Sideboard@Player_1',
      'm1::Zone_Library@Player_2',
      'm1::Zone_Hand@Player_2',
      'm1::Zone_Graveyard@Player_2',
      'm1::Zone_Exile@Player_2',
      'm1::Zone_Sideboard@Player_2',
      'm1::Zone_Battlefield',
    ]);
    assert.equal(kb.instanceCount, 18);
  });

  it('fills player state and defaults the rest of the mana pool', () => {
    const kb = createStandardKnowledgeBase();
    seedMatch(kb, snapshot);

    const alice = instanceOf(kb, 'm1::Player_1');
    assert.equal(alice.getProperty('displayName'), 'Alice');
    assert.equal(alice.getProperty('seatIndex'), 0);
    assert.equal(alice.getProperty('life'), 18);
    assert.deepEqual(alice.getProperty('manaPool'), { W: 0, U: 0, B: 0, R: 0, G: 2, C: 0 });
    assert.equal(alice.metadata.get('matchId'), 'm1');
    assert.equal(alice.metadata.get('hostPlayerName'), 'Alice');

    const bob = instanceOf(kb, 'm1::Player_2');
    assert.equal(bob.getProperty('seatIndex'), 1);
    assert.equal(bob.getProperty('isAI'), true);
    assert.equal(bob.getProperty('life'), 20);
    assert.deepEqual(bob.getProperty('counters'), { poison: 1 });
    assert.equal(kb.resolveExternalId('player:Bob'), bob);
  });

  it('places cards in their zones with owner and controller', () => {
    const kb = createStandardKnowledgeBase();
    seedMatch(kb, snapshot);

    const elves = instanceOf(kb, 'card_10');
    assert.equal(elves.getProperty('zone'), 'Battlefield');
    assert.equal(elves.getProperty('owner'), 'Alice');
    assert.equal(elves.getProperty('controller'), 'Alice');
    assert.equal(elves.getProperty('tapped'), true);
    assert.equal(elves.getProperty('power'), 1);
    assert.equal(elves.metadata.get('matchId'), 'm1');
    assert.equal(instanceOf(kb, 'card_20').getProperty('zone'), 'Graveyard');

    assert.deepEqual(instanceOf(kb, 'm1::Zone_Library@Player_1').getProperty('contents'), ['card_8', 'card_9']);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Hand@Player_2').getProperty('contents'), []);
    const battlefield = instanceOf(kb, 'm1::Zone_Battlefield');
    assert.equal(battlefield.getProperty('owner'), 'NULL');
    assert.deepEqual(battlefield.getProperty('contents'), ['card_10']);
    assert.equal(instanceOf(kb, 'm1::Zone_Graveyard@Player_2').getProperty('owner'), 'Player_2');
    assert.equal(kb.resolveExternalId('zone:Hand:Alice')?.objectId, 'm1::Zone_Hand@Player_1');
    assert.equal(kb.resolveExternalId('zone:Battlefield')?.objectId, 'm1::Zone_Battlefield');
  });

  it('keeps zone contents in step with later events', () => {
    const kb = createStandardKnowledgeBase();
    seedMatch(kb, snapshot);

    assert.equal(kb.ingest({ kind: 'landPlayed', player: 'Alice', card: { id: 7, name: 'Forest', owner: 'Alice' } }), true);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Hand@Player_1').getProperty('contents'), []);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Battlefield').getProperty('contents'), ['card_10', 'card_7']);
    assert.equal(instanceOf(kb, 'm1::Player_1').getProperty('landsPlayedThisTurn'), 1);
    assert.equal(instanceOf(kb, 'card_7').getProperty('summoningSick'), true);

    assert.equal(kb.ingest({ kind: 'cardChangeZone', card: { id: 8, name: 'Island' }, to: 'Graveyard' }), true);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Library@Player_1').getProperty('contents'), ['card_9']);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Graveyard@Player_1').getProperty('contents'), ['card_8']);
    assert.deepEqual(kb.getEventLog().at(-1)?.payload, { cardId: 'card_8', from: 'Library', to: 'Graveyard' });
  });

  it('keeps zone contents consistent after a card is removed', () => {
    const kb = createStandardKnowledgeBase();
    seedMatch(kb, snapshot);

    assert.equal(kb.pruneInstances((instance) => instance.objectId === 'card_8'), 1);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Library@Player_1').getProperty('contents'), ['card_9']);
    assert.equal(kb.resolveExternalId('card:8'), undefined);

    assert.equal(kb.ingest({ kind: 'cardChangeZone', card: { id: 9, name: 'Swamp' }, to: 'Hand' }), true);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Library@Player_1').getProperty('contents'), []);
    assert.deepEqual(instanceOf(kb, 'm1::Zone_Hand@Player_1').getProperty('contents'), ['card_7', 'card_9']);
    assert.equal(instanceOf(kb, 'card_9').getProperty('zone'), 'Hand');
    assert.deepEqual(kb.getIngestionFailures(), []);
  });

  it('exports seeded instances in object id order', () => {
    const kb = createStandardKnowledgeBase();
    seedMatch(kb, snapshot);
    const exported = exportKnowledgeBase(kb);
    assert.equal(exported.instances.length, 18);
    assert.deepEqual(
      exported.instances.slice(0, 5).map((record) => record.objectId),
      ['card_10', 'card_20', 'card_7', 'card_8', 'card_9'],
    );
    assert.deepEqual(exported.instances.find((record) => record.objectId === 'card_7')?.metadata, { matchId: 'm1' });
  });

  it('propagates errors when a match is seeded twice', () => {
    const kb = createStandardKnowledgeBase();
    seedMatch(kb, snapshot);
    assert.throws(() => seedMatch(kb, snapshot), (error: unknown) => isKnowledgeErrorCode(error, 'DUPLICATE_INSTANCE'));
  });

  it('propagates domain errors from snapshot values', () => {
    const kb = createStandardKnowledgeBase();
    assert.throws(
      () => seedMatch(kb, { matchId: 'm2', players: [{ name: 'Alice', life: 5000 }] }),
      (error: unknown) => isKnowledgeErrorCode(error, 'DOMAIN_VIOLATION'),
    );
  });

  it('validates host snapshots before seeding', () => {
    const valid = parseMatchSnapshot(JSON.parse(JSON.stringify(snapshot)));
    assert.deepEqual(valid.diagnostics, []);
    assert.equal(valid.snapshot?.players.length, 2);

    const empty = parseMatchSnapshot({ matchId: 'm1', players: [] });
    assert.equal(empty.snapshot, null);
    assert.deepEqual(empty.diagnostics.map((diagnostic) => diagnostic.path), ['snapshot.players']);

    const badZone = parseMatchSnapshot({ matchId: 'm1', players: [{ name: 'Alice', zones: { Hands: [] } }] }, 'match');
    assert.deepEqual(diagnosticCodes(badZone.diagnostics), ['MATCH_SNAPSHOT_SCHEMA_INVALID']);
    assert.equal(badZone.diagnostics[0]?.path, 'match.players.0.zones');
  });
});
