import type { KnowledgeBase } from './knowledge-base.js';
import { condition } from './query-condition.js';
import { ANY_CLASS, defineVerb, type VerbDefinition } from './verb-definition.js';

export const BATTLEFIELD_ZONE = 'Battlefield';
export const PLAYER_CLASS = 'Player';

const onBattlefield = condition('zone', 'eq', BATTLEFIELD_ZONE);

export const TAP_VERB: VerbDefinition = defineVerb({
  name: 'Tap',
  category: 'action',
  description: 'Tap target permanent.',
  targets: [{ className: ANY_CLASS, filter: [onBattlefield, condition('tapped', 'neq', true)], min: 1, max: 1 }],
  effects: [{ setProperty: { path: 'tapped', value: true } }],
  metadata: { keyword: 'Tap' },
});

export const UNTAP_VERB: VerbDefinition = defineVerb({
  name: 'Untap',
  category: 'action',
  description: 'Untap target permanent.',
  targets: [{ className: ANY_CLASS, filter: [onBattlefield, condition('tapped', 'eq', true)], min: 1, max: 1 }],
  effects: [{ setProperty: { path: 'tapped', value: false } }],
  metadata: { keyword: 'Untap' },
});

/** Bind with `{ destination }`. */
export const CHANGE_ZONE_VERB: VerbDefinition = defineVerb({
  name: 'ChangeZone',
  category: 'movement',
  description: 'Move target card to another zone.',
  targets: [{ className: ANY_CLASS }],
  effects: [{ moveZone: { to: { ref: 'var', name: 'destination' } } }],
});

/** Bind with `{ counterType, amount }`; writes the counter's new total. */
export const SET_COUNTER_VERB: VerbDefinition = defineVerb({
  name: 'SetCounter',
  category: 'state',
  description: 'Set the number of counters of one type on target object.',
  targets: [{ className: ANY_CLASS }],
  effects: [{ setProperty: { path: 'counters.{counterType}', value: { ref: 'var', name: 'amount' } } }],
});

/** Bind with `{ amount }`. */
export const MARK_DAMAGE_VERB: VerbDefinition = defineVerb({
  name: 'MarkDamage',
  category: 'combat',
  description: 'Mark damage on target permanent.',
  targets: [{ className: ANY_CLASS, filter: [onBattlefield] }],
  variables: { amount: 0 },
  effects: [{ incProperty: { path: 'damageMarked', delta: { ref: 'var', name: 'amount' } } }],
});

/** Bind with `{ life }`. */
export const SET_LIFE_VERB: VerbDefinition = defineVerb({
  name: 'SetLife',
  category: 'state',
  description: "Set target player's life total.",
  targets: [{ className: PLAYER_CLASS }],
  effects: [{ setProperty: { path: 'life', value: { ref: 'var', name: 'life' } } }],
});

export const DECLARE_ATTACKER_VERB: VerbDefinition = defineVerb({
  name: 'DeclareAttacker',
  category: 'combat',
  description: 'Declare target creature as an attacker.',
  targets: [{ className: ANY_CLASS, filter: [onBattlefield] }],
  effects: [{ setProperty: { path: 'attacking', value: true } }],
  metadata: { step: 'declareAttackers' },
});

/** Targets are the blocker then the attacker it blocks. */
export const DECLARE_BLOCKER_VERB: VerbDefinition = defineVerb({
  name: 'DeclareBlocker',
  category: 'combat',
  description: 'Declare target creature as a blocker of an attacking creature.',
  targets: [
    { className: ANY_CLASS, filter: [onBattlefield, condition('tapped', 'neq', true)] },
    { className: ANY_CLASS, filter: [condition('attacking', 'eq', true)] },
  ],
  effects: [
    { setProperty: { index: 0, path: 'blocking', value: true } },
    { setProperty: { index: 0, path: 'blockingTarget', value: { ref: 'target', index: 1 } } },
  ],
  metadata: { step: 'declareBlockers' },
});

/** Bind with `{ color, amount }`; spends from the source player's pool. */
export const PAY_MANA_VERB: VerbDefinition = defineVerb({
  name: 'PayMana',
  category: 'resource',
  description: 'Pay mana of one color from the acting player.',
  costs: [{ spendProperty: { path: 'manaPool.{color}', amount: { ref: 'var', name: 'amount' } } }],
  effects: [
    {
      emitEvent: {
        type: 'ManaPaid',
        payload: { player: { ref: 'source' }, color: { ref: 'var', name: 'color' }, amount: { ref: 'var', name: 'amount' } },
      },
    },
  ],
});

export const COMMON_VERBS: readonly VerbDefinition[] = [
  TAP_VERB,
  UNTAP_VERB,
  CHANGE_ZONE_VERB,
  SET_COUNTER_VERB,
  MARK_DAMAGE_VERB,
  SET_LIFE_VERB,
  DECLARE_ATTACKER_VERB,
  DECLARE_BLOCKER_VERB,
  PAY_MANA_VERB,
];

export function registerCommonVerbs(kb: KnowledgeBase): void {
  for (const verb of COMMON_VERBS) {
    kb.registerVerb(verb);
  }
}
