import {
  BATTLEFIELD_ZONE,
  CHANGE_ZONE_VERB,
  DECLARE_ATTACKER_VERB,
  DECLARE_BLOCKER_VERB,
  MARK_DAMAGE_VERB,
  PLAYER_CLASS,
  SET_COUNTER_VERB,
  SET_LIFE_VERB,
  TAP_VERB,
  UNTAP_VERB,
} from './common-verbs.js';
import type { EntityInstance } from './entity-instance.js';
import type {
  AttackersDeclaredEvent,
  BlockersDeclaredEvent,
  CardChangeZoneEvent,
  CardCountersEvent,
  CardDamagedEvent,
  CardRef,
  CardStatsChangedEvent,
  CardTappedEvent,
  GameEvent,
  GameStartedEvent,
  LandPlayedEvent,
  ManaPoolEvent,
  PlayerCountersEvent,
  PlayerLivesChangedEvent,
  PlayerPoisonedEvent,
  SpellAbilityCastEvent,
  TokenCreatedEvent,
  TurnBeganEvent,
  TurnPhaseEvent,
} from './game-events.js';
import type { KnowledgeBase } from './knowledge-base.js';
import type { PropertyRecord, PropertyValue } from './property-value.js';
import { condition } from './query-condition.js';
import { bindVerb, type VerbDefinition } from './verb-definition.js';
import type { VerbInstance } from './verb-instance.js';

export const GAME_STATE_CLASS = 'GameState';
export const GAME_STATE_ID = 'game_state';
export const GENERIC_CARD_CLASS = 'Card';
export const TOKEN_CLASS = 'Token';
export const MANA_COLORS = ['W', 'U', 'B', 'R', 'G', 'C'] as const;
export const POISON_COUNTER = 'poison';

const UNSAFE_ID_CHARS = /[^A-Za-z0-9_-]/g;

/** Per-card schemas are registered under the sanitized card name. */
export const cardClassName = (cardName: string): string => `Card_${cardName.replace(/[^a-zA-Z0-9]/g, '_')}`;

export const cardObjectId = (externalId: string | number): string =>
  `card_${String(externalId).replace(UNSAFE_ID_CHARS, '_')}`;

export const tokenObjectId = (externalId: string | number): string =>
  `token_${String(externalId).replace(UNSAFE_ID_CHARS, '_')}`;

export const playerObjectId = (playerName: string): string => `player_${playerName.replace(UNSAFE_ID_CHARS, '_')}`;

export const cardExternalKey = (externalId: string | number): string => `card:${externalId}`;

export const playerExternalKey = (playerName: string): string => `player:${playerName}`;

/** The battlefield is shared; every other zone belongs to one player. */
export const zoneExternalKey = (zoneType: string, ownerName?: string): string =>
  zoneType === BATTLEFIELD_ZONE || ownerName === undefined ? `zone:${zoneType}` : `zone:${zoneType}:${ownerName}`;

// ---------------------------------------------------------------------------
// Instance resolution
// ---------------------------------------------------------------------------

/** Keeps only the entries the class declares; hosts report more than any one schema models. */
function declaredOnly(kb: KnowledgeBase, className: string, values: PropertyRecord): PropertyRecord {
  const schema = kb.getDefinition(className);
  if (schema === undefined) {
    return values;
  }
  return Object.fromEntries(Object.entries(values).filter(([name]) => schema.hasProperty(name)));
}

/** Atomic like `updateProperties`, after dropping names the instance's class does not declare. */
export function updateDeclaredProperties(instance: EntityInstance, values: PropertyRecord): void {
  instance.updateProperties(
    Object.fromEntries(Object.entries(values).filter(([name]) => instance.hasProperty(name))),
  );
}

function cardOverrides(ref: CardRef): PropertyRecord {
  return {
    name: ref.name,
    ...(ref.owner === undefined ? {} : { owner: ref.owner }),
    ...(ref.controller === undefined ? {} : { controller: ref.controller }),
  };
}

export function resolveCard(kb: KnowledgeBase, ref: CardRef): EntityInstance {
  const key = cardExternalKey(ref.id);
  const bound = kb.resolveExternalId(key);
  if (bound !== undefined) {
    return bound;
  }
  const specific = cardClassName(ref.name);
  const className = kb.hasDefinition(specific) ? specific : GENERIC_CARD_CLASS;
  const instance = kb.getOrCreateInstance(className, cardObjectId(ref.id), declaredOnly(kb, className, cardOverrides(ref)));
  kb.bindExternalId(key, instance.objectId);
  return instance;
}

/** Identity map first, then a name lookup among players. */
export function findPlayer(kb: KnowledgeBase, playerName: string): EntityInstance | undefined {
  return (
    kb.resolveExternalId(playerExternalKey(playerName))
    ?? kb.query(PLAYER_CLASS, condition('name', 'eq', playerName))[0]
  );
}

export function resolvePlayer(kb: KnowledgeBase, playerName: string): EntityInstance {
  const found = findPlayer(kb, playerName);
  if (found !== undefined) {
    return found;
  }
  const instance = kb.getOrCreateInstance(PLAYER_CLASS, playerObjectId(playerName), {
    name: playerName,
    displayName: playerName.slice(0, 60),
  });
  kb.bindExternalId(playerExternalKey(playerName), instance.objectId);
  return instance;
}

/** The controller when known, otherwise the card acts for itself. */
function actorFor(kb: KnowledgeBase, card: EntityInstance, ref: CardRef): EntityInstance {
  const controller = ref.controller ?? ref.owner;
  return (controller === undefined ? undefined : findPlayer(kb, controller)) ?? card;
}

function gameState(kb: KnowledgeBase): EntityInstance {
  return kb.getOrCreateInstance(GAME_STATE_CLASS, GAME_STATE_ID);
}

/** Registered catalog entries win over the built-in definition of the same name. */
function runVerb(
  kb: KnowledgeBase,
  fallback: VerbDefinition,
  source: EntityInstance,
  targets: readonly EntityInstance[],
  overrides: PropertyRecord = {},
): VerbInstance {
  const definition = kb.getVerb(fallback.name) ?? fallback;
  const verb = bindVerb(definition, source, targets, kb, overrides);
  verb.apply(kb);
  kb.recordVerbExecution(verb);
  return verb;
}

function readStringList(value: PropertyValue | undefined): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function updateZoneContents(
  kb: KnowledgeBase,
  zoneType: string,
  ownerName: string | undefined,
  update: (contents: readonly string[]) => string[],
): void {
  const zone = kb.resolveExternalId(zoneExternalKey(zoneType, ownerName));
  if (zone === undefined || !zone.hasProperty('contents')) {
    return;
  }
  zone.setProperty('contents', update(readStringList(zone.getProperty('contents'))));
}

function stringProperty(instance: EntityInstance, name: string): string | undefined {
  const value = instance.getProperty(name);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

function onGameStarted(kb: KnowledgeBase, event: GameStartedEvent): void {
  const players = event.players.map((name) => resolvePlayer(kb, name));
  const first = event.firstPlayer === undefined ? undefined : resolvePlayer(kb, event.firstPlayer);
  const state = gameState(kb);
  updateDeclaredProperties(state, { turnNumber: 0, ...(first === undefined ? {} : { activePlayer: first.objectId }) });
  kb.recordEvent('GameStarted', {
    players: players.map((player) => player.objectId),
    firstPlayer: first?.objectId ?? null,
  });
}

function onTurnBegan(kb: KnowledgeBase, event: TurnBeganEvent): void {
  const player = resolvePlayer(kb, event.player);
  updateDeclaredProperties(gameState(kb), { turnNumber: event.turnNumber, activePlayer: player.objectId });
  updateDeclaredProperties(player, { landsPlayedThisTurn: 0 });
  kb.recordEvent('TurnBegan', { turnNumber: event.turnNumber, playerId: player.objectId });
}

function onTurnPhase(kb: KnowledgeBase, event: TurnPhaseEvent): void {
  updateDeclaredProperties(gameState(kb), { phase: event.phase, step: event.step ?? '' });
  kb.recordEvent('TurnPhase', { phase: event.phase, step: event.step ?? null });
}

/** Entering the battlefield makes a card summoning sick; leaving it clears combat state. */
function moveCard(kb: KnowledgeBase, ref: CardRef, from: string | undefined, to: string): EntityInstance {
  const card = resolveCard(kb, ref);
  const previous = from ?? stringProperty(card, 'zone');
  runVerb(kb, CHANGE_ZONE_VERB, actorFor(kb, card, ref), [card], { destination: to });

  if (to === BATTLEFIELD_ZONE && previous !== BATTLEFIELD_ZONE) {
    updateDeclaredProperties(card, { summoningSick: true, tapped: false });
  } else if (to !== BATTLEFIELD_ZONE) {
    updateDeclaredProperties(card, { tapped: false, attacking: false, blocking: false, blockingTarget: '', damageMarked: 0 });
  }

  const owner = ref.owner ?? stringProperty(card, 'owner');
  if (previous !== undefined && previous !== to) {
    updateZoneContents(kb, previous, owner, (contents) => contents.filter((id) => id !== card.objectId));
  }
  updateZoneContents(kb, to, owner, (contents) =>
    contents.includes(card.objectId) ? [...contents] : [...contents, card.objectId],
  );
  kb.recordEvent('ZoneChange', { cardId: card.objectId, from: previous ?? null, to });
  return card;
}

function onCardChangeZone(kb: KnowledgeBase, event: CardChangeZoneEvent): void {
  moveCard(kb, event.card, event.from, event.to);
}

function onCardTapped(kb: KnowledgeBase, event: CardTappedEvent): void {
  const card = resolveCard(kb, event.card);
  const actor = actorFor(kb, card, event.card);
  const verb = runVerb(kb, event.tapped ? TAP_VERB : UNTAP_VERB, actor, [card]);
  kb.recordEvent(verb.name, {
    verb: verb.name,
    actorId: actor.objectId,
    targetId: card.objectId,
    tapped: event.tapped,
  });
}

function onCardCounters(kb: KnowledgeBase, event: CardCountersEvent): void {
  const card = resolveCard(kb, event.card);
  runVerb(kb, SET_COUNTER_VERB, actorFor(kb, card, event.card), [card], {
    counterType: event.counterType,
    amount: event.newValue,
  });
  kb.recordEvent('CardCounters', {
    cardId: card.objectId,
    counterType: event.counterType,
    oldValue: event.oldValue ?? null,
    newValue: event.newValue,
  });
}

function onCardStatsChanged(kb: KnowledgeBase, event: CardStatsChangedEvent): void {
  const card = resolveCard(kb, event.card);
  updateDeclaredProperties(card, { power: event.power, toughness: event.toughness });
  kb.recordEvent('CardStats', { cardId: card.objectId, power: event.power, toughness: event.toughness });
}

function onCardDamaged(kb: KnowledgeBase, event: CardDamagedEvent): void {
  const card = resolveCard(kb, event.card);
  const source = event.source === undefined ? card : resolveCard(kb, event.source);
  runVerb(kb, MARK_DAMAGE_VERB, source, [card], { amount: event.amount });
  kb.recordEvent('Damage', { cardId: card.objectId, sourceId: source.objectId, amount: event.amount });
}

function onPlayerLivesChanged(kb: KnowledgeBase, event: PlayerLivesChangedEvent): void {
  const player = resolvePlayer(kb, event.player);
  runVerb(kb, SET_LIFE_VERB, player, [player], { life: event.newLife });
  kb.recordEvent('LifeChange', { playerId: player.objectId, oldLife: event.oldLife ?? null, newLife: event.newLife });
}

function setPlayerCounter(
  kb: KnowledgeBase,
  playerName: string,
  counterType: string,
  newValue: number,
  oldValue: number | undefined,
): void {
  const player = resolvePlayer(kb, playerName);
  runVerb(kb, SET_COUNTER_VERB, player, [player], { counterType, amount: newValue });
  kb.recordEvent('PlayerCounters', {
    playerId: player.objectId,
    counterType,
    oldValue: oldValue ?? null,
    newValue,
  });
}

function onPlayerCounters(kb: KnowledgeBase, event: PlayerCountersEvent): void {
  setPlayerCounter(kb, event.player, event.counterType, event.newValue, event.oldValue);
}

function onPlayerPoisoned(kb: KnowledgeBase, event: PlayerPoisonedEvent): void {
  setPlayerCounter(kb, event.player, POISON_COUNTER, event.newValue, event.oldValue);
}

function onManaPool(kb: KnowledgeBase, event: ManaPoolEvent): void {
  const player = resolvePlayer(kb, event.player);
  const pool: Record<string, number> = {};
  for (const color of MANA_COLORS) {
    pool[color] = event.pool[color] ?? 0;
  }
  player.setProperty('manaPool', pool);
  kb.recordEvent('ManaPool', { playerId: player.objectId, pool });
}

function onAttackersDeclared(kb: KnowledgeBase, event: AttackersDeclaredEvent): void {
  const player = resolvePlayer(kb, event.player);
  for (const declaration of event.attackers) {
    const card = resolveCard(kb, declaration.card);
    runVerb(kb, DECLARE_ATTACKER_VERB, player, [card]);
    kb.recordEvent('AttackerDeclared', {
      playerId: player.objectId,
      cardId: card.objectId,
      defender: declaration.defender ?? null,
    });
  }
}

function onBlockersDeclared(kb: KnowledgeBase, event: BlockersDeclaredEvent): void {
  const player = resolvePlayer(kb, event.player);
  for (const block of event.blocks) {
    const blocker = resolveCard(kb, block.blocker);
    const attacker = resolveCard(kb, block.attacker);
    runVerb(kb, DECLARE_BLOCKER_VERB, player, [blocker, attacker]);
    kb.recordEvent('BlockerDeclared', { playerId: player.objectId, blockerId: blocker.objectId, attackerId: attacker.objectId });
  }
}

const isInCombat = (instance: EntityInstance): boolean =>
  instance.getProperty('attacking') === true || instance.getProperty('blocking') === true;

function onCombatEnded(kb: KnowledgeBase): void {
  const combatants = kb.listInstances().filter(isInCombat);
  for (const combatant of combatants) {
    updateDeclaredProperties(combatant, { attacking: false, blocking: false, blockingTarget: '' });
  }
  kb.recordEvent('CombatEnded', { cleared: combatants.map((combatant) => combatant.objectId) });
}

function onTokenCreated(kb: KnowledgeBase, event: TokenCreatedEvent): void {
  const zone = event.zone ?? BATTLEFIELD_ZONE;
  const token = kb.getOrCreateInstance(
    TOKEN_CLASS,
    tokenObjectId(event.token.id),
    declaredOnly(kb, TOKEN_CLASS, { ...cardOverrides(event.token), zone }),
  );
  kb.bindExternalId(cardExternalKey(event.token.id), token.objectId);
  updateZoneContents(kb, zone, event.token.owner, (contents) =>
    contents.includes(token.objectId) ? [...contents] : [...contents, token.objectId],
  );
  kb.recordEvent('TokenCreated', { tokenId: token.objectId, name: event.token.name, zone });
}

function onLandPlayed(kb: KnowledgeBase, event: LandPlayedEvent): void {
  const player = resolvePlayer(kb, event.player);
  const card = moveCard(kb, event.card, undefined, BATTLEFIELD_ZONE);
  const played = player.getProperty('landsPlayedThisTurn');
  updateDeclaredProperties(player, { landsPlayedThisTurn: (typeof played === 'number' ? played : 0) + 1 });
  kb.recordEvent('LandPlayed', { playerId: player.objectId, cardId: card.objectId });
}

function onSpellAbilityCast(kb: KnowledgeBase, event: SpellAbilityCastEvent): void {
  const player = resolvePlayer(kb, event.player);
  const card = resolveCard(kb, event.card);
  kb.recordEvent('Cast', { playerId: player.objectId, cardId: card.objectId, description: event.description ?? '' });
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/** Returns `false` for kinds accepted but not mapped onto state. Errors propagate. */
export function dispatchGameEvent(kb: KnowledgeBase, event: GameEvent): boolean {
  switch (event.kind) {
    case 'gameStarted':
      onGameStarted(kb, event);
      return true;
    case 'turnBegan':
      onTurnBegan(kb, event);
      return true;
    case 'turnPhase':
      onTurnPhase(kb, event);
      return true;
    case 'cardChangeZone':
      onCardChangeZone(kb, event);
      return true;
    case 'cardTapped':
      onCardTapped(kb, event);
      return true;
    case 'cardCounters':
      onCardCounters(kb, event);
      return true;
    case 'cardStatsChanged':
      onCardStatsChanged(kb, event);
      return true;
    case 'cardDamaged':
      onCardDamaged(kb, event);
      return true;
    case 'playerLivesChanged':
      onPlayerLivesChanged(kb, event);
      return true;
    case 'playerCounters':
      onPlayerCounters(kb, event);
      return true;
    case 'playerPoisoned':
      onPlayerPoisoned(kb, event);
      return true;
    case 'manaPool':
      onManaPool(kb, event);
      return true;
    case 'attackersDeclared':
      onAttackersDeclared(kb, event);
      return true;
    case 'blockersDeclared':
      onBlockersDeclared(kb, event);
      return true;
    case 'combatEnded':
      onCombatEnded(kb);
      return true;
    case 'tokenCreated':
      onTokenCreated(kb, event);
      return true;
    case 'landPlayed':
      onLandPlayed(kb, event);
      return true;
    case 'spellAbilityCast':
      onSpellAbilityCast(kb, event);
      return true;
    default:
      return false;
  }
}

/**
 * Never throws. State written before a failure stays written; the failure is logged and
 * kept in the knowledge base's failure list.
 */
export function ingestGameEvent(kb: KnowledgeBase, event: GameEvent): boolean {
  try {
    const modelled = dispatchGameEvent(kb, event);
    kb.logger.logEventIngested({ kind: event.kind, modelled });
    return true;
  } catch (error) {
    kb.recordIngestionFailure(event.kind, error);
    return false;
  }
}

export function ingestGameEvents(kb: KnowledgeBase, events: Iterable<GameEvent>): number {
  return kb.ingestAll(events);
}
