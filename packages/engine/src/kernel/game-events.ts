import { z } from 'zod';
import type { Diagnostic } from './diagnostics.js';
import type { PropertyRecord } from './property-value.js';
import { PropertyValueSchema } from './verb-definition.js';

/** Host-side card identity; `id` is the host's own card number. */
export interface CardRef {
  readonly id: string | number;
  readonly name: string;
  readonly owner?: string;
  readonly controller?: string;
}

export interface GameStartedEvent {
  readonly kind: 'gameStarted';
  readonly players: readonly string[];
  readonly firstPlayer?: string;
}

export interface TurnBeganEvent {
  readonly kind: 'turnBegan';
  readonly player: string;
  readonly turnNumber: number;
}

export interface TurnPhaseEvent {
  readonly kind: 'turnPhase';
  readonly player?: string;
  readonly phase: string;
  readonly step?: string;
}

export interface CardChangeZoneEvent {
  readonly kind: 'cardChangeZone';
  readonly card: CardRef;
  readonly from?: string;
  readonly to: string;
}

export interface CardTappedEvent {
  readonly kind: 'cardTapped';
  readonly card: CardRef;
  readonly tapped: boolean;
}

export interface CardCountersEvent {
  readonly kind: 'cardCounters';
  readonly card: CardRef;
  readonly counterType: string;
  readonly oldValue?: number;
  readonly newValue: number;
}

export interface CardStatsChangedEvent {
  readonly kind: 'cardStatsChanged';
  readonly card: CardRef;
  readonly power: number;
  readonly toughness: number;
}

export interface CardDamagedEvent {
  readonly kind: 'cardDamaged';
  readonly card: CardRef;
  readonly source?: CardRef;
  readonly amount: number;
}

export interface PlayerLivesChangedEvent {
  readonly kind: 'playerLivesChanged';
  readonly player: string;
  readonly oldLife?: number;
  readonly newLife: number;
}

export interface PlayerCountersEvent {
  readonly kind: 'playerCounters';
  readonly player: string;
  readonly counterType: string;
  readonly oldValue?: number;
  readonly newValue: number;
}

export interface PlayerPoisonedEvent {
  readonly kind: 'playerPoisoned';
  readonly player: string;
  readonly source?: CardRef;
  readonly oldValue?: number;
  readonly newValue: number;
}

export interface ManaPoolEvent {
  readonly kind: 'manaPool';
  readonly player: string;
  /** Amount per color after the change; colors left out are empty. */
  readonly pool: Readonly<Record<string, number>>;
}

export interface AttackerDeclaration {
  readonly card: CardRef;
  readonly defender?: string;
}

export interface AttackersDeclaredEvent {
  readonly kind: 'attackersDeclared';
  readonly player: string;
  readonly attackers: readonly AttackerDeclaration[];
}

export interface BlockerDeclaration {
  readonly blocker: CardRef;
  readonly attacker: CardRef;
}

export interface BlockersDeclaredEvent {
  readonly kind: 'blockersDeclared';
  readonly player: string;
  readonly blocks: readonly BlockerDeclaration[];
}

export interface CombatEndedEvent {
  readonly kind: 'combatEnded';
}

export interface TokenCreatedEvent {
  readonly kind: 'tokenCreated';
  readonly token: CardRef;
  readonly zone?: string;
}

export interface LandPlayedEvent {
  readonly kind: 'landPlayed';
  readonly player: string;
  readonly card: CardRef;
}

export interface SpellAbilityCastEvent {
  readonly kind: 'spellAbilityCast';
  readonly player: string;
  readonly card: CardRef;
  readonly description?: string;
}

export const UNMODELLED_GAME_EVENT_KINDS = [
  'anteCardsSelected',
  'cardAttachment',
  'cardDestroyed',
  'cardForetold',
  'cardModeChosen',
  'cardPhased',
  'cardPlotted',
  'cardRegenerated',
  'cardSacrificed',
  'combatChanged',
  'combatUpdate',
  'dayTimeChanged',
  'doorChanged',
  'flipCoin',
  'gameFinished',
  'gameOutcome',
  'gameRestarted',
  'manaBurn',
  'mulligan',
  'playerControl',
  'playerDamaged',
  'playerPriority',
  'playerRadiation',
  'playerShardsChanged',
  'playerStatsChanged',
  'randomLog',
  'rollDie',
  'scry',
  'shuffle',
  'speedChanged',
  'spellRemovedFromStack',
  'spellResolved',
  'sprocketUpdate',
  'subgameEnd',
  'subgameStart',
  'surveil',
  'turnEnded',
  'zone',
] as const;

export type UnmodelledGameEventKind = (typeof UNMODELLED_GAME_EVENT_KINDS)[number];

/** Kinds the knowledge base accepts but does not yet map onto instance state. */
export interface UnmodelledGameEvent {
  readonly kind: UnmodelledGameEventKind;
  readonly details?: PropertyRecord;
}

export type ModelledGameEvent =
  | GameStartedEvent
  | TurnBeganEvent
  | TurnPhaseEvent
  | CardChangeZoneEvent
  | CardTappedEvent
  | CardCountersEvent
  | CardStatsChangedEvent
  | CardDamagedEvent
  | PlayerLivesChangedEvent
  | PlayerCountersEvent
  | PlayerPoisonedEvent
  | ManaPoolEvent
  | AttackersDeclaredEvent
  | BlockersDeclaredEvent
  | CombatEndedEvent
  | TokenCreatedEvent
  | LandPlayedEvent
  | SpellAbilityCastEvent;

export type GameEvent = ModelledGameEvent | UnmodelledGameEvent;

export type GameEventKind = GameEvent['kind'];

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const NameSchema = z.string().min(1);
const CountSchema = z.number().int();

export const CardRefSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int().nonnegative()]),
    name: NameSchema,
    owner: NameSchema.optional(),
    controller: NameSchema.optional(),
  })
  .strict();

export const GameEventSchema: z.ZodType<GameEvent> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('gameStarted'), players: z.array(NameSchema), firstPlayer: NameSchema.optional() }).strict(),
  z.object({ kind: z.literal('turnBegan'), player: NameSchema, turnNumber: CountSchema.nonnegative() }).strict(),
  z.object({ kind: z.literal('turnPhase'), player: NameSchema.optional(), phase: NameSchema, step: NameSchema.optional() }).strict(),
  z.object({ kind: z.literal('cardChangeZone'), card: CardRefSchema, from: NameSchema.optional(), to: NameSchema }).strict(),
  z.object({ kind: z.literal('cardTapped'), card: CardRefSchema, tapped: z.boolean() }).strict(),
  z
    .object({
      kind: z.literal('cardCounters'),
      card: CardRefSchema,
      counterType: NameSchema,
      oldValue: CountSchema.optional(),
      newValue: CountSchema,
    })
    .strict(),
  z.object({ kind: z.literal('cardStatsChanged'), card: CardRefSchema, power: CountSchema, toughness: CountSchema }).strict(),
  z
    .object({ kind: z.literal('cardDamaged'), card: CardRefSchema, source: CardRefSchema.optional(), amount: CountSchema.nonnegative() })
    .strict(),
  z.object({ kind: z.literal('playerLivesChanged'), player: NameSchema, oldLife: CountSchema.optional(), newLife: CountSchema }).strict(),
  z
    .object({
      kind: z.literal('playerCounters'),
      player: NameSchema,
      counterType: NameSchema,
      oldValue: CountSchema.optional(),
      newValue: CountSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal('playerPoisoned'),
      player: NameSchema,
      source: CardRefSchema.optional(),
      oldValue: CountSchema.optional(),
      newValue: CountSchema,
    })
    .strict(),
  z.object({ kind: z.literal('manaPool'), player: NameSchema, pool: z.record(z.string(), CountSchema.nonnegative()) }).strict(),
  z
    .object({
      kind: z.literal('attackersDeclared'),
      player: NameSchema,
      attackers: z.array(z.object({ card: CardRefSchema, defender: NameSchema.optional() }).strict()),
    })
    .strict(),
  z
    .object({
      kind: z.literal('blockersDeclared'),
      player: NameSchema,
      blocks: z.array(z.object({ blocker: CardRefSchema, attacker: CardRefSchema }).strict()),
    })
    .strict(),
  z.object({ kind: z.literal('combatEnded') }).strict(),
  z.object({ kind: z.literal('tokenCreated'), token: CardRefSchema, zone: NameSchema.optional() }).strict(),
  z.object({ kind: z.literal('landPlayed'), player: NameSchema, card: CardRefSchema }).strict(),
  z
    .object({ kind: z.literal('spellAbilityCast'), player: NameSchema, card: CardRefSchema, description: z.string().optional() })
    .strict(),
  z.object({ kind: z.enum(UNMODELLED_GAME_EVENT_KINDS), details: z.record(z.string(), PropertyValueSchema).optional() }).strict(),
]);

export interface ParseGameEventResult {
  readonly event: GameEvent | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function parseGameEvent(value: unknown, pathPrefix = 'event'): ParseGameEventResult {
  const parsed = GameEventSchema.safeParse(value);
  if (!parsed.success) {
    return {
      event: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'GAME_EVENT_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `${pathPrefix}.${issue.path.join('.')}` : pathPrefix,
        severity: 'error',
        message: issue.message,
      })),
    };
  }
  return { event: parsed.data, diagnostics: [] };
}
