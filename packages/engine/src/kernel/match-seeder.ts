import { z } from 'zod';
import { BATTLEFIELD_ZONE, PLAYER_CLASS } from './common-verbs.js';
import type { Diagnostic } from './diagnostics.js';
import type { EntityInstance } from './entity-instance.js';
import {
  MANA_COLORS,
  playerExternalKey,
  resolveCard,
  updateDeclaredProperties,
  zoneExternalKey,
} from './event-ingestion.js';
import type { KnowledgeBase } from './knowledge-base.js';

export const PER_PLAYER_ZONES = ['Library', 'Hand', 'Graveyard', 'Exile', 'Sideboard'] as const;

export type PerPlayerZone = (typeof PER_PLAYER_ZONES)[number];

/** Owner label of zones no single player owns. */
export const SHARED_ZONE_OWNER = 'NULL';

export interface CardSnapshot {
  readonly id: string | number;
  readonly name: string;
  readonly controller?: string;
  readonly tapped?: boolean;
  readonly power?: number;
  readonly toughness?: number;
}

export interface PlayerSnapshot {
  readonly name: string;
  readonly isAI?: boolean;
  readonly life?: number;
  readonly startingLife?: number;
  readonly maxHandSize?: number;
  readonly counters?: Readonly<Record<string, number>>;
  readonly manaPool?: Readonly<Record<string, number>>;
  readonly zones?: Readonly<Partial<Record<PerPlayerZone, readonly CardSnapshot[]>>>;
  /** Permanents this player owns on the shared battlefield. */
  readonly battlefield?: readonly CardSnapshot[];
}

export interface MatchSnapshot {
  readonly matchId: string;
  readonly players: readonly PlayerSnapshot[];
}

export interface SeedMatchResult {
  readonly players: readonly EntityInstance[];
  readonly cards: readonly EntityInstance[];
  readonly zones: readonly EntityInstance[];
}

const CardSnapshotSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int().nonnegative()]),
    name: z.string().min(1),
    controller: z.string().min(1).optional(),
    tapped: z.boolean().optional(),
    power: z.number().int().optional(),
    toughness: z.number().int().optional(),
  })
  .strict();

const CardListSchema = z.array(CardSnapshotSchema);

const CountRecordSchema = z.record(z.string(), z.number().int().nonnegative());

export const MatchSnapshotSchema = z
  .object({
    matchId: z.string().min(1),
    players: z
      .array(
        z
          .object({
            name: z.string().min(1),
            isAI: z.boolean().optional(),
            life: z.number().int().optional(),
            startingLife: z.number().int().optional(),
            maxHandSize: z.number().int().optional(),
            counters: CountRecordSchema.optional(),
            manaPool: CountRecordSchema.optional(),
            zones: z
              .object({
                Library: CardListSchema.optional(),
                Hand: CardListSchema.optional(),
                Graveyard: CardListSchema.optional(),
                Exile: CardListSchema.optional(),
                Sideboard: CardListSchema.optional(),
              })
              .strict()
              .optional(),
            battlefield: CardListSchema.optional(),
          })
          .strict(),
      )
      .min(1),
  })
  .strict();

export interface ParseMatchSnapshotResult {
  readonly snapshot: MatchSnapshot | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function parseMatchSnapshot(value: unknown, pathPrefix = 'snapshot'): ParseMatchSnapshotResult {
  const parsed = MatchSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    return {
      snapshot: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'MATCH_SNAPSHOT_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `${pathPrefix}.${issue.path.join('.')}` : pathPrefix,
        severity: 'error',
        message: issue.message,
      })),
    };
  }
  return { snapshot: parsed.data, diagnostics: [] };
}

export const matchScopedId = (matchId: string, plainId: string): string => `${matchId}::${plainId}`;

export const zoneClassName = (zoneType: string): string => `Zone_${zoneType}`;

const seatLabel = (index: number): string => `Player_${index + 1}`;

function seedPlayer(kb: KnowledgeBase, matchId: string, player: PlayerSnapshot, index: number): EntityInstance {
  const pool: Record<string, number> = {};
  for (const color of MANA_COLORS) {
    pool[color] = player.manaPool?.[color] ?? 0;
  }
  const instance = kb.createInstance(PLAYER_CLASS, matchScopedId(matchId, seatLabel(index)), {
    name: player.name,
    displayName: player.name.slice(0, 60),
    seatIndex: index,
    manaPool: pool,
    ...(player.isAI === undefined ? {} : { isAI: player.isAI }),
    ...(player.life === undefined ? {} : { life: player.life }),
    ...(player.startingLife === undefined ? {} : { startingLife: player.startingLife }),
    ...(player.maxHandSize === undefined ? {} : { maxHandSize: player.maxHandSize }),
    ...(player.counters === undefined ? {} : { counters: { ...player.counters } }),
  });
  instance.metadata.set('matchId', matchId);
  instance.metadata.set('hostPlayerName', player.name);
  kb.bindExternalId(playerExternalKey(player.name), instance.objectId);
  return instance;
}

function seedCard(kb: KnowledgeBase, matchId: string, card: CardSnapshot, owner: string, zone: string): EntityInstance {
  const instance = resolveCard(kb, { id: card.id, name: card.name, owner, controller: card.controller ?? owner });
  updateDeclaredProperties(instance, {
    zone,
    owner,
    controller: card.controller ?? owner,
    ...(card.tapped === undefined ? {} : { tapped: card.tapped }),
    ...(card.power === undefined ? {} : { power: card.power }),
    ...(card.toughness === undefined ? {} : { toughness: card.toughness }),
  });
  instance.metadata.set('matchId', matchId);
  return instance;
}

function seedZone(
  kb: KnowledgeBase,
  matchId: string,
  zoneType: string,
  ownerLabel: string,
  ownerName: string | undefined,
  contents: readonly EntityInstance[],
): EntityInstance {
  const plainId = ownerName === undefined ? zoneClassName(zoneType) : `${zoneClassName(zoneType)}@${ownerLabel}`;
  const zone = kb.createInstance(zoneClassName(zoneType), matchScopedId(matchId, plainId), {
    owner: ownerLabel,
    contents: contents.map((card) => card.objectId),
  });
  zone.metadata.set('matchId', matchId);
  kb.bindExternalId(zoneExternalKey(zoneType, ownerName), zone.objectId);
  return zone;
}

/**
 * Creates the players, their cards and every zone of one match, and binds the host keys
 * ingestion resolves them by. Schema and domain errors propagate; the snapshot is expected
 * to have passed `parseMatchSnapshot`.
 */
export function seedMatch(kb: KnowledgeBase, snapshot: MatchSnapshot): SeedMatchResult {
  const players = snapshot.players.map((player, index) => seedPlayer(kb, snapshot.matchId, player, index));
  const cards: EntityInstance[] = [];
  const zones: EntityInstance[] = [];
  const battlefield: EntityInstance[] = [];

  snapshot.players.forEach((player, index) => {
    for (const zoneType of PER_PLAYER_ZONES) {
      const contents = (player.zones?.[zoneType] ?? []).map((card) =>
        seedCard(kb, snapshot.matchId, card, player.name, zoneType),
      );
      cards.push(...contents);
      zones.push(seedZone(kb, snapshot.matchId, zoneType, seatLabel(index), player.name, contents));
    }
    const permanents = (player.battlefield ?? []).map((card) =>
      seedCard(kb, snapshot.matchId, card, player.name, BATTLEFIELD_ZONE),
    );
    cards.push(...permanents);
    battlefield.push(...permanents);
  });

  zones.push(seedZone(kb, snapshot.matchId, BATTLEFIELD_ZONE, SHARED_ZONE_OWNER, undefined, battlefield));
  return { players, cards, zones };
}
