import { resolveBindingTemplate } from './binding-template.js';
import { valueTypeMismatchError } from './knowledge-error.js';
import { propertyValueEquals, type PropertyRecord, type PropertyValue } from './property-value.js';
import type { VerbExecutionContext, VerbSubjectSelector } from './verb-context.js';
import { evalVerbValue, templateBindings, type VerbValueExpr } from './verb-value.js';

export interface SetPropertyEffect extends VerbSubjectSelector {
  /** May contain `{name}` placeholders, e.g. `counters.{counterType}`. */
  readonly path: string;
  readonly value: VerbValueExpr;
}

export interface IncPropertyEffect extends VerbSubjectSelector {
  readonly path: string;
  readonly delta: VerbValueExpr;
}

export interface MoveZoneEffect extends VerbSubjectSelector {
  /** Defaults to `zone`. */
  readonly property?: string;
  /** When given, subjects whose zone differs are left where they are. */
  readonly from?: VerbValueExpr;
  readonly to: VerbValueExpr;
}

export interface EmitEventEffect {
  readonly type: string;
  readonly payload?: Readonly<Record<string, VerbValueExpr>>;
}

export type VerbEffect =
  | { readonly setProperty: SetPropertyEffect }
  | { readonly incProperty: IncPropertyEffect }
  | { readonly moveZone: MoveZoneEffect }
  | { readonly emitEvent: EmitEventEffect };

export type VerbEffectType = 'setProperty' | 'incProperty' | 'moveZone' | 'emitEvent';

export const DEFAULT_ZONE_PROPERTY = 'zone';

export const effectTypeOf = (effect: VerbEffect): VerbEffectType => {
  if ('setProperty' in effect) return 'setProperty';
  if ('incProperty' in effect) return 'incProperty';
  if ('moveZone' in effect) return 'moveZone';
  if ('emitEvent' in effect) return 'emitEvent';

  const _exhaustive: never = effect;
  return _exhaustive;
};

export const resolveEffectPath = (path: string, ctx: VerbExecutionContext): string =>
  resolveBindingTemplate(path, templateBindings(ctx));

const applySetProperty = (effect: SetPropertyEffect, ctx: VerbExecutionContext): void => {
  const path = resolveEffectPath(effect.path, ctx);
  const value = evalVerbValue(effect.value, ctx);
  for (const subject of ctx.subjects(effect, 'target')) {
    ctx.change(subject, path, value);
  }
};

const applyIncProperty = (effect: IncPropertyEffect, ctx: VerbExecutionContext): void => {
  const path = resolveEffectPath(effect.path, ctx);
  const delta = evalVerbValue(effect.delta, ctx);
  if (typeof delta !== 'number' || !Number.isFinite(delta)) {
    throw valueTypeMismatchError(ctx.verb, 'incProperty.delta', 'a finite number', delta);
  }
  for (const subject of ctx.subjects(effect, 'target')) {
    const current = ctx.read(subject, path);
    const base = typeof current === 'number' && Number.isFinite(current) ? current : 0;
    const next = base + delta;
    if (!Number.isFinite(next)) {
      throw valueTypeMismatchError(ctx.verb, 'incProperty result', 'a finite number', next);
    }
    ctx.change(subject, path, next);
  }
};

const applyMoveZone = (effect: MoveZoneEffect, ctx: VerbExecutionContext): void => {
  const property = effect.property ?? DEFAULT_ZONE_PROPERTY;
  const to = evalVerbValue(effect.to, ctx);
  const from: PropertyValue | undefined = effect.from === undefined ? undefined : evalVerbValue(effect.from, ctx);
  for (const subject of ctx.subjects(effect, 'target')) {
    if (from !== undefined && !propertyValueEquals(ctx.read(subject, property), from)) {
      continue;
    }
    ctx.change(subject, property, to);
  }
};

const applyEmitEvent = (effect: EmitEventEffect, ctx: VerbExecutionContext): void => {
  const payload: PropertyRecord = Object.fromEntries(
    Object.entries(effect.payload ?? {}).map(([key, expr]): [string, PropertyValue] => [key, evalVerbValue(expr, ctx)]),
  );
  ctx.emit(effect.type, payload);
};

/** The same code path serves `apply` and `preview`; the context decides whether writes land. */
export function applyVerbEffect(effect: VerbEffect, ctx: VerbExecutionContext): void {
  if ('setProperty' in effect) {
    applySetProperty(effect.setProperty, ctx);
    return;
  }

  if ('incProperty' in effect) {
    applyIncProperty(effect.incProperty, ctx);
    return;
  }

  if ('moveZone' in effect) {
    applyMoveZone(effect.moveZone, ctx);
    return;
  }

  if ('emitEvent' in effect) {
    applyEmitEvent(effect.emitEvent, ctx);
    return;
  }

  const _exhaustive: never = effect;
  return _exhaustive;
}

export function applyVerbEffects(effects: readonly VerbEffect[], ctx: VerbExecutionContext): void {
  for (const effect of effects) {
    applyVerbEffect(effect, ctx);
  }
}
