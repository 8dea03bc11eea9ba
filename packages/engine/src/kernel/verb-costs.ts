import { propertyValueEquals, type PropertyValue } from './property-value.js';
import type { VerbExecutionContext, VerbSubjectSelector } from './verb-context.js';
import { resolveEffectPath } from './verb-effects.js';
import { evalVerbValue, type VerbValueExpr } from './verb-value.js';

/** The subject's numeric property must cover `amount`; paying subtracts it. */
export interface SpendPropertyCost extends VerbSubjectSelector {
  readonly path: string;
  readonly amount: VerbValueExpr;
}

/** The subject's property must equal `from`; paying sets it to `to` (tapping as a cost). */
export interface ChangePropertyCost extends VerbSubjectSelector {
  readonly path: string;
  readonly from: VerbValueExpr;
  readonly to: VerbValueExpr;
}

export type VerbCost =
  | { readonly spendProperty: SpendPropertyCost }
  | { readonly changeProperty: ChangePropertyCost };

export type VerbCostType = 'spendProperty' | 'changeProperty';

// Costs are paid by the source unless they say otherwise.
const COST_SUBJECT_FALLBACK = 'source';

export const costTypeOf = (cost: VerbCost): VerbCostType => {
  if ('spendProperty' in cost) return 'spendProperty';
  if ('changeProperty' in cost) return 'changeProperty';

  const _exhaustive: never = cost;
  return _exhaustive;
};

const readNumber = (value: PropertyValue | undefined): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export function canPayVerbCost(cost: VerbCost, ctx: VerbExecutionContext): boolean {
  if ('spendProperty' in cost) {
    const spec = cost.spendProperty;
    const path = resolveEffectPath(spec.path, ctx);
    const amount = readNumber(evalVerbValue(spec.amount, ctx));
    if (amount === null) {
      return false;
    }
    return ctx.subjects(spec, COST_SUBJECT_FALLBACK).every((subject) => {
      const current = readNumber(ctx.read(subject, path));
      return current !== null && current >= amount;
    });
  }

  if ('changeProperty' in cost) {
    const spec = cost.changeProperty;
    const path = resolveEffectPath(spec.path, ctx);
    const from = evalVerbValue(spec.from, ctx);
    return ctx
      .subjects(spec, COST_SUBJECT_FALLBACK)
      .every((subject) => propertyValueEquals(ctx.read(subject, path) ?? null, from));
  }

  const _exhaustive: never = cost;
  return _exhaustive;
}

/**
 * Checks the costs in order, paying each into `ctx` before checking the next, so costs drawing
 * on the same property add up. Pass a preview context: its payments land only in the overlay.
 */
export function canPayVerbCosts(costs: readonly VerbCost[], ctx: VerbExecutionContext): boolean {
  for (const cost of costs) {
    if (!canPayVerbCost(cost, ctx)) {
      return false;
    }
    applyVerbCost(cost, ctx);
  }
  return true;
}

/** Callers check `canPayVerbCost` first; paying an unpayable cost writes whatever the arithmetic gives. */
export function applyVerbCost(cost: VerbCost, ctx: VerbExecutionContext): void {
  if ('spendProperty' in cost) {
    const spec = cost.spendProperty;
    const path = resolveEffectPath(spec.path, ctx);
    const amount = readNumber(evalVerbValue(spec.amount, ctx)) ?? 0;
    for (const subject of ctx.subjects(spec, COST_SUBJECT_FALLBACK)) {
      ctx.change(subject, path, (readNumber(ctx.read(subject, path)) ?? 0) - amount);
    }
    return;
  }

  if ('changeProperty' in cost) {
    const spec = cost.changeProperty;
    const path = resolveEffectPath(spec.path, ctx);
    const to = evalVerbValue(spec.to, ctx);
    for (const subject of ctx.subjects(spec, COST_SUBJECT_FALLBACK)) {
      ctx.change(subject, path, to);
    }
    return;
  }

  const _exhaustive: never = cost;
  return _exhaustive;
}
