import { resolveBindingTemplate } from './binding-template.js';
import type { EntityInstance } from './entity-instance.js';
import { targetMissingError, valueTypeMismatchError } from './knowledge-error.js';
import type { PropertyScalar, PropertyValue } from './property-value.js';

export type VerbReference =
  | { readonly ref: 'source' }
  | { readonly ref: 'target'; readonly index?: number }
  | { readonly ref: 'sourceProp'; readonly prop: string }
  | { readonly ref: 'targetProp'; readonly prop: string; readonly index?: number }
  | { readonly ref: 'var'; readonly name: string };

export type VerbValueExpr =
  | PropertyScalar
  | VerbReference
  | { readonly literal: PropertyValue }
  | {
      readonly op: '+' | '-' | '*';
      readonly left: VerbValueExpr;
      readonly right: VerbValueExpr;
    }
  | { readonly template: string };

/** What a value expression can see while a verb is bound, probed, previewed or applied. */
export interface VerbValueScope {
  readonly verb: string;
  readonly source: EntityInstance;
  readonly targets: readonly EntityInstance[];
  readonly bindings: Readonly<Record<string, PropertyValue>>;
  read(instance: EntityInstance, path: string): PropertyValue | undefined;
}

export function requireTarget(scope: Pick<VerbValueScope, 'verb' | 'targets'>, index: number): EntityInstance {
  const target = scope.targets[index];
  if (target === undefined) {
    throw targetMissingError(scope.verb, index, scope.targets.length);
  }
  return target;
}

/** Template names: every binding, plus `source` and `target`/`target0`, `target1`, ... as object ids. */
export function templateBindings(scope: VerbValueScope): Readonly<Record<string, PropertyValue>> {
  const entries: Record<string, PropertyValue> = { source: scope.source.objectId };
  scope.targets.forEach((target, index) => {
    entries[`target${index}`] = target.objectId;
  });
  const first = scope.targets[0];
  if (first !== undefined) {
    entries.target = first.objectId;
  }
  return { ...entries, ...scope.bindings };
}

function expectNumber(scope: VerbValueScope, field: string, value: PropertyValue): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw valueTypeMismatchError(scope.verb, field, 'a finite number', value);
  }
  return value;
}

function applyArithmetic(op: '+' | '-' | '*', left: number, right: number): number {
  switch (op) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    default: {
      const _exhaustive: never = op;
      return _exhaustive;
    }
  }
}

export function evalVerbValue(expr: VerbValueExpr, scope: VerbValueScope): PropertyValue {
  if (expr === null || typeof expr === 'number' || typeof expr === 'boolean' || typeof expr === 'string') {
    return expr;
  }

  if ('literal' in expr) {
    return expr.literal;
  }

  if ('template' in expr) {
    return resolveBindingTemplate(expr.template, templateBindings(scope));
  }

  if ('op' in expr) {
    const left = expectNumber(scope, `operand of '${expr.op}'`, evalVerbValue(expr.left, scope));
    const right = expectNumber(scope, `operand of '${expr.op}'`, evalVerbValue(expr.right, scope));
    return expectNumber(scope, `result of '${expr.op}'`, applyArithmetic(expr.op, left, right));
  }

  switch (expr.ref) {
    case 'source':
      return scope.source.objectId;
    case 'target':
      return requireTarget(scope, expr.index ?? 0).objectId;
    case 'sourceProp':
      return scope.read(scope.source, expr.prop) ?? null;
    case 'targetProp':
      return scope.read(requireTarget(scope, expr.index ?? 0), expr.prop) ?? null;
    case 'var':
      return Object.hasOwn(scope.bindings, expr.name) ? (scope.bindings[expr.name] ?? null) : null;
    default: {
      const _exhaustive: never = expr;
      return _exhaustive;
    }
  }
}
