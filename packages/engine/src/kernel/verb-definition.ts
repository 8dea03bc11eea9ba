import { z } from 'zod';
import type { Diagnostic } from './diagnostics.js';
import type { EntityInstance } from './entity-instance.js';
import type { KnowledgeBase } from './knowledge-base.js';
import { isKnowledgeError } from './knowledge-error.js';
import type { PropertyRecord, PropertyValue } from './property-value.js';
import { matchesAllConditions, type QueryCondition } from './query-condition.js';
import { VerbExecutionContext, type VerbExecutionMode } from './verb-context.js';
import { canPayVerbCosts, type VerbCost } from './verb-costs.js';
import type { VerbEffect } from './verb-effects.js';
import { VerbInstance } from './verb-instance.js';
import { evalVerbValue, type VerbValueExpr } from './verb-value.js';

/** Matches any class in a target spec. */
export const ANY_CLASS = '*';

export interface VerbPrerequisite {
  readonly condition: QueryCondition;
  readonly description: string;
}

export interface TargetSpec {
  readonly className: string;
  readonly filter: readonly QueryCondition[];
  readonly min: number;
  readonly max: number;
}

export interface VerbDefinition {
  readonly name: string;
  readonly category: string;
  readonly description: string;
  readonly prerequisites: readonly VerbPrerequisite[];
  readonly targets: readonly TargetSpec[];
  readonly costs: readonly VerbCost[];
  readonly effects: readonly VerbEffect[];
  /** Resolved once, in declaration order, when the verb is bound. */
  readonly variables: Readonly<Record<string, VerbValueExpr>>;
  readonly metadata: PropertyRecord;
}

export interface TargetSpecInput {
  readonly className?: string;
  readonly filter?: readonly QueryCondition[];
  readonly min?: number;
  readonly max?: number;
}

export interface VerbDefinitionInput {
  readonly name: string;
  readonly category?: string;
  readonly description?: string;
  readonly prerequisites?: readonly VerbPrerequisite[];
  readonly targets?: readonly TargetSpecInput[];
  readonly costs?: readonly VerbCost[];
  readonly effects?: readonly VerbEffect[];
  readonly variables?: Readonly<Record<string, VerbValueExpr>>;
  readonly metadata?: PropertyRecord;
}

const DEFAULT_CATEGORY = 'generic';

export function defineVerb(input: VerbDefinitionInput): VerbDefinition {
  if (input.name.trim() === '') {
    throw new RangeError('Verb name must not be empty');
  }
  const targets = (input.targets ?? []).map((spec, index): TargetSpec => {
    const min = spec.min ?? 1;
    const max = spec.max ?? Math.max(min, 1);
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min < 0 || max < min) {
      throw new RangeError(`Verb '${input.name}' target ${index} has invalid cardinality [${min}, ${max}]`);
    }
    return { className: spec.className ?? ANY_CLASS, filter: [...(spec.filter ?? [])], min, max };
  });

  return {
    name: input.name,
    category: input.category ?? DEFAULT_CATEGORY,
    description: input.description ?? '',
    prerequisites: [...(input.prerequisites ?? [])],
    targets,
    costs: [...(input.costs ?? [])],
    effects: [...(input.effects ?? [])],
    variables: { ...input.variables },
    metadata: { ...input.metadata },
  };
}

const matchesSpec = (spec: TargetSpec, candidate: EntityInstance): boolean =>
  (spec.className === ANY_CLASS || spec.className === candidate.className)
  && matchesAllConditions((prop) => candidate.getPropertyPath(prop), spec.filter);

/**
 * Walks the specs in order with one cursor over the candidates. Each spec takes matching
 * candidates until it reaches `max` or meets one it rejects; the cursor never moves back.
 * Candidates left after the last spec are ignored.
 */
export function matchTargetSpecs(specs: readonly TargetSpec[], candidates: readonly EntityInstance[]): boolean {
  let cursor = 0;
  for (const spec of specs) {
    let accepted = 0;
    while (accepted < spec.max) {
      const candidate = candidates[cursor];
      if (candidate === undefined || !matchesSpec(spec, candidate)) {
        break;
      }
      accepted += 1;
      cursor += 1;
    }
    if (accepted < spec.min) {
      return false;
    }
  }
  return true;
}

export function resolveVerbVariables(
  definition: VerbDefinition,
  source: EntityInstance,
  targets: readonly EntityInstance[],
  overrides: PropertyRecord = {},
  mode: VerbExecutionMode = 'probe',
): Readonly<Record<string, PropertyValue>> {
  let bindings: Readonly<Record<string, PropertyValue>> = {};
  for (const [name, expr] of Object.entries(definition.variables)) {
    const scope = new VerbExecutionContext({ mode, verb: definition.name, source, targets, bindings });
    bindings = { ...bindings, [name]: evalVerbValue(expr, scope) };
  }
  return { ...bindings, ...overrides };
}

/**
 * Prerequisites on the source, then target specs, then the costs in order against a preview
 * overlay that never writes. Unavailability is a `false`, never an error.
 */
export function isVerbAvailable(
  definition: VerbDefinition,
  source: EntityInstance,
  candidates: readonly EntityInstance[],
  _kb: KnowledgeBase,
  overrides: PropertyRecord = {},
): boolean {
  const prerequisitesHold = definition.prerequisites.every((prerequisite) =>
    source.matches(prerequisite.condition),
  );
  if (!prerequisitesHold || !matchTargetSpecs(definition.targets, candidates)) {
    return false;
  }

  try {
    const bindings = resolveVerbVariables(definition, source, candidates, overrides);
    const trial = new VerbExecutionContext({
      mode: 'preview',
      verb: definition.name,
      source,
      targets: candidates,
      bindings,
    });
    return canPayVerbCosts(definition.costs, trial);
  } catch (error) {
    if (isKnowledgeError(error)) {
      return false;
    }
    throw error;
  }
}

export function bindVerb(
  definition: VerbDefinition,
  source: EntityInstance,
  targets: readonly EntityInstance[],
  kb: KnowledgeBase,
  overrides: PropertyRecord = {},
): VerbInstance {
  const bindings = resolveVerbVariables(definition, source, targets, overrides);
  return new VerbInstance({
    id: kb.nextVerbInstanceId(),
    definition,
    source,
    targets,
    bindings,
    timestamp: kb.clock(),
  });
}

// ---------------------------------------------------------------------------
// Catalog validation
// ---------------------------------------------------------------------------

export const PropertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(PropertyValueSchema),
    z.record(z.string(), PropertyValueSchema),
  ]),
);

const IndexSchema = z.number().int().nonnegative();

export const VerbValueExprSchema: z.ZodType<VerbValueExpr> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.object({ ref: z.literal('source') }).strict(),
    z.object({ ref: z.literal('target'), index: IndexSchema.optional() }).strict(),
    z.object({ ref: z.literal('sourceProp'), prop: z.string().min(1) }).strict(),
    z.object({ ref: z.literal('targetProp'), prop: z.string().min(1), index: IndexSchema.optional() }).strict(),
    z.object({ ref: z.literal('var'), name: z.string().min(1) }).strict(),
    z.object({ literal: PropertyValueSchema }).strict(),
    z
      .object({
        op: z.union([z.literal('+'), z.literal('-'), z.literal('*')]),
        left: VerbValueExprSchema,
        right: VerbValueExprSchema,
      })
      .strict(),
    z.object({ template: z.string() }).strict(),
  ]),
);

export const QueryConditionSchema = z
  .object({
    prop: z.string().min(1),
    op: z.enum(['eq', 'neq', 'gt', 'lt', 'gte', 'lte', 'contains', 'in']),
    value: PropertyValueSchema,
  })
  .strict();

const SubjectSchema = z.enum(['source', 'target', 'targets']);

const VerbEffectSchema = z.union([
  z
    .object({
      setProperty: z
        .object({ on: SubjectSchema.optional(), index: IndexSchema.optional(), path: z.string().min(1), value: VerbValueExprSchema })
        .strict(),
    })
    .strict(),
  z
    .object({
      incProperty: z
        .object({ on: SubjectSchema.optional(), index: IndexSchema.optional(), path: z.string().min(1), delta: VerbValueExprSchema })
        .strict(),
    })
    .strict(),
  z
    .object({
      moveZone: z
        .object({
          on: SubjectSchema.optional(),
          index: IndexSchema.optional(),
          property: z.string().min(1).optional(),
          from: VerbValueExprSchema.optional(),
          to: VerbValueExprSchema,
        })
        .strict(),
    })
    .strict(),
  z
    .object({
      emitEvent: z
        .object({ type: z.string().min(1), payload: z.record(z.string(), VerbValueExprSchema).optional() })
        .strict(),
    })
    .strict(),
]);

const VerbCostSchema = z.union([
  z
    .object({
      spendProperty: z
        .object({ on: SubjectSchema.optional(), index: IndexSchema.optional(), path: z.string().min(1), amount: VerbValueExprSchema })
        .strict(),
    })
    .strict(),
  z
    .object({
      changeProperty: z
        .object({
          on: SubjectSchema.optional(),
          index: IndexSchema.optional(),
          path: z.string().min(1),
          from: VerbValueExprSchema,
          to: VerbValueExprSchema,
        })
        .strict(),
    })
    .strict(),
]);

const TargetSpecSchema = z
  .object({
    className: z.string().min(1).optional(),
    filter: z.array(QueryConditionSchema).optional(),
    min: IndexSchema.optional(),
    max: IndexSchema.optional(),
  })
  .strict()
  .refine((spec) => spec.min === undefined || spec.max === undefined || spec.min <= spec.max, {
    message: 'min must not exceed max',
    path: ['max'],
  });

export const VerbDefinitionSchema = z
  .object({
    name: z.string().trim().min(1),
    category: z.string().min(1).optional(),
    description: z.string().optional(),
    prerequisites: z
      .array(z.object({ condition: QueryConditionSchema, description: z.string() }).strict())
      .optional(),
    targets: z.array(TargetSpecSchema).optional(),
    costs: z.array(VerbCostSchema).optional(),
    effects: z.array(VerbEffectSchema).optional(),
    variables: z.record(z.string(), VerbValueExprSchema).optional(),
    metadata: z.record(z.string(), PropertyValueSchema).optional(),
  })
  .strict();

export interface ParseVerbDefinitionResult {
  readonly verb: VerbDefinition | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function parseVerbDefinition(value: unknown, pathPrefix = 'verb'): ParseVerbDefinitionResult {
  const parsed = VerbDefinitionSchema.safeParse(value);
  if (!parsed.success) {
    return {
      verb: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'VERB_DEFINITION_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `${pathPrefix}.${issue.path.join('.')}` : pathPrefix,
        severity: 'error',
        message: issue.message,
      })),
    };
  }
  return { verb: defineVerb(parsed.data), diagnostics: [] };
}
