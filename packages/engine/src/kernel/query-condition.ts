import { propertyValueEquals, type PropertyValue } from './property-value.js';

export type QueryOperator = 'eq' | 'neq' | 'gt' | 'lt' | 'gte' | 'lte' | 'contains' | 'in';

export interface QueryCondition {
  readonly prop: string;
  readonly op: QueryOperator;
  readonly value: PropertyValue;
}

export const condition = (prop: string, op: QueryOperator, value: PropertyValue): QueryCondition => ({ prop, op, value });

type Ordered = number | string;

const compareOrdered = (left: unknown, right: unknown): number | null => {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return null;
};

const isOrdered = (value: unknown): value is Ordered => typeof value === 'number' || typeof value === 'string';

export function matchesCondition(value: PropertyValue | undefined, query: QueryCondition): boolean {
  if (value === undefined || value === null) {
    if (query.op === 'eq') return query.value === null;
    if (query.op === 'neq') return query.value !== null;
    return false;
  }

  switch (query.op) {
    case 'eq':
      return propertyValueEquals(value, query.value);
    case 'neq':
      return !propertyValueEquals(value, query.value);
    case 'gt':
    case 'lt':
    case 'gte':
    case 'lte': {
      if (!isOrdered(value) || !isOrdered(query.value)) {
        return false;
      }
      const order = compareOrdered(value, query.value);
      if (order === null) return false;
      if (query.op === 'gt') return order > 0;
      if (query.op === 'lt') return order < 0;
      if (query.op === 'gte') return order >= 0;
      return order <= 0;
    }
    case 'contains':
      if (typeof value === 'string' && typeof query.value === 'string') {
        return value.includes(query.value);
      }
      if (Array.isArray(value)) {
        return value.some((item) => propertyValueEquals(item, query.value));
      }
      return false;
    case 'in':
      return Array.isArray(query.value) && query.value.some((item) => propertyValueEquals(item, value));
    default: {
      const _exhaustive: never = query.op;
      return _exhaustive;
    }
  }
}

export function matchesAllConditions(
  read: (prop: string) => PropertyValue | undefined,
  conditions: readonly QueryCondition[],
): boolean {
  return conditions.every((query) => matchesCondition(read(query.prop), query));
}
