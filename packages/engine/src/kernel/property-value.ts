export type PropertyScalar = string | number | boolean | null;

export type PropertyValue = PropertyScalar | readonly PropertyValue[] | PropertyRecord;

export interface PropertyRecord {
  readonly [key: string]: PropertyValue;
}

export const isPropertyRecord = (value: unknown): value is PropertyRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isPropertyScalar = (value: unknown): value is PropertyScalar =>
  value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

export function isPropertyValue(value: unknown): value is PropertyValue {
  if (isPropertyScalar(value)) {
    return typeof value !== 'number' || Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every((item) => isPropertyValue(item));
  }
  if (isPropertyRecord(value)) {
    return Object.values(value).every((item) => isPropertyValue(item));
  }
  return false;
}

export function propertyValueEquals(left: unknown, right: unknown): boolean {
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) {
      return false;
    }
    return left.every((value, index) => propertyValueEquals(value, right[index]));
  }
  if (isPropertyRecord(left) || isPropertyRecord(right)) {
    if (!isPropertyRecord(left) || !isPropertyRecord(right)) {
      return false;
    }
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }
    return leftKeys.every((key) => Object.hasOwn(right, key) && propertyValueEquals(left[key], right[key]));
  }
  return left === right;
}

/** Copies lists and records at every depth. Keys such as `__proto__` stay own entries. */
export function clonePropertyValue(value: PropertyValue): PropertyValue {
  if (Array.isArray(value)) {
    return value.map((item: PropertyValue) => clonePropertyValue(item));
  }
  if (isPropertyRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]): [string, PropertyValue] => [key, clonePropertyValue(entry)]),
    );
  }
  return value;
}

/** Stable text form: record keys sorted, so equal values always encode identically. */
export function encodePropertyValue(value: PropertyValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => encodePropertyValue(item)).join(',')}]`;
  }
  if (isPropertyRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${encodePropertyValue(value[key] ?? null)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export const formatPropertyValue = (value: unknown): string => {
  if (value === undefined) {
    return 'undefined';
  }
  return isPropertyValue(value) ? encodePropertyValue(value) : String(value);
};
