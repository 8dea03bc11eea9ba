import {
  encodePropertyValue,
  isPropertyRecord,
  propertyValueEquals,
  type PropertyRecord,
  type PropertyScalar,
  type PropertyValue,
} from './property-value.js';

/** Side channel the reference domain resolves ids through. */
export interface InstanceDirectory {
  hasInstance(objectId: string): boolean;
}

export interface BooleanDomain {
  readonly kind: 'boolean';
}

export interface IntDomain {
  readonly kind: 'int';
  readonly min?: number;
  readonly max?: number;
}

export interface RealDomain {
  readonly kind: 'real';
  readonly min?: number;
  readonly max?: number;
  readonly minInclusive: boolean;
  readonly maxInclusive: boolean;
  /** Decimal places the candidate is rounded to before it is compared with the bounds. */
  readonly precision?: number;
}

export interface EnumDomain {
  readonly kind: 'enum';
  readonly values: readonly PropertyValue[];
}

export interface TextDomain {
  readonly kind: 'text';
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
}

export interface ListDomain {
  readonly kind: 'list';
  /** Ignored when `elementDomain` is set. */
  readonly allowed: readonly PropertyValue[];
  readonly elementDomain?: Domain;
  readonly minSize?: number;
  readonly maxSize?: number;
  readonly allowDuplicates: boolean;
}

export interface MapDomain {
  readonly kind: 'map';
  readonly keyDomain?: Domain;
  readonly valueDomain?: Domain;
  readonly minSize?: number;
  readonly maxSize?: number;
}

export interface ReferenceDomain {
  readonly kind: 'reference';
  readonly pattern: string;
  readonly directory: InstanceDirectory;
}

export type Domain =
  | BooleanDomain
  | IntDomain
  | RealDomain
  | EnumDomain
  | TextDomain
  | ListDomain
  | MapDomain
  | ReferenceDomain;

export type DomainKind = Domain['kind'];

const anchoredPatternCache = new Map<string, RegExp>();

const anchoredPattern = (pattern: string): RegExp => {
  const cached = anchoredPatternCache.get(pattern);
  if (cached !== undefined) {
    return cached;
  }
  const compiled = new RegExp(`^(?:${pattern})$`);
  anchoredPatternCache.set(pattern, compiled);
  return compiled;
};

export const booleanDomain = (): BooleanDomain => ({ kind: 'boolean' });

export const intDomain = (min?: number, max?: number): IntDomain => ({
  kind: 'int',
  ...(min === undefined ? {} : { min }),
  ...(max === undefined ? {} : { max }),
});

export interface RealDomainOptions {
  readonly min?: number;
  readonly max?: number;
  readonly minInclusive?: boolean;
  readonly maxInclusive?: boolean;
  readonly precision?: number;
}

export const realDomain = (options: RealDomainOptions = {}): RealDomain => {
  if (options.precision !== undefined && (!Number.isSafeInteger(options.precision) || options.precision < 0)) {
    throw new RangeError('realDomain precision must be a non-negative safe integer');
  }
  return {
    kind: 'real',
    ...(options.min === undefined ? {} : { min: options.min }),
    ...(options.max === undefined ? {} : { max: options.max }),
    minInclusive: options.minInclusive ?? true,
    maxInclusive: options.maxInclusive ?? true,
    ...(options.precision === undefined ? {} : { precision: options.precision }),
  };
};

export const enumDomain = (values: readonly PropertyValue[]): EnumDomain => ({ kind: 'enum', values: [...values] });

export interface TextDomainOptions {
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
}

export const textDomain = (options: TextDomainOptions = {}): TextDomain => {
  if (options.pattern !== undefined) {
    anchoredPattern(options.pattern);
  }
  return {
    kind: 'text',
    ...(options.minLength === undefined ? {} : { minLength: options.minLength }),
    ...(options.maxLength === undefined ? {} : { maxLength: options.maxLength }),
    ...(options.pattern === undefined ? {} : { pattern: options.pattern }),
  };
};

export interface ListDomainOptions {
  readonly minSize?: number;
  readonly maxSize?: number;
  readonly allowDuplicates?: boolean;
  readonly elementDomain?: Domain;
}

export const listDomain = (allowed: readonly PropertyValue[], options: ListDomainOptions = {}): ListDomain => ({
  kind: 'list',
  allowed: [...allowed],
  ...(options.minSize === undefined ? {} : { minSize: options.minSize }),
  ...(options.maxSize === undefined ? {} : { maxSize: options.maxSize }),
  allowDuplicates: options.allowDuplicates ?? true,
  ...(options.elementDomain === undefined ? {} : { elementDomain: options.elementDomain }),
});

export interface MapDomainOptions {
  readonly keyDomain?: Domain;
  readonly valueDomain?: Domain;
  readonly minSize?: number;
  readonly maxSize?: number;
}

export const mapDomain = (options: MapDomainOptions = {}): MapDomain => ({
  kind: 'map',
  ...(options.keyDomain === undefined ? {} : { keyDomain: options.keyDomain }),
  ...(options.valueDomain === undefined ? {} : { valueDomain: options.valueDomain }),
  ...(options.minSize === undefined ? {} : { minSize: options.minSize }),
  ...(options.maxSize === undefined ? {} : { maxSize: options.maxSize }),
});

export const referenceDomain = (pattern: string, directory: InstanceDirectory): ReferenceDomain => {
  anchoredPattern(pattern);
  return { kind: 'reference', pattern, directory };
};

const isMember = (allowed: readonly PropertyValue[], value: unknown): boolean =>
  allowed.some((candidate) => propertyValueEquals(candidate, value));

const roundTo = (value: number, precision: number): number => {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
};

const withinSize = (size: number, min: number | undefined, max: number | undefined): boolean =>
  (min === undefined || size >= min) && (max === undefined || size <= max);

const hasNoDuplicates = (values: readonly unknown[]): boolean =>
  values.every((value, index) => values.findIndex((other) => propertyValueEquals(other, value)) === index);

export function isValidDomainValue(domain: Domain, value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }

  switch (domain.kind) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'int':
      return (
        typeof value === 'number'
        && Number.isSafeInteger(value)
        && (domain.min === undefined || value >= domain.min)
        && (domain.max === undefined || value <= domain.max)
      );
    case 'real': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return false;
      }
      const candidate = domain.precision === undefined ? value : roundTo(value, domain.precision);
      if (domain.min !== undefined && (domain.minInclusive ? candidate < domain.min : candidate <= domain.min)) {
        return false;
      }
      if (domain.max !== undefined && (domain.maxInclusive ? candidate > domain.max : candidate >= domain.max)) {
        return false;
      }
      return true;
    }
    case 'enum':
      return isMember(domain.values, value);
    case 'text':
      return (
        typeof value === 'string'
        && withinSize(value.length, domain.minLength, domain.maxLength)
        && (domain.pattern === undefined || anchoredPattern(domain.pattern).test(value))
      );
    case 'list':
      return (
        Array.isArray(value)
        && withinSize(value.length, domain.minSize, domain.maxSize)
        && (domain.allowDuplicates || hasNoDuplicates(value))
        && value.every((element) => isValidListElement(domain, element))
      );
    case 'map':
      return isPropertyRecord(value) && isValidMap(domain, value);
    case 'reference':
      return (
        typeof value === 'string'
        && anchoredPattern(domain.pattern).test(value)
        && domain.directory.hasInstance(value)
      );
    default: {
      const _exhaustive: never = domain;
      return _exhaustive;
    }
  }
}

function isValidListElement(domain: ListDomain, element: unknown): boolean {
  return domain.elementDomain === undefined
    ? isMember(domain.allowed, element)
    : isValidDomainValue(domain.elementDomain, element);
}

function isValidMap(domain: MapDomain, value: PropertyRecord): boolean {
  const entries = Object.entries(value);
  if (!withinSize(entries.length, domain.minSize, domain.maxSize)) {
    return false;
  }
  return entries.every(
    ([key, entry]) =>
      (domain.keyDomain === undefined || isValidDomainValue(domain.keyDomain, key))
      && (domain.valueDomain === undefined || isValidDomainValue(domain.valueDomain, entry)),
  );
}

const formatAllowed = (values: readonly PropertyValue[]): string =>
  `[${values.map((value) => encodePropertyValue(value)).join(', ')}]`;

export function describeDomain(domain: Domain): string {
  switch (domain.kind) {
    case 'boolean':
      return 'Boolean';
    case 'int':
      if (domain.min === undefined && domain.max === undefined) return 'Integer (unbounded)';
      if (domain.min === undefined) return `Integer (max: ${domain.max})`;
      if (domain.max === undefined) return `Integer (min: ${domain.min})`;
      return `Integer [${domain.min}, ${domain.max}]`;
    case 'real': {
      const precision = domain.precision === undefined ? '' : ` (precision: ${domain.precision})`;
      if (domain.min === undefined && domain.max === undefined) return `Real (unbounded)${precision}`;
      const left = domain.minInclusive ? '[' : '(';
      const right = domain.maxInclusive ? ']' : ')';
      return `Real ${left}${domain.min ?? '-∞'}, ${domain.max ?? '∞'}${right}${precision}`;
    }
    case 'enum':
      return `Enum: ${formatAllowed(domain.values)}`;
    case 'text': {
      const constraints: string[] = [];
      if (domain.minLength !== undefined) constraints.push(`minLen: ${domain.minLength}`);
      if (domain.maxLength !== undefined) constraints.push(`maxLen: ${domain.maxLength}`);
      if (domain.pattern !== undefined) constraints.push(`pattern: ${domain.pattern}`);
      return constraints.length === 0 ? 'Text' : `Text (${constraints.join(', ')})`;
    }
    case 'list': {
      const constraints = [
        domain.elementDomain === undefined
          ? `allowed: ${formatAllowed(domain.allowed)}`
          : `elements: ${describeDomain(domain.elementDomain)}`,
      ];
      if (domain.minSize !== undefined) constraints.push(`minSize: ${domain.minSize}`);
      if (domain.maxSize !== undefined) constraints.push(`maxSize: ${domain.maxSize}`);
      if (!domain.allowDuplicates) constraints.push('no duplicates');
      return `List (${constraints.join(', ')})`;
    }
    case 'map': {
      const constraints: string[] = [];
      if (domain.keyDomain !== undefined) constraints.push(`keys: ${describeDomain(domain.keyDomain)}`);
      if (domain.valueDomain !== undefined) constraints.push(`values: ${describeDomain(domain.valueDomain)}`);
      if (domain.minSize !== undefined) constraints.push(`minSize: ${domain.minSize}`);
      if (domain.maxSize !== undefined) constraints.push(`maxSize: ${domain.maxSize}`);
      return constraints.length === 0 ? 'Map' : `Map (${constraints.join(', ')})`;
    }
    case 'reference':
      return `Reference (pattern: ${domain.pattern})`;
    default: {
      const _exhaustive: never = domain;
      return _exhaustive;
    }
  }
}

export interface DomainMetadata {
  readonly [key: string]: PropertyScalar | readonly PropertyValue[] | DomainMetadata;
}

/** JSON-safe description of a domain's parameters for export collaborators. */
export function describeDomainMetadata(domain: Domain): DomainMetadata {
  switch (domain.kind) {
    case 'boolean':
      return { kind: 'boolean' };
    case 'int':
      return { kind: 'int', min: domain.min ?? null, max: domain.max ?? null };
    case 'real':
      return {
        kind: 'real',
        min: domain.min ?? null,
        max: domain.max ?? null,
        minInclusive: domain.minInclusive,
        maxInclusive: domain.maxInclusive,
        precision: domain.precision ?? null,
      };
    case 'enum':
      return { kind: 'enum', values: domain.values };
    case 'text':
      return {
        kind: 'text',
        minLength: domain.minLength ?? null,
        maxLength: domain.maxLength ?? null,
        pattern: domain.pattern ?? null,
      };
    case 'list':
      return {
        kind: 'list',
        allowed: domain.allowed,
        minSize: domain.minSize ?? null,
        maxSize: domain.maxSize ?? null,
        allowDuplicates: domain.allowDuplicates,
        elementDomain: domain.elementDomain === undefined ? null : describeDomainMetadata(domain.elementDomain),
      };
    case 'map':
      return {
        kind: 'map',
        keyDomain: domain.keyDomain === undefined ? null : describeDomainMetadata(domain.keyDomain),
        valueDomain: domain.valueDomain === undefined ? null : describeDomainMetadata(domain.valueDomain),
        minSize: domain.minSize ?? null,
        maxSize: domain.maxSize ?? null,
      };
    case 'reference':
      return { kind: 'reference', pattern: domain.pattern };
    default: {
      const _exhaustive: never = domain;
      return _exhaustive;
    }
  }
}
