import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Diagnostic } from './diagnostics.js';
import {
  booleanDomain,
  enumDomain,
  intDomain,
  listDomain,
  mapDomain,
  realDomain,
  referenceDomain,
  textDomain,
  type Domain,
  type InstanceDirectory,
} from './domain.js';
import { EntitySchema } from './entity-schema.js';
import { PropertyCell } from './property-cell.js';
import type { PropertyValue } from './property-value.js';
import { PropertyValueSchema } from './verb-definition.js';

export type DomainDocument =
  | { readonly kind: 'boolean' }
  | { readonly kind: 'int'; readonly min?: number; readonly max?: number }
  | {
      readonly kind: 'real';
      readonly min?: number;
      readonly max?: number;
      readonly minInclusive?: boolean;
      readonly maxInclusive?: boolean;
      readonly precision?: number;
    }
  | { readonly kind: 'enum'; readonly values: readonly PropertyValue[] }
  | { readonly kind: 'text'; readonly minLength?: number; readonly maxLength?: number; readonly pattern?: string }
  | {
      readonly kind: 'list';
      readonly allowed?: readonly PropertyValue[];
      readonly elements?: DomainDocument;
      readonly minSize?: number;
      readonly maxSize?: number;
      readonly allowDuplicates?: boolean;
    }
  | {
      readonly kind: 'map';
      readonly keys?: DomainDocument;
      readonly values?: DomainDocument;
      readonly minSize?: number;
      readonly maxSize?: number;
    }
  | { readonly kind: 'reference'; readonly pattern: string };

export interface PropertyDocument {
  readonly name: string;
  /** Omitted only for reference properties, which then start unset. */
  readonly default?: PropertyValue;
  readonly domain?: DomainDocument;
}

export interface EntityDefinitionDocument {
  readonly className: string;
  readonly description?: string;
  readonly required?: readonly string[];
  readonly verbs?: readonly string[];
  readonly properties: readonly PropertyDocument[];
}

export interface DefinitionDocument {
  readonly definitions: readonly EntityDefinitionDocument[];
}

const SizeSchema = z.number().int().nonnegative();

export const DomainDocumentSchema: z.ZodType<DomainDocument> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('boolean') }).strict(),
    z.object({ kind: z.literal('int'), min: z.number().int().optional(), max: z.number().int().optional() }).strict(),
    z
      .object({
        kind: z.literal('real'),
        min: z.number().optional(),
        max: z.number().optional(),
        minInclusive: z.boolean().optional(),
        maxInclusive: z.boolean().optional(),
        precision: SizeSchema.optional(),
      })
      .strict(),
    z.object({ kind: z.literal('enum'), values: z.array(PropertyValueSchema) }).strict(),
    z
      .object({
        kind: z.literal('text'),
        minLength: SizeSchema.optional(),
        maxLength: SizeSchema.optional(),
        pattern: z.string().min(1).optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('list'),
        allowed: z.array(PropertyValueSchema).optional(),
        elements: DomainDocumentSchema.optional(),
        minSize: SizeSchema.optional(),
        maxSize: SizeSchema.optional(),
        allowDuplicates: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('map'),
        keys: DomainDocumentSchema.optional(),
        values: DomainDocumentSchema.optional(),
        minSize: SizeSchema.optional(),
        maxSize: SizeSchema.optional(),
      })
      .strict(),
    z.object({ kind: z.literal('reference'), pattern: z.string().min(1) }).strict(),
  ]),
);

const PropertyDocumentSchema = z
  .object({
    name: z.string().min(1),
    default: PropertyValueSchema.optional(),
    domain: DomainDocumentSchema.optional(),
  })
  .strict();

export const DefinitionDocumentSchema = z
  .object({
    definitions: z.array(
      z
        .object({
          className: z.string().min(1),
          description: z.string().optional(),
          required: z.array(z.string().min(1)).optional(),
          verbs: z.array(z.string().min(1)).optional(),
          properties: z.array(PropertyDocumentSchema),
        })
        .strict(),
    ),
  })
  .strict();

export interface CompileDefinitionsResult {
  readonly schemas: readonly EntitySchema[];
  readonly diagnostics: readonly Diagnostic[];
}

export interface CompileDefinitionsOptions {
  readonly assetPath?: string;
  readonly pathPrefix?: string;
}

export function compileDomainDocument(document: DomainDocument, directory: InstanceDirectory): Domain {
  switch (document.kind) {
    case 'boolean':
      return booleanDomain();
    case 'int':
      return intDomain(document.min, document.max);
    case 'real':
      return realDomain(document);
    case 'enum':
      return enumDomain(document.values);
    case 'text':
      return textDomain(document);
    case 'list':
      return listDomain(document.allowed ?? [], {
        ...(document.minSize === undefined ? {} : { minSize: document.minSize }),
        ...(document.maxSize === undefined ? {} : { maxSize: document.maxSize }),
        ...(document.allowDuplicates === undefined ? {} : { allowDuplicates: document.allowDuplicates }),
        ...(document.elements === undefined ? {} : { elementDomain: compileDomainDocument(document.elements, directory) }),
      });
    case 'map':
      return mapDomain({
        ...(document.minSize === undefined ? {} : { minSize: document.minSize }),
        ...(document.maxSize === undefined ? {} : { maxSize: document.maxSize }),
        ...(document.keys === undefined ? {} : { keyDomain: compileDomainDocument(document.keys, directory) }),
        ...(document.values === undefined ? {} : { valueDomain: compileDomainDocument(document.values, directory) }),
      });
    case 'reference':
      return referenceDomain(document.pattern, directory);
    default: {
      const _exhaustive: never = document;
      return _exhaustive;
    }
  }
}

function compileProperty(property: PropertyDocument, directory: InstanceDirectory): PropertyCell {
  const domain = property.domain === undefined ? undefined : compileDomainDocument(property.domain, directory);
  if (property.default === undefined) {
    if (domain === undefined) {
      throw new RangeError(`property '${property.name}' needs a default or a domain`);
    }
    return PropertyCell.unset(property.name, domain);
  }
  return new PropertyCell(property.name, property.default, domain);
}

const formatError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Validates the document shape, then compiles each definition on its own so one bad entry
 * yields a diagnostic without hiding the rest.
 */
export function compileDefinitionDocument(
  value: unknown,
  directory: InstanceDirectory,
  options: CompileDefinitionsOptions = {},
): CompileDefinitionsResult {
  const pathPrefix = options.pathPrefix ?? 'document';
  const assetPath = options.assetPath === undefined ? {} : { assetPath: options.assetPath };
  const parsed = DefinitionDocumentSchema.safeParse(value);
  if (!parsed.success) {
    return {
      schemas: [],
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'DEFINITION_DOCUMENT_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `${pathPrefix}.${issue.path.join('.')}` : pathPrefix,
        severity: 'error',
        message: issue.message,
        ...assetPath,
      })),
    };
  }

  const schemas: EntitySchema[] = [];
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();
  parsed.data.definitions.forEach((definition, index) => {
    const path = `${pathPrefix}.definitions.${index}`;
    if (seen.has(definition.className)) {
      diagnostics.push({
        code: 'DEFINITION_DUPLICATE_CLASS',
        path: `${path}.className`,
        severity: 'error',
        message: `Class "${definition.className}" is defined more than once.`,
        entityId: definition.className,
        ...assetPath,
      });
      return;
    }
    seen.add(definition.className);

    try {
      schemas.push(
        new EntitySchema({
          className: definition.className,
          ...(definition.description === undefined ? {} : { description: definition.description }),
          properties: definition.properties.map((property) => compileProperty(property, directory)),
          requiredProperties: definition.required ?? [],
          verbNames: definition.verbs ?? [],
        }),
      );
    } catch (error) {
      diagnostics.push({
        code: 'DEFINITION_COMPILE_FAILED',
        path,
        severity: 'error',
        message: `Failed to compile "${definition.className}": ${formatError(error)}.`,
        entityId: definition.className,
        ...assetPath,
      });
    }
  });

  return { schemas, diagnostics };
}

function readDefinitionFile(assetPath: string): { readonly value: unknown; readonly diagnostic?: Diagnostic } {
  const extension = extname(assetPath).toLowerCase();
  if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
    return {
      value: null,
      diagnostic: {
        code: 'DEFINITION_DOCUMENT_FORMAT_UNSUPPORTED',
        path: 'document.file',
        severity: 'error',
        message: `Unsupported definition format "${extension || '(none)'}".`,
        suggestion: 'Use .json, .yaml, or .yml definition files.',
        assetPath,
      },
    };
  }

  try {
    const source = readFileSync(assetPath, 'utf8');
    return { value: extension === '.json' ? JSON.parse(source) : parseYaml(source) };
  } catch (error) {
    return {
      value: null,
      diagnostic: {
        code: 'DEFINITION_DOCUMENT_PARSE_ERROR',
        path: 'document.file',
        severity: 'error',
        message: `Failed to parse definition file: ${formatError(error)}.`,
        suggestion: 'Fix file syntax and try loading again.',
        assetPath,
      },
    };
  }
}

export function loadDefinitionDocumentFromFile(assetPath: string, directory: InstanceDirectory): CompileDefinitionsResult {
  const fileResult = readDefinitionFile(assetPath);
  if (fileResult.diagnostic !== undefined) {
    return { schemas: [], diagnostics: [fileResult.diagnostic] };
  }
  return compileDefinitionDocument(fileResult.value, directory, { assetPath });
}

export const STANDARD_DEFINITIONS_PATH = fileURLToPath(
  new URL('../../data/standard-definitions.yaml', import.meta.url),
);

/** Zones, players, the generic card, tokens and the game state. */
export function loadStandardDefinitions(directory: InstanceDirectory): CompileDefinitionsResult {
  return loadDefinitionDocumentFromFile(STANDARD_DEFINITIONS_PATH, directory);
}
