import { describeDomain, describeDomainMetadata, type DomainMetadata } from './domain.js';
import type { EntityInstance } from './entity-instance.js';
import type { EntitySchema } from './entity-schema.js';
import type { KnowledgeBase } from './knowledge-base.js';
import { clonePropertyValue, type PropertyValue } from './property-value.js';

export interface PropertyPrototypeRecord {
  readonly name: string;
  readonly defaultValue: PropertyValue;
  readonly unset: boolean;
  readonly domain: DomainMetadata | null;
  readonly domainDescription: string;
}

export interface DefinitionRecord {
  readonly className: string;
  readonly description: string;
  readonly requiredProperties: readonly string[];
  readonly verbNames: readonly string[];
  readonly properties: readonly PropertyPrototypeRecord[];
}

export interface InstanceRecord {
  readonly className: string;
  readonly objectId: string;
  readonly createdAt: string;
  readonly lastModified: string;
  readonly properties: Readonly<Record<string, PropertyValue>>;
  readonly metadata: Readonly<Record<string, PropertyValue>>;
}

export interface KnowledgeBaseRecord {
  readonly definitions: readonly DefinitionRecord[];
  readonly instances: readonly InstanceRecord[];
}

export function exportDefinition(schema: EntitySchema): DefinitionRecord {
  return {
    className: schema.className,
    description: schema.description,
    requiredProperties: [...schema.requiredProperties].sort(),
    verbNames: [...schema.verbNames].sort(),
    properties: schema.propertyPrototypes().map((cell) => ({
      name: cell.name,
      defaultValue: clonePropertyValue(cell.value),
      unset: cell.isUnset,
      domain: cell.domain === undefined ? null : describeDomainMetadata(cell.domain),
      domainDescription: cell.domain === undefined ? 'unconstrained' : describeDomain(cell.domain),
    })),
  };
}

export function exportInstance(instance: EntityInstance): InstanceRecord {
  const properties = Object.fromEntries(
    Object.entries(instance.propertyValues()).map(([name, value]): [string, PropertyValue] => [
      name,
      clonePropertyValue(value),
    ]),
  );
  const metadata = Object.fromEntries(
    [...instance.metadata.entries()]
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([key, value]): [string, PropertyValue] => [key, clonePropertyValue(value)]),
  );
  return {
    className: instance.className,
    objectId: instance.objectId,
    createdAt: instance.createdAt.toISOString(),
    lastModified: instance.lastModified.toISOString(),
    properties,
    metadata,
  };
}

/** Definitions by class name, instances by object id; nothing in the result aliases live state. */
export function exportKnowledgeBase(kb: KnowledgeBase): KnowledgeBaseRecord {
  return {
    definitions: kb.listDefinitions().map(exportDefinition),
    instances: kb
      .listInstances()
      .sort((left, right) => (left.objectId < right.objectId ? -1 : left.objectId > right.objectId ? 1 : 0))
      .map(exportInstance),
  };
}
