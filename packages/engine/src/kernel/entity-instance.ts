import { asEntityId, type ClassName, type EntityId } from './branded.js';
import { fnv1a64 } from './entity-hash.js';
import type { EntitySchema } from './entity-schema.js';
import { describeDomain } from './domain.js';
import { domainViolationError, unknownPropertyError } from './knowledge-error.js';
import type { PropertyCell } from './property-cell.js';
import {
  clonePropertyValue,
  encodePropertyValue,
  formatPropertyValue,
  isPropertyRecord,
  type PropertyRecord,
  type PropertyValue,
} from './property-value.js';
import { matchesCondition, type QueryCondition } from './query-condition.js';

export interface CanonicalEntity {
  readonly className: ClassName;
  readonly objectId: EntityId;
  readonly properties: readonly (readonly [string, PropertyValue])[];
}

export interface PropertyPath {
  readonly name: string;
  readonly key?: string;
}

/** `counters.poison` addresses key `poison` of the map-backed `counters`; only the first dot splits. */
export const parsePropertyPath = (path: string): PropertyPath => {
  const dot = path.indexOf('.');
  if (dot < 0) {
    return { name: path };
  }
  return { name: path.slice(0, dot), key: path.slice(dot + 1) };
};

export const encodeCanonicalEntity = (canonical: CanonicalEntity): string =>
  encodePropertyValue([
    canonical.className,
    canonical.objectId,
    canonical.properties.map(([name, value]) => [name, value]),
  ]);

export class EntityInstance {
  readonly schema: EntitySchema;
  readonly objectId: EntityId;
  readonly createdAt: Date;
  readonly metadata = new Map<string, PropertyValue>();
  private readonly cells: Map<string, PropertyCell>;
  private readonly clock: () => Date;
  private modifiedAt: Date;

  constructor(schema: EntitySchema, objectId: EntityId, cells: Map<string, PropertyCell>, clock: () => Date) {
    this.schema = schema;
    this.objectId = objectId;
    this.cells = cells;
    this.clock = clock;
    this.createdAt = clock();
    this.modifiedAt = this.createdAt;
  }

  get className(): ClassName {
    return this.schema.className;
  }

  get lastModified(): Date {
    return this.modifiedAt;
  }

  hasProperty(name: string): boolean {
    return this.cells.has(name);
  }

  getProperty(name: string): PropertyValue | undefined {
    return this.cells.get(name)?.value;
  }

  getPropertyPath(path: string): PropertyValue | undefined {
    const { name, key } = parsePropertyPath(path);
    if (key === undefined) {
      return this.getProperty(name);
    }
    const cell = this.cells.get(name);
    if (cell === undefined || !cell.isMapBacked()) {
      return undefined;
    }
    return cell.getEntry(key);
  }

  setProperty(name: string, value: PropertyValue): void {
    this.requireCell(name).setValue(value);
    this.touch();
  }

  /** Writes one property or one entry of a map-backed property. */
  setPropertyPath(path: string, value: PropertyValue): void {
    const { name, key } = parsePropertyPath(path);
    if (key === undefined) {
      this.setProperty(name, value);
      return;
    }
    this.requireCell(name).put(key, value);
    this.touch();
  }

  /** Removes a map entry; a plain path resets nothing and returns false. */
  removePropertyPath(path: string): boolean {
    const { name, key } = parsePropertyPath(path);
    const cell = this.requireCell(name);
    if (key === undefined) {
      return false;
    }
    const removed = cell.removeKey(key);
    if (removed) {
      this.touch();
    }
    return removed;
  }

  /**
   * Puts back a value read earlier through `getPropertyPath`; `undefined` removes the map entry.
   * Bypasses domain checks, so only undo logs should call it.
   */
  restorePropertyPath(path: string, previous: PropertyValue | undefined): void {
    const { name, key } = parsePropertyPath(path);
    const cell = this.requireCell(name);
    if (key === undefined) {
      cell.restore(previous ?? null);
    } else {
      const current = isPropertyRecord(cell.value) ? cell.value : {};
      const remaining = Object.fromEntries(Object.entries(current).filter(([entryKey]) => entryKey !== key));
      cell.restore(previous === undefined ? remaining : { ...remaining, [key]: previous });
    }
    this.touch();
  }

  /**
   * All-or-nothing: every entry is checked against its cell before any is written.
   */
  updateProperties(updates: PropertyRecord): void {
    const staged: (readonly [PropertyCell, PropertyValue])[] = [];
    for (const [name, value] of Object.entries(updates)) {
      const cell = this.requireCell(name);
      if (!cell.accepts(value)) {
        const domain = cell.domain === undefined ? 'unconstrained' : describeDomain(cell.domain);
        throw domainViolationError(name, value, domain, formatPropertyValue(value));
      }
      staged.push([cell, value]);
    }
    if (staged.length === 0) {
      return;
    }
    for (const [cell, value] of staged) {
      cell.setValue(value);
    }
    this.touch();
  }

  matches(query: QueryCondition): boolean {
    return matchesCondition(this.getPropertyPath(query.prop), query);
  }

  /** Removes every reference to a deleted instance; see `PropertyCell.dropReference`. */
  dropReferencesTo(objectId: string): boolean {
    let changed = false;
    for (const cell of this.cells.values()) {
      changed = cell.dropReference(objectId) || changed;
    }
    if (changed) {
      this.touch();
    }
    return changed;
  }

  propertyValues(): Record<string, PropertyValue> {
    return Object.fromEntries(
      [...this.cells.entries()]
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
        .map(([name, cell]): [string, PropertyValue] => [name, cell.value]),
    );
  }

  toCanonicalForm(): CanonicalEntity {
    return {
      className: this.className,
      objectId: this.objectId,
      properties: Object.entries(this.propertyValues()),
    };
  }

  equals(other: EntityInstance): boolean {
    return encodeCanonicalEntity(this.toCanonicalForm()) === encodeCanonicalEntity(other.toCanonicalForm());
  }

  hashCode(): bigint {
    return fnv1a64(encodeCanonicalEntity(this.toCanonicalForm()));
  }

  copy(newObjectId: string): EntityInstance {
    const cells = new Map<string, PropertyCell>();
    for (const [name, cell] of this.cells) {
      cells.set(name, cell.copy());
    }
    const duplicate = new EntityInstance(this.schema, asEntityId(newObjectId), cells, this.clock);
    for (const [key, value] of this.metadata) {
      duplicate.metadata.set(key, clonePropertyValue(value));
    }
    return duplicate;
  }

  private requireCell(name: string): PropertyCell {
    const cell = this.cells.get(name);
    if (cell === undefined) {
      throw unknownPropertyError(this.className, name, this.schema.propertyNames);
    }
    return cell;
  }

  private touch(): void {
    this.modifiedAt = this.clock();
  }
}
