import { describeDomain, isValidDomainValue, type Domain } from './domain.js';
import { domainViolationError, mapPropertyRequiredError, type KnowledgeErrorContext } from './knowledge-error.js';
import {
  clonePropertyValue,
  formatPropertyValue,
  isPropertyRecord,
  isPropertyValue,
  type PropertyRecord,
  type PropertyValue,
} from './property-value.js';

type MapOperation = KnowledgeErrorContext<'MAP_PROPERTY_REQUIRED'>['operation'];

export interface PropertyCellOptions {
  /** Starts the cell at null without validating it; the first write must satisfy the domain. */
  readonly unset?: boolean;
}

/**
 * A named value holder. When a domain is set, the held value satisfies it at all times
 * (apart from an unset cell's initial null): every write is validated before it lands.
 */
export class PropertyCell {
  readonly name: string;
  readonly domain: Domain | undefined;
  private current: PropertyValue;

  constructor(name: string, value: PropertyValue, domain?: Domain, options: PropertyCellOptions = {}) {
    this.name = name;
    this.domain = domain;
    if (!(options.unset === true && value === null)) {
      this.assertAccepted(value);
    }
    this.current = value;
  }

  static unset(name: string, domain: Domain): PropertyCell {
    return new PropertyCell(name, null, domain, { unset: true });
  }

  get isUnset(): boolean {
    return this.current === null && !this.accepts(null);
  }

  get value(): PropertyValue {
    return this.current;
  }

  /** Only finite numbers are property values, with or without a domain. */
  accepts(value: unknown): boolean {
    return isPropertyValue(value) && (this.domain === undefined || isValidDomainValue(this.domain, value));
  }

  setValue(value: PropertyValue): void {
    this.assertAccepted(value);
    this.current = value;
  }

  /**
   * Reinstates a value the cell held earlier without re-validating it. Undo is the only
   * caller: a reference may have gone stale or an unset cell may return to null.
   */
  restore(value: PropertyValue): void {
    this.current = value;
  }

  /**
   * Forgets `objectId` wherever the domain says the cell references instances: a reference
   * cell goes back to unset, reference lists and maps lose the matching elements and entries.
   * Returns whether anything changed.
   */
  dropReference(objectId: string): boolean {
    const domain = this.domain;
    if (domain === undefined) {
      return false;
    }
    if (domain.kind === 'reference') {
      if (this.current !== objectId) {
        return false;
      }
      this.current = null;
      return true;
    }
    if (domain.kind === 'list' && domain.elementDomain?.kind === 'reference' && Array.isArray(this.current)) {
      const kept = this.current.filter((item) => item !== objectId);
      if (kept.length === this.current.length) {
        return false;
      }
      this.current = kept;
      return true;
    }
    if (domain.kind === 'map' && domain.valueDomain?.kind === 'reference' && isPropertyRecord(this.current)) {
      const entries = Object.entries(this.current);
      const kept = entries.filter(([, value]) => value !== objectId);
      if (kept.length === entries.length) {
        return false;
      }
      this.current = Object.fromEntries(kept);
      return true;
    }
    return false;
  }

  isMapBacked(): boolean {
    return isPropertyRecord(this.current) && (this.domain === undefined || this.domain.kind === 'map');
  }

  getEntry(key: string): PropertyValue | undefined {
    const map = this.currentMap('path');
    return Object.hasOwn(map, key) ? map[key] : undefined;
  }

  put(key: string, value: PropertyValue): void {
    this.commitMap({ ...this.currentMap('put'), [key]: value });
  }

  putAll(entries: PropertyRecord): void {
    this.commitMap({ ...this.currentMap('putAll'), ...entries });
  }

  /** Returns false when the key was absent; the map is left untouched in that case. */
  removeKey(key: string): boolean {
    const map = this.currentMap('removeKey');
    if (!Object.hasOwn(map, key)) {
      return false;
    }
    this.commitMap(Object.fromEntries(Object.entries(map).filter(([entryKey]) => entryKey !== key)));
    return true;
  }

  clearMap(): void {
    this.currentMap('clearMap');
    this.commitMap({});
  }

  copy(): PropertyCell {
    const value = clonePropertyValue(this.current);
    // The copied value was accepted when written; a reference may since have gone stale.
    const cell = new PropertyCell(this.name, null, this.domain, { unset: true });
    cell.current = value;
    return cell;
  }

  private currentMap(operation: MapOperation): PropertyRecord {
    if (!this.isMapBacked() || !isPropertyRecord(this.current)) {
      throw mapPropertyRequiredError(this.name, operation);
    }
    return this.current;
  }

  private commitMap(next: PropertyRecord): void {
    this.assertAccepted(next);
    this.current = next;
  }

  private assertAccepted(value: unknown): void {
    if (!this.accepts(value)) {
      const domain = this.domain === undefined ? 'unconstrained' : describeDomain(this.domain);
      throw domainViolationError(this.name, value, domain, formatPropertyValue(value));
    }
  }
}
