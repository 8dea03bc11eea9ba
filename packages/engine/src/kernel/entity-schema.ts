import { asClassName, asEntityId, type ClassName } from './branded.js';
import {
  booleanDomain,
  enumDomain,
  intDomain,
  isValidDomainValue,
  listDomain,
  mapDomain,
  realDomain,
  referenceDomain,
  textDomain,
  type Domain,
  type InstanceDirectory,
  type ListDomainOptions,
  type MapDomainOptions,
  type RealDomainOptions,
  type TextDomainOptions,
} from './domain.js';
import { EntityInstance } from './entity-instance.js';
import { definitionInvalidError } from './knowledge-error.js';
import { PropertyCell } from './property-cell.js';
import type { PropertyRecord, PropertyValue } from './property-value.js';

export interface EntitySchemaInit {
  readonly className: string;
  readonly description?: string;
  readonly properties: readonly PropertyCell[];
  readonly requiredProperties?: readonly string[];
  readonly verbNames?: readonly string[];
}

export interface CreateInstanceOptions {
  readonly clock?: () => Date;
}

const systemClock = (): Date => new Date();

/**
 * Immutable prototype for one class of modelled object. Instances get independent copies of
 * the prototype cells, so nothing done to an instance reaches the schema or its siblings.
 */
export class EntitySchema {
  readonly className: ClassName;
  readonly description: string;
  readonly requiredProperties: ReadonlySet<string>;
  readonly verbNames: ReadonlySet<string>;
  private readonly prototypes: ReadonlyMap<string, PropertyCell>;

  constructor(init: EntitySchemaInit) {
    if (init.className.length === 0) {
      throw definitionInvalidError(init.className, 'class name must not be empty');
    }
    const prototypes = new Map<string, PropertyCell>();
    for (const cell of init.properties) {
      prototypes.set(cell.name, cell.copy());
    }
    for (const required of init.requiredProperties ?? []) {
      if (!prototypes.has(required)) {
        throw definitionInvalidError(init.className, `required property '${required}' not defined`);
      }
    }

    this.className = asClassName(init.className);
    this.description = init.description ?? '';
    this.prototypes = prototypes;
    this.requiredProperties = new Set(init.requiredProperties ?? []);
    this.verbNames = new Set(init.verbNames ?? []);
  }

  get propertyNames(): readonly string[] {
    return [...this.prototypes.keys()].sort();
  }

  hasProperty(name: string): boolean {
    return this.prototypes.has(name);
  }

  /** A detached copy; writing to it never affects the schema. */
  getPropertyPrototype(name: string): PropertyCell | undefined {
    return this.prototypes.get(name)?.copy();
  }

  propertyPrototypes(): readonly PropertyCell[] {
    return this.propertyNames.flatMap((name) => {
      const cell = this.prototypes.get(name);
      return cell === undefined ? [] : [cell.copy()];
    });
  }

  isValidPropertyValue(name: string, value: unknown): boolean {
    const prototype = this.prototypes.get(name);
    if (prototype === undefined) {
      return false;
    }
    return prototype.domain === undefined || isValidDomainValue(prototype.domain, value);
  }

  hasVerb(name: string): boolean {
    return this.verbNames.has(name);
  }

  createInstance(objectId: string, options: CreateInstanceOptions = {}): EntityInstance {
    const cells = new Map<string, PropertyCell>();
    for (const [name, prototype] of this.prototypes) {
      cells.set(name, prototype.copy());
    }
    return new EntityInstance(this, asEntityId(objectId), cells, options.clock ?? systemClock);
  }
}

export class EntitySchemaBuilder {
  private readonly className: string;
  private description = '';
  private readonly properties = new Map<string, PropertyCell>();
  private readonly requiredProperties = new Set<string>();
  private readonly verbNames = new Set<string>();

  constructor(className: string) {
    this.className = className;
  }

  describe(description: string): this {
    this.description = description;
    return this;
  }

  addProperty(name: string, defaultValue: PropertyValue, domain?: Domain): this {
    this.properties.set(name, new PropertyCell(name, defaultValue, domain));
    return this;
  }

  addBooleanProperty(name: string, defaultValue: boolean): this {
    return this.addProperty(name, defaultValue, booleanDomain());
  }

  addIntProperty(name: string, defaultValue: number, min?: number, max?: number): this {
    return this.addProperty(name, defaultValue, intDomain(min, max));
  }

  addRealProperty(name: string, defaultValue: number, options?: RealDomainOptions): this {
    return this.addProperty(name, defaultValue, realDomain(options));
  }

  addTextProperty(name: string, defaultValue: string, options?: TextDomainOptions): this {
    return this.addProperty(name, defaultValue, textDomain(options));
  }

  addEnumProperty(name: string, defaultValue: PropertyValue, values: readonly PropertyValue[]): this {
    return this.addProperty(name, defaultValue, enumDomain(values));
  }

  addListProperty(
    name: string,
    defaultValue: readonly PropertyValue[],
    allowed: readonly PropertyValue[],
    options?: ListDomainOptions,
  ): this {
    return this.addProperty(name, [...defaultValue], listDomain(allowed, options));
  }

  addMapProperty(name: string, defaultValue: PropertyRecord, options?: MapDomainOptions): this {
    return this.addProperty(name, { ...defaultValue }, mapDomain(options));
  }

  /**
   * Reference cells start out unset: the referenced instance rarely exists yet while
   * schemas are being registered.
   */
  addReferenceProperty(name: string, pattern: string, directory: InstanceDirectory): this {
    this.properties.set(name, PropertyCell.unset(name, referenceDomain(pattern, directory)));
    return this;
  }

  requireProperty(name: string): this {
    this.requiredProperties.add(name);
    return this;
  }

  allowVerb(name: string): this {
    this.verbNames.add(name);
    return this;
  }

  build(): EntitySchema {
    return new EntitySchema({
      className: this.className,
      description: this.description,
      properties: [...this.properties.values()],
      requiredProperties: [...this.requiredProperties],
      verbNames: [...this.verbNames],
    });
  }
}
