import type { EntityId } from './branded.js';
import { parsePropertyPath, type EntityInstance } from './entity-instance.js';
import { unknownPropertyError } from './knowledge-error.js';
import type { PropertyRecord, PropertyValue } from './property-value.js';
import { requireTarget, type VerbValueScope } from './verb-value.js';

/**
 * `apply` writes through to instances and the undo log, `preview` records predicted writes
 * in an overlay, `probe` only reads (availability checks).
 */
export type VerbExecutionMode = 'apply' | 'preview' | 'probe';

/** Which instances an effect or cost acts on; `targets` fans out over every bound target. */
export type VerbSubject = 'source' | 'target' | 'targets';

export interface VerbSubjectSelector {
  readonly on?: VerbSubject;
  readonly index?: number;
}

export interface PropertyChange {
  readonly objectId: EntityId;
  readonly path: string;
  readonly previous: PropertyValue | undefined;
  readonly next: PropertyValue;
}

export interface EmittedVerbEvent {
  readonly type: string;
  readonly payload: PropertyRecord;
}

export interface UndoEntry {
  readonly instance: EntityInstance;
  readonly path: string;
  readonly previous: PropertyValue | undefined;
}

export interface VerbExecutionContextInit {
  readonly mode: VerbExecutionMode;
  readonly verb: string;
  readonly source: EntityInstance;
  readonly targets: readonly EntityInstance[];
  readonly bindings: Readonly<Record<string, PropertyValue>>;
  readonly undoLog?: UndoEntry[];
}

const overlayKey = (instance: EntityInstance, path: string): string => `${instance.objectId}\u0000${path}`;

export class VerbExecutionContext implements VerbValueScope {
  readonly mode: VerbExecutionMode;
  readonly verb: string;
  readonly source: EntityInstance;
  readonly targets: readonly EntityInstance[];
  readonly bindings: Readonly<Record<string, PropertyValue>>;
  readonly changes: PropertyChange[] = [];
  readonly events: EmittedVerbEvent[] = [];
  private readonly undoLog: UndoEntry[] | undefined;
  private readonly overlay = new Map<string, PropertyValue>();

  constructor(init: VerbExecutionContextInit) {
    this.mode = init.mode;
    this.verb = init.verb;
    this.source = init.source;
    this.targets = init.targets;
    this.bindings = init.bindings;
    this.undoLog = init.undoLog;
  }

  /** Reads through any writes this preview has already predicted. */
  read(instance: EntityInstance, path: string): PropertyValue | undefined {
    const key = overlayKey(instance, path);
    if (this.overlay.has(key)) {
      return this.overlay.get(key);
    }
    return instance.getPropertyPath(path);
  }

  subjects(selector: VerbSubjectSelector, fallback: VerbSubject): readonly EntityInstance[] {
    const on = selector.on ?? fallback;
    switch (on) {
      case 'source':
        return [this.source];
      case 'target':
        return [requireTarget(this, selector.index ?? 0)];
      case 'targets':
        return this.targets;
      default: {
        const _exhaustive: never = on;
        return _exhaustive;
      }
    }
  }

  change(instance: EntityInstance, path: string, value: PropertyValue): void {
    const { name } = parsePropertyPath(path);
    if (!instance.hasProperty(name)) {
      throw unknownPropertyError(instance.className, name, instance.schema.propertyNames);
    }
    if (this.mode === 'probe') {
      return;
    }

    const previous = this.read(instance, path);
    if (this.mode === 'apply') {
      instance.setPropertyPath(path, value);
      this.undoLog?.push({ instance, path, previous });
    } else {
      this.overlay.set(overlayKey(instance, path), value);
    }
    this.changes.push({ objectId: instance.objectId, path, previous, next: value });
  }

  emit(type: string, payload: PropertyRecord): void {
    if (this.mode === 'probe') {
      return;
    }
    this.events.push({ type, payload });
  }
}
