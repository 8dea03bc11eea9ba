import type { VerbInstanceId } from './branded.js';
import type { EntityInstance } from './entity-instance.js';
import type { KnowledgeBase } from './knowledge-base.js';
import type { PropertyValue } from './property-value.js';
import {
  VerbExecutionContext,
  type EmittedVerbEvent,
  type PropertyChange,
  type UndoEntry,
} from './verb-context.js';
import { applyVerbCost, canPayVerbCosts } from './verb-costs.js';
import type { VerbDefinition } from './verb-definition.js';
import { applyVerbEffects } from './verb-effects.js';

export type VerbApplyOutcome = 'executed' | 'fizzled' | 'alreadyExecuted';

export interface VerbPreview {
  readonly changes: readonly PropertyChange[];
  readonly events: readonly EmittedVerbEvent[];
}

export interface VerbInstanceInit {
  readonly id: VerbInstanceId;
  readonly definition: VerbDefinition;
  readonly source: EntityInstance;
  readonly targets: readonly EntityInstance[];
  readonly bindings: Readonly<Record<string, PropertyValue>>;
  readonly timestamp: Date;
}

/**
 * A verb bound to a source, targets and resolved variables. `apply` runs at most once until
 * `undo` puts the touched instances back and makes it runnable again.
 */
export class VerbInstance {
  readonly id: VerbInstanceId;
  readonly definition: VerbDefinition;
  readonly source: EntityInstance;
  readonly targets: readonly EntityInstance[];
  readonly bindings: Readonly<Record<string, PropertyValue>>;
  readonly timestamp: Date;
  private undoLog: UndoEntry[] = [];
  private executedFlag = false;
  private counteredFlag = false;
  private replacedFlag = false;
  private fizzledFlag = false;

  constructor(init: VerbInstanceInit) {
    this.id = init.id;
    this.definition = init.definition;
    this.source = init.source;
    this.targets = [...init.targets];
    this.bindings = { ...init.bindings };
    this.timestamp = init.timestamp;
  }

  get name(): string {
    return this.definition.name;
  }

  get executed(): boolean {
    return this.executedFlag;
  }

  get countered(): boolean {
    return this.counteredFlag;
  }

  get replaced(): boolean {
    return this.replacedFlag;
  }

  get fizzled(): boolean {
    return this.fizzledFlag;
  }

  /** Number of writes `undo` would revert. */
  get pendingUndoCount(): number {
    return this.undoLog.length;
  }

  apply(kb: KnowledgeBase): VerbApplyOutcome {
    if (this.executedFlag) {
      return 'alreadyExecuted';
    }

    if (!canPayVerbCosts(this.definition.costs, this.createContext('preview'))) {
      this.fizzledFlag = true;
      return 'fizzled';
    }

    const ctx = this.createContext('apply', this.undoLog);
    try {
      for (const cost of this.definition.costs) {
        applyVerbCost(cost, ctx);
      }
      applyVerbEffects(this.definition.effects, ctx);
    } catch (error) {
      this.revert();
      throw error;
    }

    for (const event of ctx.events) {
      kb.recordEvent(event.type, event.payload);
    }
    this.fizzledFlag = false;
    this.executedFlag = true;
    return 'executed';
  }

  undo(): void {
    this.revert();
    this.executedFlag = false;
    this.counteredFlag = false;
    this.replacedFlag = false;
    this.fizzledFlag = false;
  }

  /** Predicted writes and events; costs are skipped and nothing is mutated or logged. */
  preview(_kb: KnowledgeBase): VerbPreview {
    const ctx = this.createContext('preview');
    applyVerbEffects(this.definition.effects, ctx);
    return { changes: [...ctx.changes], events: [...ctx.events] };
  }

  private createContext(mode: 'apply' | 'preview', undoLog?: UndoEntry[]): VerbExecutionContext {
    return new VerbExecutionContext({
      mode,
      verb: this.definition.name,
      source: this.source,
      targets: this.targets,
      bindings: this.bindings,
      ...(undoLog === undefined ? {} : { undoLog }),
    });
  }

  private revert(): void {
    for (let index = this.undoLog.length - 1; index >= 0; index -= 1) {
      const entry = this.undoLog[index];
      if (entry !== undefined) {
        entry.instance.restorePropertyPath(entry.path, entry.previous);
      }
    }
    this.undoLog = [];
  }
}
