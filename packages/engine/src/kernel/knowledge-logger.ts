// ---------------------------------------------------------------------------
// Log entry shapes
// ---------------------------------------------------------------------------

export interface DefinitionRegisteredLogEntry {
  readonly className: string;
  readonly propertyCount: number;
  readonly replaced: boolean;
}

export interface InstanceCreatedLogEntry {
  readonly className: string;
  readonly objectId: string;
}

export interface VerbExecutedLogEntry {
  readonly verb: string;
  readonly sourceId: string;
  readonly targetIds: readonly string[];
  readonly outcome: 'executed' | 'fizzled';
}

export interface EventIngestedLogEntry {
  readonly kind: string;
  readonly modelled: boolean;
}

export interface IngestionFailureLogEntry {
  readonly kind: string;
  readonly message: string;
}

// ---------------------------------------------------------------------------
// Console abstraction (for testing)
// ---------------------------------------------------------------------------

export interface LoggerConsole {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

// ---------------------------------------------------------------------------
// Logger interface
// ---------------------------------------------------------------------------

export interface KnowledgeLogger {
  readonly enabled: boolean;
  setEnabled(enabled: boolean): void;
  logDefinitionRegistered(entry: DefinitionRegisteredLogEntry): void;
  logInstanceCreated(entry: InstanceCreatedLogEntry): void;
  logVerbExecuted(entry: VerbExecutedLogEntry): void;
  logEventIngested(entry: EventIngestedLogEntry): void;
  /** Always written, whether or not the logger is enabled. */
  logIngestionFailure(entry: IngestionFailureLogEntry): void;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateKnowledgeLoggerOptions {
  readonly console?: LoggerConsole;
  readonly enabled?: boolean;
}

export function createKnowledgeLogger(options?: CreateKnowledgeLoggerOptions): KnowledgeLogger {
  const cons: LoggerConsole = options?.console ?? globalThis.console;
  let enabled = options?.enabled ?? false;

  return {
    get enabled(): boolean {
      return enabled;
    },

    setEnabled(value: boolean): void {
      enabled = value;
    },

    logDefinitionRegistered(entry: DefinitionRegisteredLogEntry): void {
      if (!enabled) return;
      const verb = entry.replaced ? 'Replaced' : 'Registered';
      cons.log(`[KbDefinition] ${verb} ${entry.className} (${entry.propertyCount} properties)`);
    },

    logInstanceCreated(entry: InstanceCreatedLogEntry): void {
      if (!enabled) return;
      cons.log(`[KbInstance] Created ${entry.objectId} of ${entry.className}`);
    },

    logVerbExecuted(entry: VerbExecutedLogEntry): void {
      if (!enabled) return;
      const targets = entry.targetIds.length === 0 ? 'no targets' : entry.targetIds.join(', ');
      cons.log(`[KbVerb] ${entry.verb} ${entry.outcome} source=${entry.sourceId} targets=${targets}`);
    },

    logEventIngested(entry: EventIngestedLogEntry): void {
      if (!enabled) return;
      cons.log(`[KbEvent] ${entry.kind}${entry.modelled ? '' : ' (not modelled)'}`);
    },

    logIngestionFailure(entry: IngestionFailureLogEntry): void {
      cons.warn(`[KbEvent] Failed to ingest ${entry.kind}: ${entry.message}`);
    },
  };
}

/** Discards everything, warnings included. */
export const silentKnowledgeLogger: KnowledgeLogger = createKnowledgeLogger({
  console: { log: () => undefined, warn: () => undefined },
  enabled: false,
});
