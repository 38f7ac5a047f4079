/**
 * Gate Logger - Decision Transparency
 *
 * Captures every load, verdict, revision and downgrade decision of a run
 * as structured entries. Entries are buffered in memory and fanned out to
 * subscribers (the console subscriber prints them).
 */

export type GateLogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly GateLogLevel[] = ['debug', 'info', 'warn', 'error'];

export type GateLogCategory =
  | 'CONFIG'
  | 'LOAD'
  | 'EVALUATION'
  | 'VERDICT'
  | 'REVISION'
  | 'DOWNGRADE'
  | 'EXPORT'
  | 'OUTPUT';

export interface GateLogEntry {
  timestamp: string;
  level: GateLogLevel;
  category: GateLogCategory;
  message: string;
  details?: Record<string, unknown>;
  draftId?: string;
}

export interface GateLogSubscriber {
  onLog(entry: GateLogEntry): void;
}

export function isLogLevel(value: unknown): value is GateLogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export function levelRank(level: GateLogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Format an entry as a single console line
 */
export function formatLogLine(entry: GateLogEntry): string {
  const prefix = `[draft-gate] ${entry.level.toUpperCase()} ${entry.category}`;
  return entry.draftId
    ? `${prefix} ${entry.draftId}: ${entry.message}`
    : `${prefix} ${entry.message}`;
}

/**
 * Prints entries at or above a minimum level
 */
export class ConsoleLogSubscriber implements GateLogSubscriber {
  private readonly minLevel: GateLogLevel;
  private readonly write: (line: string) => void;

  constructor(options: { minLevel?: GateLogLevel; write?: (line: string) => void } = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.write = options.write ?? (line => console.error(line));
  }

  onLog(entry: GateLogEntry): void {
    if (levelRank(entry.level) >= levelRank(this.minLevel)) {
      this.write(formatLogLine(entry));
    }
  }
}

export class GateLogger {
  private entries: GateLogEntry[] = [];
  private subscribers: Set<GateLogSubscriber> = new Set();
  private maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 5000;
  }

  log(
    level: GateLogLevel,
    category: GateLogCategory,
    message: string,
    options: {
      details?: Record<string, unknown>;
      draftId?: string;
    } = {}
  ): GateLogEntry {
    const entry: GateLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      draftId: options.draftId,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      subscriber.onLog(entry);
    }

    return entry;
  }

  // Convenience methods for each category

  logConfig(source: string, details: Record<string, unknown> = {}): GateLogEntry {
    return this.log('debug', 'CONFIG', `Configuration loaded from ${source}`, { details });
  }

  logDraftLoaded(draftId: string, file: string, defaultedFields: readonly string[]): GateLogEntry {
    const suffix = defaultedFields.length > 0 ? ` (defaulted: ${defaultedFields.join(', ')})` : '';
    return this.log('debug', 'LOAD', `Loaded from ${file}${suffix}`, {
      details: { file, defaultedFields: [...defaultedFields] },
      draftId,
    });
  }

  logFailedLoad(file: string, code: string, reason: string): GateLogEntry {
    return this.log('warn', 'LOAD', `Skipped ${file}: [${code}] ${reason}`, {
      details: { file, code, reason },
    });
  }

  logEvaluation(draftId: string, iteration: number, confidenceScore: number): GateLogEntry {
    return this.log('debug', 'EVALUATION', `Iteration ${iteration}: confidence ${confidenceScore}`, {
      details: { iteration, confidenceScore },
      draftId,
    });
  }

  logVerdict(draftId: string, verdict: string, iteration: number): GateLogEntry {
    return this.log('info', 'VERDICT', `${verdict} at iteration ${iteration}`, {
      details: { verdict, iteration },
      draftId,
    });
  }

  logRevision(draftId: string, applied: boolean, kinds: readonly string[]): GateLogEntry {
    return this.log(
      applied ? 'info' : 'warn',
      'REVISION',
      `${applied ? 'Applied' : 'No automatic fix for'}: ${kinds.join(', ')}`,
      { details: { applied, kinds: [...kinds] }, draftId }
    );
  }

  logDowngrade(draftId: string, variant: string): GateLogEntry {
    return this.log('warn', 'DOWNGRADE', `Still at REVISE after final iteration; downgraded to ${variant}`, {
      details: { variant },
      draftId,
    });
  }

  logExport(draftId: string, eligible: boolean): GateLogEntry {
    return this.log('info', 'EXPORT', eligible ? 'Export eligible' : 'Not export eligible', {
      details: { eligible },
      draftId,
    });
  }

  logOutput(filePath: string): GateLogEntry {
    return this.log('info', 'OUTPUT', `Wrote ${filePath}`, { details: { filePath } });
  }

  // Retrieval methods

  getAll(): GateLogEntry[] {
    return [...this.entries];
  }

  getByDraftId(draftId: string): GateLogEntry[] {
    return this.entries.filter(e => e.draftId === draftId);
  }

  getByCategory(category: GateLogCategory): GateLogEntry[] {
    return this.entries.filter(e => e.category === category);
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Subscribe to log events
   */
  subscribe(subscriber: GateLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }
}
