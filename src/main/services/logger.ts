/**
 * Logger Service for metadata lookups
 *
 * Structured logging with optional file output, log levels and LookupError
 * integration. Every entry can carry the containing set and item it refers to,
 * so a set's lookup history can be pulled back out of the log.
 *
 * Log levels: ERROR (lookup failures), WARN (misses and skipped enrichment), INFO (progress)
 *
 * Default log directory: %APPDATA%/media-metadata-lookup/logs/
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LookupError, isLookupError, ErrorCategory, errorMessage } from './errors';
import type { ContainingSetRef } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** Optional context attached to a log entry */
export interface LogContext {
  category?: ErrorCategory;
  /** Reference of the containing set */
  setRef?: string;
  /** Description of the item being looked up */
  item?: string;
  /** Name of the component that wrote the entry */
  source?: string;
  /** Original error message */
  cause?: string;
}

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  category: ErrorCategory | null;
  setRef: string | null;
  item: string | null;
  source: string | null;
  cause: string | null;
}

/**
 * Logging collaborator injected into metadata sources.
 * Writes a message in the context of the set that owns the looked-up item.
 */
export interface ItemLogger {
  logForItem(set: ContainingSetRef, message: string, context?: LogContext & { level?: LogLevel }): void;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to %APPDATA%/media-metadata-lookup/logs/ */
  logDir?: string;
  /** Minimum log level to write (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Summary of log entries */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  /** Breakdown of errors by category */
  errorsByCategory: Record<string, number>;
  /** Log file path (if file logging is enabled) */
  logFilePath: string | null;
}

/** Filter options for retrieving log entries */
export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  /** Exact containing set reference */
  setRef?: string;
  /** Component name */
  source?: string;
  /** Maximum number of entries to return (most recent kept) */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'media-metadata-lookup';

const LOG_DIR_NAME = 'logs';

/** Default maximum log file size (10MB) */
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

/** Context fields written as `| key: value` suffixes, in output order */
const CONTEXT_FIELDS = ['setRef', 'item', 'source', 'cause'] as const;

type ContextField = (typeof CONTEXT_FIELDS)[number];

const CONTEXT_LABELS: Record<ContextField, string> = {
  setRef: 'set',
  item: 'item',
  source: 'source',
  cause: 'cause',
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path based on the platform.
 * On Windows: %APPDATA%/media-metadata-lookup/logs/
 * On other platforms: ~/.config/media-metadata-lookup/logs/
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename from a Date object.
 * Format: YYYY-MM-DD.log
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Renders a containing set reference for log output: `name (id)` or just `id`.
 */
export function formatSetRef(set: ContainingSetRef): string {
  return set.name ? `${set.name} (${set.id})` : set.id;
}

/**
 * Formats a LogEntry as a single-line string for file output.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | set: ... | item: ... | source: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];

  parts.push(`[${entry.timestamp}]`);
  parts.push(entry.level);

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  for (const field of CONTEXT_FIELDS) {
    const value = entry[field];
    if (value) {
      parts.push(`| ${CONTEXT_LABELS[field]}: ${value}`);
    }
  }

  return parts.join(' ');
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

function isErrorCategory(value: string | undefined): value is ErrorCategory {
  return (
    value === 'TransportError' ||
    value === 'ResponseFormatError' ||
    value === 'CacheError' ||
    value === 'ContractError'
  );
}

/**
 * Parses a formatted log line back into a LogEntry object.
 * Returns null for lines that can't be parsed.
 */
export function parseLogLine(line: string): LogEntry | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const mainMatch = trimmed.match(/^\[([^\]]+)\]\s+(ERROR|WARN|INFO)\s+(?:\[([^\]]+)\]\s+)?(.*)$/);
  if (!mainMatch) return null;

  const timestamp = mainMatch[1];
  const level = mainMatch[2];
  if (!isLogLevel(level)) return null;
  const category = isErrorCategory(mainMatch[3]) ? mainMatch[3] : null;
  let rest = mainMatch[4];

  const context: Record<ContextField, string | null> = {
    setRef: null,
    item: null,
    source: null,
    cause: null,
  };

  for (const field of CONTEXT_FIELDS) {
    const pattern = new RegExp(`\\|\\s*${CONTEXT_LABELS[field]}:\\s*(.+?)(?=\\s*\\| \\w+:|$)`);
    const match = rest.match(pattern);
    if (match) {
      context[field] = match[1].trim();
      rest = rest.replace(match[0], '');
    }
  }

  return {
    timestamp,
    level,
    message: rest.trim(),
    category,
    ...context,
  };
}

/**
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a LookupError.
 *
 * @param error - The LookupError to convert
 * @param level - The log level (defaults to ERROR)
 * @param getCurrentDate - Optional clock (for testing)
 */
export function createLogEntryFromError(
  error: LookupError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    setRef: null,
    item: error.item,
    source: null,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a plain message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: context?.category ?? null,
    setRef: context?.setRef ?? null,
    item: context?.item ?? null,
    source: context?.source ?? null,
    cause: context?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for metadata lookups.
 *
 * Supports:
 * - File output (daily-rotated log files)
 * - In-memory log storage
 * - Per-set logging through the ItemLogger interface
 * - LookupError integration
 * - Log level filtering and summaries
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.logForItem({ id: 'set-1' }, 'Online retrieval failed', { level: 'WARN', source: 'ApiMetadataSource' });
 * ```
 */
export class Logger implements ItemLogger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly writeToFile: boolean;
  private readonly maxFileSize: number;
  private readonly getCurrentDate: () => Date;

  private entries: LogEntry[] = [];

  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. Must be called before logging to files.
   * If the directory cannot be created, file logging is skipped and a WARN
   * entry is kept in memory.
   */
  async initialize(): Promise<void> {
    if (!this.writeToFile) {
      this.initialized = true;
      return;
    }

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      this.initialized = true;
    } catch (error: unknown) {
      this.initialized = true;
      this.entries.push(
        createLogEntry(
          'WARN',
          `Failed to create log directory "${this.logDir}": ${errorMessage(error)}. File logging disabled.`,
          undefined,
          this.getCurrentDate,
        ),
      );
    }
  }

  /**
   * Returns the current log file path based on today's date.
   */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  getLogDir(): string {
    return this.logDir;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  /**
   * Logs a message against the set that owns the item being processed.
   * Level defaults to INFO.
   */
  logForItem(set: ContainingSetRef, message: string, context?: LogContext & { level?: LogLevel }): void {
    const level = context?.level ?? 'INFO';
    this.log(level, message, {
      category: context?.category,
      item: context?.item,
      source: context?.source,
      cause: context?.cause,
      setRef: formatSetRef(set),
    });
  }

  /**
   * Logs a LookupError with its category, item and cause.
   */
  logLookupError(error: LookupError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any thrown value. LookupErrors keep their context; anything else
   * becomes a generic ERROR entry.
   */
  logError(error: unknown, context?: LogContext): void {
    if (isLookupError(error)) {
      this.logLookupError(error);
      return;
    }

    this.error(errorMessage(error), {
      ...context,
      cause: error instanceof Error ? error.message : undefined,
    });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;

    this.addEntry(createLogEntry(level, message, context, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.writeToFile && this.initialized) {
      this.writeEntryToFile(entry);
    }
  }

  /**
   * Appends an entry to the current log file, rotating it once it exceeds
   * maxFileSize. Write failures never propagate to the caller.
   */
  private writeEntryToFile(entry: LogEntry): void {
    try {
      const logFilePath = this.getLogFilePath();
      const formatted = formatLogEntry(entry) + '\n';

      if (fs.existsSync(logFilePath)) {
        const stats = fs.statSync(logFilePath);
        if (stats.size >= this.maxFileSize) {
          this.rotateLogFile(logFilePath);
        }
      }

      const dir = path.dirname(logFilePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      fs.appendFileSync(logFilePath, formatted, 'utf-8');
    } catch (error: unknown) {
      // Keep the failure visible in memory only; writing it would recurse.
      this.entries.push(
        createLogEntry('WARN', `Failed to write log file: ${errorMessage(error)}`, undefined, this.getCurrentDate),
      );
    }
  }

  /**
   * Rotates a log file by renaming it with a numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /**
   * Returns in-memory log entries, optionally filtered.
   */
  getEntries(filter?: LogFilter): LogEntry[] {
    let entries = [...this.entries];

    if (filter?.level) {
      entries = entries.filter((e) => e.level === filter.level);
    }

    if (filter?.category) {
      entries = entries.filter((e) => e.category === filter.category);
    }

    if (filter?.setRef) {
      entries = entries.filter((e) => e.setRef === filter.setRef);
    }

    if (filter?.source) {
      entries = entries.filter((e) => e.source === filter.source);
    }

    if (filter?.limit && filter.limit > 0) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  /**
   * Returns every entry logged for a containing set.
   */
  getEntriesForSet(set: ContainingSetRef): LogEntry[] {
    return this.getEntries({ setRef: formatSetRef(set) });
  }

  getErrors(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'ERROR', limit });
  }

  getWarnings(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'WARN', limit });
  }

  getSummary(): LogSummary {
    const errorsByCategory: Record<string, number> = {};

    let errorCount = 0;
    let warnCount = 0;
    let infoCount = 0;

    for (const entry of this.entries) {
      switch (entry.level) {
        case 'ERROR':
          errorCount++;
          if (entry.category) {
            errorsByCategory[entry.category] = (errorsByCategory[entry.category] || 0) + 1;
          }
          break;
        case 'WARN':
          warnCount++;
          break;
        case 'INFO':
          infoCount++;
          break;
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount,
      warnCount,
      infoCount,
      errorsByCategory,
      logFilePath: this.writeToFile ? this.getLogFilePath() : null,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  // ─── File Methods ──────────────────────────────────────────────────

  /**
   * Reads and parses a log file (defaults to today's log).
   * A missing file reads as an empty log.
   */
  async readLogFile(logFilePath?: string): Promise<LogEntry[]> {
    const filePath = logFilePath ?? this.getLogFilePath();

    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: LogEntry[] = [];
    for (const line of content.split('\n')) {
      const parsed = parseLogLine(line);
      if (parsed) {
        entries.push(parsed);
      }
    }
    return entries;
  }

  /**
   * Clears all in-memory log entries. Does NOT delete log files.
   */
  clear(): void {
    this.entries = [];
  }
}
