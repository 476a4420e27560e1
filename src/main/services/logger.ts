/**
 * Logger Service
 *
 * Structured logging with in-memory entries, daily log files and size-based
 * rotation. Integrates with PipelineError so every failure is logged with its
 * kind and candidate id.
 *
 * Log levels: ERROR (unit failures), WARN (skipped units, degraded probes), INFO (progress)
 *
 * Default log directory: %APPDATA%/master-dispatch/logs/ (~/.config elsewhere)
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineError, isPipelineError } from './errors';
import type { ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** Candidate being processed (if applicable) */
  candidateId: string | null;
  /** Pipeline step, e.g. "resolving", "mastering" */
  step: string | null;
  /** Message of the underlying cause (if applicable) */
  cause: string | null;
}

/** Optional context attached to a log call */
export interface LogContext {
  category?: ErrorCategory;
  candidateId?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to getDefaultLogDir() */
  logDir?: string;
  /** Minimum log level to record (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Receives every formatted line (e.g. the CLI's stderr) */
  echo?: (line: string, entry: LogEntry) => void;
  /** Custom clock (for testing) */
  getCurrentDate?: () => Date;
}

/** Counts of the in-memory entries */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  /** ERROR entries per category */
  errorsByCategory: Record<string, number>;
  /** Current log file (null when file logging is off) */
  logFilePath: string | null;
}

/** Filter options for retrieving log entries */
export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  /** Substring match on the candidate id */
  candidateId?: string;
  /** Keep only the last N entries */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'master-dispatch';

const LOG_DIR_NAME = 'logs';

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory.
 * On Windows: %APPDATA%/master-dispatch/logs/
 * On other platforms: ~/.config/master-dispatch/logs/
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Log file name for a date, YYYY-MM-DD.log (local time).
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single line:
 * [TIMESTAMP] LEVEL [CATEGORY] message | candidate: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [`[${entry.timestamp}]`, entry.level];

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.candidateId) {
    parts.push(`| candidate: ${entry.candidateId}`);
  }
  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }
  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * Whether `level` passes the `minLevel` threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a PipelineError.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    candidateId: error.candidateId,
    step: error.step,
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
    candidateId: context?.candidateId ?? null,
    step: context?.step ?? null,
    cause: context?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Run logger.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/tmp/logs' });
 * await logger.initialize();
 * logger.info('Dispatching album plan', { step: 'dispatching' });
 * logger.logPipelineError(new DecodeError('bad header', { candidateId: '/music/01.wav' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private writeToFile: boolean;
  private readonly maxFileSize: number;
  private readonly echo: ((line: string, entry: LogEntry) => void) | null;
  private readonly getCurrentDate: () => Date;

  private entries: LogEntry[] = [];

  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.echo = options?.echo ?? null;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Creates the log directory. If that fails, file logging is turned off and
   * a WARN entry records why; in-memory logging keeps working.
   */
  async initialize(): Promise<void> {
    if (this.writeToFile) {
      try {
        await fs.promises.mkdir(this.logDir, { recursive: true });
      } catch (error: unknown) {
        this.disableFileLogging(`Failed to create log directory "${this.logDir}"`, error);
      }
    }
    this.initialized = true;
  }

  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
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
   * Logs a PipelineError with its category, candidate id, step and cause.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any thrown value. PipelineErrors keep their context; anything else
   * becomes a plain ERROR entry.
   */
  logError(error: unknown, context?: { candidateId?: string; step?: string }): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.error(message, {
      candidateId: context?.candidateId,
      step: context?.step,
    });
  }

  /**
   * Logs a unit that was skipped (WARN).
   */
  logSkipped(candidateId: string, reason: string, step: string = 'dispatching'): void {
    this.warn(`Skipped: ${reason}`, { candidateId, step });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, context, this.getCurrentDate));
  }

  /**
   * Appends synchronously, so concurrent workers never interleave entries.
   */
  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    const line = formatLogEntry(entry);
    this.echo?.(line, entry);
    if (this.writeToFile && this.initialized) {
      this.writeLineToFile(line);
    }
  }

  private writeLineToFile(line: string): void {
    const logFilePath = this.getLogFilePath();
    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
      fs.appendFileSync(logFilePath, line + '\n', 'utf-8');
    } catch (error: unknown) {
      this.disableFileLogging(`Failed to write log file "${logFilePath}"`, error);
    }
  }

  /**
   * Renames a full log file with the next free numeric suffix,
   * e.g. 2026-01-15.log → 2026-01-15.1.log
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

  private disableFileLogging(reason: string, error: unknown): void {
    this.writeToFile = false;
    const message = error instanceof Error ? error.message : String(error);
    this.addEntry(
      createLogEntry(
        'WARN',
        `${reason}: ${message}. File logging disabled.`,
        { step: 'logging' },
        this.getCurrentDate,
      ),
    );
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  getEntries(filter?: LogFilter): LogEntry[] {
    let entries = [...this.entries];

    if (filter?.level) {
      entries = entries.filter((e) => e.level === filter.level);
    }

    if (filter?.category) {
      entries = entries.filter((e) => e.category === filter.category);
    }

    if (filter?.candidateId) {
      const search = filter.candidateId.toLowerCase();
      entries = entries.filter((e) => e.candidateId !== null && e.candidateId.toLowerCase().includes(search));
    }

    if (filter?.limit && filter.limit > 0) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
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
            errorsByCategory[entry.category] = (errorsByCategory[entry.category] ?? 0) + 1;
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

  /**
   * Writes all in-memory entries to `exportPath`, creating parent folders.
   */
  async exportLog(exportPath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(exportPath), { recursive: true });
    const lines = this.entries.map(formatLogEntry);
    const content = lines.join('\n') + (lines.length > 0 ? '\n' : '');
    await fs.promises.writeFile(exportPath, content, 'utf-8');
  }

  /**
   * Clears in-memory entries. Log files are kept.
   */
  clear(): void {
    this.entries = [];
  }
}
