/**
 * Dispatch ledger: one entry per mastering unit, read back by the run report.
 */

import type { BlendLabel, Strategy } from '../../shared/types';
import type { ErrorCategory } from './errors';

export type LedgerStatus = 'success' | 'failure' | 'cancelled';

export interface LedgerEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  candidateId: string;
  strategy: Strategy;
  /** Preset name used (or that would have been used) */
  preset: string;
  /** Blend profile label, if the unit used one */
  profile: BlendLabel | null;
  status: LedgerStatus;
  /** Error kind for failures */
  errorKind: ErrorCategory | null;
  message: string | null;
  outputPath: string | null;
}

export type LedgerRecord = Omit<LedgerEntry, 'timestamp'>;

export interface LedgerSummary {
  total: number;
  successCount: number;
  failureCount: number;
  cancelledCount: number;
}

/**
 * Append-only accumulator shared by all dispatcher workers.
 * `record()` is synchronous, so entries from concurrent units never interleave.
 */
export class DispatchLedger {
  private readonly items: LedgerEntry[] = [];
  private readonly getCurrentDate: () => Date;

  constructor(options?: { getCurrentDate?: () => Date }) {
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  record(entry: LedgerRecord): LedgerEntry {
    const stored = Object.freeze({ timestamp: this.getCurrentDate().toISOString(), ...entry });
    this.items.push(stored);
    return stored;
  }

  entries(): LedgerEntry[] {
    return [...this.items];
  }

  failures(): LedgerEntry[] {
    return this.items.filter((e) => e.status === 'failure');
  }

  summary(): LedgerSummary {
    let successCount = 0;
    let failureCount = 0;
    let cancelledCount = 0;
    for (const entry of this.items) {
      if (entry.status === 'success') successCount++;
      else if (entry.status === 'failure') failureCount++;
      else cancelledCount++;
    }
    return { total: this.items.length, successCount, failureCount, cancelledCount };
  }

  get size(): number {
    return this.items.length;
  }
}
