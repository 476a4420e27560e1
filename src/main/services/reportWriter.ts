/**
 * Run report: a plain-text summary of one dispatch, built from the result and
 * the ledger. Every failure is listed with its candidate id and error kind.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { BlendStrategy } from '../../shared/types';
import type { DispatchResult } from './dispatcher';
import type { DispatchLedger } from './dispatchLedger';
import type { PipelineError } from './errors';
import { describeBlend } from './referenceBlender';

export interface RunReportInput {
  /** The raw input of the run */
  input: string;
  /** null when the run failed before producing a result */
  result: DispatchResult | null;
  ledger: DispatchLedger;
  /** Fatal error that ended the run, if any */
  error?: PipelineError | null;
  generatedAt?: Date;
}

const BLEND_GUIDE: Record<BlendStrategy, string> = {
  equal: 'balanced average of all references',
  'first-dominant': 'leans toward the first reference',
  'last-dominant': 'leans toward the last reference',
  'inverse-loudness': 'favours the quietest, most dynamic reference',
};

function heading(title: string): string[] {
  return ['', title, '-'.repeat(title.length)];
}

/**
 * Builds the report text. Lines are joined with "\n" and end with a newline.
 */
export function buildRunReport(report: RunReportInput): string {
  const { result, ledger } = report;
  const summary = ledger.summary();
  const generatedAt = report.generatedAt ?? new Date();

  const lines: string[] = [
    'master-dispatch run report',
    '==========================',
    `Input:     ${report.input}`,
    `Strategy:  ${result?.strategy ?? 'n/a'}`,
    `Generated: ${generatedAt.toISOString()}`,
  ];

  if (report.error) {
    lines.push(`Status:    FAILED (${report.error.toUserMessage()})`);
  } else {
    lines.push(`Status:    ${summary.failureCount > 0 ? 'completed with failures' : 'completed'}`);
  }

  lines.push(...heading('Results'));
  lines.push(`Mastered:  ${summary.successCount}`);
  lines.push(`Failed:    ${summary.failureCount}`);
  lines.push(`Cancelled: ${summary.cancelledCount}`);

  if (result && result.tracks.length > 0) {
    lines.push(...heading('Masters'));
    for (const track of result.tracks) {
      const label = track.profile && result.strategy === 'blended' ? ` [${track.profile.label}]` : '';
      lines.push(`  ${path.basename(track.candidate.path)}${label}  preset=${track.preset.name}  → ${track.outputPath}`);
    }
  }

  const failures = ledger.failures();
  if (failures.length > 0) {
    lines.push(...heading('Failures'));
    for (const failure of failures) {
      const label = failure.profile ? ` [${failure.profile}]` : '';
      lines.push(`  ${failure.candidateId}${label}  ${failure.errorKind ?? 'Unknown'}: ${failure.message ?? ''}`.trimEnd());
    }
  }

  const cancelled = ledger.entries().filter((e) => e.status === 'cancelled');
  if (cancelled.length > 0) {
    lines.push(...heading('Cancelled'));
    for (const entry of cancelled) {
      const label = entry.profile ? ` [${entry.profile}]` : '';
      lines.push(`  ${entry.candidateId}${label}`);
    }
  }

  if (result?.sequence) {
    lines.push(...heading(`Album order (cohesion ${result.sequence.cohesion.toFixed(1)})`));
    result.sequence.tracks.forEach((track, i) => {
      lines.push(`  ${i + 1}. ${path.basename(track.candidate.path)}`);
    });
  }

  if (result && result.profiles.length > 0) {
    lines.push(...heading(result.strategy === 'blended' ? 'Blend comparison guide' : 'Shared blend reference'));
    for (const profile of result.profiles) {
      lines.push(`  ${profile.label}  ${describeBlend(profile, result.references)}  (${BLEND_GUIDE[profile.strategy]})`);
    }
    if (result.strategy === 'blended') {
      lines.push('  Listen to each variant and keep the one closest to the intended sound.');
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * Writes a report, creating the parent folder.
 */
export async function writeRunReport(filePath: string, text: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, text, 'utf-8');
}
