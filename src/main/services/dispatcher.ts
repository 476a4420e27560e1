/**
 * Dispatcher
 *
 * Executes a ProcessingPlan against the mastering engine.
 *
 * - single:  one engine call; any failure is fatal
 * - batch:   one call per candidate, preset resolved once per genre group
 * - album:   one call per track against one shared reference, then sequenced
 * - blended: one call per blend profile (A-D)
 *
 * Fan-out strategies run through a pool of `concurrency` workers (1-10,
 * default 4). Results are collected by unit index, so output order follows
 * candidate order (or profile label), never completion order. Per-unit
 * failures are logged, recorded in the ledger and skipped; a fan-out with no
 * successes at all escalates to BatchFailedError.
 *
 * Cancellation is checked before each unit starts; units already in flight
 * finish on their own.
 */

import * as fs from 'fs';
import * as path from 'path';
import type {
  AlbumSequence,
  BlendLabel,
  Candidate,
  GenreTag,
  MasteredTrack,
  MasteringConfig,
  ProcessingPlan,
  ProgressUpdate,
  ReferenceProfile,
  ReferenceSource,
  Strategy,
} from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import { getUniqueFilePath, sanitizeFilename } from '../utils/fileScanner';
import { sequence } from './albumSequencer';
import type { SequencerPolicy } from './albumSequencer';
import type { DispatchLedger } from './dispatchLedger';
import { BatchFailedError, MissingReferenceError, wrapError } from './errors';
import type { ErrorCategory, PipelineError } from './errors';
import type { Logger } from './logger';
import type { MasteringEngine, ReferenceInput } from './masteringEngine';
import { DEFAULT_PRESET_NAME, presetFor, resolvePresetName } from './presets';
import { DEFAULT_BLEND_POLICY, blend } from './referenceBlender';
import type { BlendPolicy } from './referenceBlender';
import type { ReferenceLibrary } from './referenceLibrary';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface DispatcherOptions {
  engine: MasteringEngine;
  /** Root of the output tree */
  outputDir: string;
  /** Number of units mastered concurrently (1-10, default: 4) */
  concurrency?: number;
  logger?: Logger;
  /** Report accumulator; every unit appends one entry */
  ledger?: DispatchLedger;
  /** Fallback references per genre when a plan has none */
  referenceLibrary?: ReferenceLibrary;
  blendPolicy?: BlendPolicy;
  sequencerPolicy?: SequencerPolicy;
  onProgress?: (update: ProgressUpdate) => void;
}

/** One unit that failed and was skipped */
export interface DispatchFailure {
  candidateId: string;
  profile: BlendLabel | null;
  kind: ErrorCategory;
  message: string;
}

export interface DispatchResult {
  strategy: Strategy;
  /** Successful masters, in candidate order (blends: in label order) */
  tracks: MasteredTrack[];
  failures: DispatchFailure[];
  /** Units not started because the run was cancelled */
  cancelled: string[];
  /** Album order and cohesion (album plans only) */
  sequence: AlbumSequence | null;
  /** Blend profiles used, with the references they weight */
  profiles: ReferenceProfile[];
  references: Candidate[];
}

/** Reference resolved for one unit */
interface UnitReference {
  input: ReferenceInput;
  referenceId: string | null;
  profile: ReferenceProfile | null;
}

/** One engine call */
interface DispatchUnit {
  candidate: Candidate;
  /** Progress / cancellation label, e.g. "song.wav" or "song.wav [B]" */
  label: string;
  /** null when no reference could be found */
  reference: UnitReference | null;
  config: MasteringConfig;
  outputPath: string;
}

type UnitOutcome =
  | { status: 'success'; track: MasteredTrack }
  | { status: 'failure'; failure: DispatchFailure; error: PipelineError }
  | { status: 'cancelled'; unit: DispatchUnit };

/** Internal state for tracking dispatch progress */
interface DispatchState {
  totalUnits: number;
  processedUnits: number;
  successCount: number;
  errorCount: number;
  currentUnits: Set<string>;
  startTime: number;
  cancelled: boolean;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const MIN_CONCURRENCY = 1;
const MAX_CONCURRENCY = 10;

const OUTPUT_EXTENSION = '.wav';

const NO_GENRE_FOLDER = 'general';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function stemOf(candidate: Candidate): string {
  const stem = sanitizeFilename(path.basename(candidate.path, path.extname(candidate.path)));
  return stem || 'track';
}

function blendInput(profile: ReferenceProfile, references: readonly Candidate[]): ReferenceInput {
  return {
    kind: 'blend',
    label: profile.label,
    sources: references.map((reference, i) => ({ path: reference.path, weight: profile.weights[i] })),
  };
}

/**
 * Genre shared by most candidates; ties go to the genre seen first.
 */
export function dominantGenre(candidates: readonly Candidate[]): GenreTag | null {
  const counts = new Map<GenreTag | null, number>();
  for (const candidate of candidates) {
    counts.set(candidate.genre, (counts.get(candidate.genre) ?? 0) + 1);
  }
  let best: GenreTag | null = null;
  let bestCount = 0;
  for (const [genre, count] of counts) {
    if (count > bestCount) {
      best = genre;
      bestCount = count;
    }
  }
  return best;
}

// ─── Dispatcher ──────────────────────────────────────────────────────────────

/**
 * Runs processing plans against a mastering engine.
 *
 * Usage:
 * ```typescript
 * const dispatcher = new Dispatcher({ engine, outputDir: './mastered', logger, ledger });
 * const result = await dispatcher.dispatch(classify(input));
 * ```
 */
export class Dispatcher {
  private readonly engine: MasteringEngine;
  private readonly outputDir: string;
  private readonly concurrency: number;
  private readonly logger: Logger | null;
  private readonly ledger: DispatchLedger | null;
  private readonly referenceLibrary: ReferenceLibrary | null;
  private readonly blendPolicy: BlendPolicy;
  private readonly sequencerPolicy: SequencerPolicy | undefined;
  private readonly onProgress: ((update: ProgressUpdate) => void) | null;

  private state: DispatchState | null = null;

  constructor(options: DispatcherOptions) {
    const rawConcurrency = options.concurrency ?? DEFAULT_SETTINGS.concurrency;
    this.concurrency = Math.max(MIN_CONCURRENCY, Math.min(MAX_CONCURRENCY, Math.floor(rawConcurrency)));

    this.engine = options.engine;
    this.outputDir = path.resolve(options.outputDir);
    this.logger = options.logger ?? null;
    this.ledger = options.ledger ?? null;
    this.referenceLibrary = options.referenceLibrary ?? null;
    this.blendPolicy = options.blendPolicy ?? DEFAULT_BLEND_POLICY;
    this.sequencerPolicy = options.sequencerPolicy;
    this.onProgress = options.onProgress ?? null;
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  isRunning(): boolean {
    return this.state !== null && !this.state.cancelled;
  }

  /**
   * Stops starting new units. Units in flight finish.
   */
  cancel(): void {
    if (this.state) {
      this.state.cancelled = true;
      this.logger?.info('Dispatch cancelled by user', { step: 'dispatching' });
    }
  }

  /**
   * Executes a plan.
   *
   * @throws PipelineError for a failed single plan, an unknown preset override,
   *   an invalid blend, or a fan-out in which every unit failed
   */
  async dispatch(plan: ProcessingPlan): Promise<DispatchResult> {
    const override = plan.presetOverride !== null ? resolvePresetName(plan.presetOverride) : null;
    if (override) {
      this.logger?.info(`Preset override: ${override.name}`, { step: 'configuring' });
    }

    const reserved = new Set<string>();

    switch (plan.strategy) {
      case 'single': {
        const config = override ?? presetFor(plan.target.genre);
        const shared = this.sharedReference(plan.reference);
        const unit = this.createUnit(
          plan.target,
          shared.reference ?? this.libraryReference(plan.target.genre),
          config,
          path.join(this.outputDir, 'singles'),
          null,
          reserved,
        );
        const outcomes = await this.runUnits([unit], plan.strategy);
        const outcome = outcomes[0];
        if (outcome.status === 'failure') {
          throw outcome.error;
        }
        return this.collect(plan.strategy, outcomes, null, shared.profiles, shared.references);
      }

      case 'batch': {
        const presets = new Map<GenreTag | null, MasteringConfig>();
        for (const group of plan.groups) {
          const config = override ?? presetFor(group.genre);
          presets.set(group.genre, config);
          this.logger?.info(
            `Preset "${config.name}" for ${group.genre ?? 'untagged'} group (${group.candidates.length} track(s))`,
            { step: 'configuring' },
          );
        }

        const shared = this.sharedReference(plan.reference);
        const units = plan.candidates.map((candidate) =>
          this.createUnit(
            candidate,
            shared.reference ?? this.libraryReference(candidate.genre),
            presets.get(candidate.genre) ?? override ?? presetFor(candidate.genre),
            path.join(this.outputDir, 'batch', candidate.genre ?? NO_GENRE_FOLDER),
            null,
            reserved,
          ),
        );
        const outcomes = await this.runUnits(units, plan.strategy);
        return this.collect(plan.strategy, outcomes, null, shared.profiles, shared.references);
      }

      case 'album': {
        const genre = dominantGenre(plan.candidates);
        const config = override ?? presetFor(genre);
        const shared = this.sharedReference(plan.reference);
        const reference = shared.reference ?? this.libraryReference(genre);
        const albumDir = path.join(this.outputDir, 'album', sanitizeFilename(plan.albumName) || 'album');

        const units = plan.candidates.map((candidate) =>
          this.createUnit(candidate, reference, config, albumDir, null, reserved),
        );
        const outcomes = await this.runUnits(units, plan.strategy);
        const successes = outcomes.flatMap((o) => (o.status === 'success' ? [o.track] : []));
        const albumSequence = successes.length > 0 ? sequence(successes, this.sequencerPolicy) : null;
        if (albumSequence) {
          this.logger?.info(
            `Album "${plan.albumName}" sequenced: ${albumSequence.tracks.length} track(s), cohesion ${albumSequence.cohesion.toFixed(1)}`,
            { step: 'sequencing' },
          );
        }
        return this.collect(plan.strategy, outcomes, albumSequence, shared.profiles, shared.references);
      }

      case 'blended': {
        const profiles = blend(plan.references, this.blendPolicy);
        const config = override ?? presetFor(null);
        const blendDir = path.join(this.outputDir, 'blends', stemOf(plan.target));

        const units = profiles.map((profile) =>
          this.createUnit(
            plan.target,
            { input: blendInput(profile, plan.references), referenceId: null, profile },
            config,
            blendDir,
            profile.label,
            reserved,
          ),
        );
        const outcomes = await this.runUnits(units, plan.strategy);
        return this.collect(plan.strategy, outcomes, null, profiles, [...plan.references]);
      }
    }
  }

  // ─── Plan Helpers ────────────────────────────────────────────────────

  /**
   * Reference shared by every unit of a plan. A blend source uses profile A.
   */
  private sharedReference(source: ReferenceSource | null): {
    reference: UnitReference | null;
    profiles: ReferenceProfile[];
    references: Candidate[];
  } {
    if (!source) {
      return { reference: null, profiles: [], references: [] };
    }
    if (source.kind === 'track') {
      return {
        reference: { input: { kind: 'track', path: source.candidate.path }, referenceId: source.candidate.id, profile: null },
        profiles: [],
        references: [source.candidate],
      };
    }

    const profiles = blend(source.references, this.blendPolicy);
    const equal = profiles[0];
    return {
      reference: { input: blendInput(equal, source.references), referenceId: null, profile: equal },
      profiles: [equal],
      references: [...source.references],
    };
  }

  private libraryReference(genre: GenreTag | null): UnitReference | null {
    const found = this.referenceLibrary?.findReference(genre) ?? null;
    if (!found) return null;
    return { input: { kind: 'track', path: found }, referenceId: found, profile: null };
  }

  private createUnit(
    candidate: Candidate,
    reference: UnitReference | null,
    config: MasteringConfig,
    dir: string,
    label: BlendLabel | null,
    reserved: Set<string>,
  ): DispatchUnit {
    const stem = stemOf(candidate);
    const fileName = label ? `${stem}_${label}${OUTPUT_EXTENSION}` : `${stem}_master${OUTPUT_EXTENSION}`;
    const baseName = path.basename(candidate.path);
    return {
      candidate,
      label: label ? `${baseName} [${label}]` : baseName,
      reference,
      config,
      outputPath: getUniqueFilePath(path.join(dir, fileName), reserved),
    };
  }

  // ─── Progress ────────────────────────────────────────────────────────

  private createProgressUpdate(currentUnit: string | null): ProgressUpdate {
    if (!this.state) {
      return {
        totalUnits: 0,
        processedUnits: 0,
        successCount: 0,
        errorCount: 0,
        currentUnit: null,
        estimatedTimeRemaining: null,
      };
    }

    const { totalUnits, processedUnits, successCount, errorCount, startTime } = this.state;

    let estimatedTimeRemaining: number | null = null;
    if (processedUnits > 0) {
      const elapsedMs = Date.now() - startTime;
      const avgTimePerUnit = elapsedMs / processedUnits;
      estimatedTimeRemaining = Math.round(((totalUnits - processedUnits) * avgTimePerUnit) / 1000);
    }

    return { totalUnits, processedUnits, successCount, errorCount, currentUnit, estimatedTimeRemaining };
  }

  private emitProgress(currentUnit: string | null): void {
    if (this.onProgress) {
      this.onProgress(this.createProgressUpdate(currentUnit));
    }
  }

  // ─── Worker Pool ─────────────────────────────────────────────────────

  /**
   * Runs units with at most `concurrency` in flight.
   * Outcomes are returned in unit order.
   */
  private async runUnits(units: DispatchUnit[], strategy: Strategy): Promise<UnitOutcome[]> {
    const state: DispatchState = {
      totalUnits: units.length,
      processedUnits: 0,
      successCount: 0,
      errorCount: 0,
      currentUnits: new Set(),
      startTime: Date.now(),
      cancelled: false,
    };
    this.state = state;

    this.logger?.info(`Dispatching ${strategy} plan: ${units.length} unit(s), concurrency: ${this.concurrency}`, {
      step: 'dispatching',
    });
    this.emitProgress(null);

    const outcomeMap = new Map<number, UnitOutcome>();

    let unitIndex = 0;
    const processNext = async (): Promise<void> => {
      while (unitIndex < units.length) {
        if (state.cancelled) {
          break;
        }

        const currentIndex = unitIndex++;
        const unit = units[currentIndex];

        state.currentUnits.add(unit.label);
        this.emitProgress(unit.label);

        try {
          const outcome = await this.runUnit(unit, strategy);
          outcomeMap.set(currentIndex, outcome);

          state.processedUnits++;
          if (outcome.status === 'success') {
            state.successCount++;
          } else {
            state.errorCount++;
          }
        } finally {
          state.currentUnits.delete(unit.label);
        }

        this.emitProgress(state.currentUnits.size > 0 ? [...state.currentUnits][0] : null);
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.concurrency, units.length); i++) {
      workers.push(processNext());
    }
    await Promise.all(workers);

    const outcomes: UnitOutcome[] = units.map((unit, i) => {
      const outcome = outcomeMap.get(i);
      if (outcome) return outcome;

      this.logger?.logSkipped(unit.candidate.id, `dispatch cancelled before ${unit.label} started`);
      this.ledger?.record({
        candidateId: unit.candidate.id,
        strategy,
        preset: unit.config.name,
        profile: unit.reference?.profile?.label ?? null,
        status: 'cancelled',
        errorKind: null,
        message: 'Cancelled before start',
        outputPath: null,
      });
      return { status: 'cancelled', unit };
    });

    const elapsed = Date.now() - state.startTime;
    this.logger?.info(
      `Dispatch complete: ${state.successCount} succeeded, ${state.errorCount} failed, ${units.length - state.processedUnits} cancelled in ${(elapsed / 1000).toFixed(1)}s`,
      { step: 'dispatching' },
    );
    this.emitProgress(null);
    this.state = null;

    return outcomes;
  }

  /**
   * One engine call. Never throws: failures become failure outcomes.
   */
  private async runUnit(unit: DispatchUnit, strategy: Strategy): Promise<UnitOutcome> {
    const candidateId = unit.candidate.id;
    const profileLabel = unit.reference?.profile?.label ?? null;

    try {
      if (!unit.reference) {
        throw new MissingReferenceError(
          `No reference supplied and the reference library has none for genre "${unit.candidate.genre ?? DEFAULT_PRESET_NAME}"`,
          { candidateId },
        );
      }

      await fs.promises.mkdir(path.dirname(unit.outputPath), { recursive: true });
      const output = await this.engine.master({
        candidateId,
        target: unit.candidate.path,
        reference: unit.reference.input,
        config: unit.config,
        outputPath: unit.outputPath,
      });

      const track: MasteredTrack = {
        candidateId,
        candidate: unit.candidate,
        strategy,
        profile: unit.reference.profile,
        referenceId: unit.reference.referenceId,
        preset: unit.config,
        outputPath: output.outputPath,
        descriptors: output.descriptors,
      };

      this.ledger?.record({
        candidateId,
        strategy,
        preset: unit.config.name,
        profile: profileLabel,
        status: 'success',
        errorKind: null,
        message: null,
        outputPath: output.outputPath,
      });
      this.logger?.info(`Mastered ${unit.label} → ${output.outputPath}`, { candidateId, step: 'mastering' });

      return { status: 'success', track };
    } catch (error: unknown) {
      const pipelineError = wrapError(error, 'MasteringError', { candidateId, step: 'mastering' });
      this.logger?.logPipelineError(pipelineError);
      this.ledger?.record({
        candidateId,
        strategy,
        preset: unit.config.name,
        profile: profileLabel,
        status: 'failure',
        errorKind: pipelineError.category,
        message: pipelineError.message,
        outputPath: null,
      });

      return {
        status: 'failure',
        failure: {
          candidateId,
          profile: profileLabel,
          kind: pipelineError.category,
          message: pipelineError.message,
        },
        error: pipelineError,
      };
    }
  }

  // ─── Results ─────────────────────────────────────────────────────────

  private collect(
    strategy: Strategy,
    outcomes: UnitOutcome[],
    albumSequence: AlbumSequence | null,
    profiles: ReferenceProfile[],
    references: Candidate[],
  ): DispatchResult {
    const tracks: MasteredTrack[] = [];
    const failures: DispatchFailure[] = [];
    const cancelled: string[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === 'success') tracks.push(outcome.track);
      else if (outcome.status === 'failure') failures.push(outcome.failure);
      else cancelled.push(outcome.unit.label);
    }

    if (strategy !== 'single' && tracks.length === 0 && failures.length > 0) {
      throw new BatchFailedError(failures.length, strategy);
    }

    return { strategy, tracks, failures, cancelled, sequence: albumSequence, profiles, references };
  }
}
