/**
 * Classifier
 *
 * Maps a resolved candidate set plus optional references onto exactly one
 * ProcessingPlan variant. Pure: no I/O, same input gives the same plan.
 */

import * as path from 'path';
import type {
  Candidate,
  GenreGroup,
  GenreTag,
  InputKind,
  ProcessingPlan,
  ReferenceSource,
  Strategy,
} from '../../shared/types';
import { InsufficientReferencesError, NoCandidatesFoundError, TooManyReferencesError } from './errors';
import { MAX_BLEND_REFERENCES, MIN_BLEND_REFERENCES } from './referenceBlender';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface ClassifierInput {
  kind: InputKind;
  candidates: readonly Candidate[];
  references: readonly Candidate[];
  /** Folder the candidates came from (null for queries) */
  root: string | null;
  presetOverride?: string | null;
  /** Caller asked for blending explicitly */
  requestBlend?: boolean;
}

/** Thresholds for album detection */
export interface ClassifierPolicy {
  /** Share of numbered candidates that marks an album */
  numberedRatio: number;
  /** Smallest single-folder set treated as an album */
  albumMinTracks: number;
  /** Largest single-folder set treated as an album */
  albumMaxTracks: number;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_CLASSIFIER_POLICY: ClassifierPolicy = {
  numberedRatio: 0.6,
  albumMinTracks: 3,
  albumMaxTracks: 30,
};

const NUMBERED_NAME = /^\d+[\s\-._]|track\s*\d+|cd\d+/i;

const DEFAULT_ALBUM_NAME = 'album';

// ─── Album Evidence ──────────────────────────────────────────────────────────

/**
 * Whether a candidate carries positional evidence: a numbered file name
 * ("01_intro", "Track 3", "cd1") or an embedded track number.
 */
export function isNumbered(candidate: Candidate): boolean {
  if (candidate.trackNumber !== null) return true;
  const stem = path.basename(candidate.path, path.extname(candidate.path));
  return NUMBERED_NAME.test(stem);
}

/**
 * The one folder all candidates live in, or null when they are spread out.
 */
export function sharedParent(candidates: readonly Candidate[]): string | null {
  if (candidates.length === 0) return null;
  const parent = path.dirname(candidates[0].path);
  return candidates.every((c) => path.dirname(c.path) === parent) ? parent : null;
}

export function hasAlbumStructure(candidates: readonly Candidate[], policy: ClassifierPolicy): boolean {
  const numbered = candidates.filter(isNumbered).length;
  if (numbered / candidates.length >= policy.numberedRatio) {
    return true;
  }
  return (
    sharedParent(candidates) !== null &&
    candidates.length >= policy.albumMinTracks &&
    candidates.length <= policy.albumMaxTracks
  );
}

/**
 * Groups candidates by genre, groups in order of first appearance.
 */
export function groupByGenre(candidates: readonly Candidate[]): GenreGroup[] {
  const groups = new Map<GenreTag | null, Candidate[]>();
  for (const candidate of candidates) {
    const group = groups.get(candidate.genre);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(candidate.genre, [candidate]);
    }
  }
  return [...groups.entries()].map(([genre, members]) => ({ genre, candidates: members }));
}

function albumName(input: ClassifierInput): string {
  const parent = sharedParent(input.candidates);
  const folder = parent ?? input.root;
  return folder ? path.basename(folder) || DEFAULT_ALBUM_NAME : DEFAULT_ALBUM_NAME;
}

function sharedReference(references: readonly Candidate[]): ReferenceSource | null {
  if (references.length === 0) return null;
  if (references.length === 1) return { kind: 'track', candidate: references[0] };
  return { kind: 'blend', references: [...references] };
}

// ─── Classification ──────────────────────────────────────────────────────────

function validateInput(input: ClassifierInput): void {
  if (input.candidates.length === 0) {
    throw new NoCandidatesFoundError(input.root ?? input.kind, { step: 'classifying' });
  }
  if (input.references.length > MAX_BLEND_REFERENCES) {
    throw new TooManyReferencesError(input.references.length);
  }
  if (input.requestBlend && input.references.length < MIN_BLEND_REFERENCES) {
    throw new InsufficientReferencesError(input.references.length);
  }
}

/**
 * Strategy for a validated input; see classify().
 */
export function chooseStrategy(input: ClassifierInput, policy: ClassifierPolicy = DEFAULT_CLASSIFIER_POLICY): Strategy {
  if (input.candidates.length === 1) {
    return input.references.length >= MIN_BLEND_REFERENCES ? 'blended' : 'single';
  }
  return hasAlbumStructure(input.candidates, policy) ? 'album' : 'batch';
}

/**
 * Builds the plan for an explicitly chosen strategy. Reference counts are
 * validated as in classify().
 *
 * @throws RangeError when single or blended is asked for several candidates,
 *   or single for several references
 */
export function buildPlan(strategy: Strategy, input: ClassifierInput): ProcessingPlan {
  validateInput(input);
  const { candidates, references } = input;
  const presetOverride = input.presetOverride ?? null;

  switch (strategy) {
    case 'single':
    case 'blended': {
      if (candidates.length !== 1) {
        throw new RangeError(`${strategy} mastering takes exactly one target, got ${candidates.length}`);
      }
      const target = candidates[0];
      if (strategy === 'blended') {
        if (references.length < MIN_BLEND_REFERENCES) {
          throw new InsufficientReferencesError(references.length);
        }
        return { strategy, target, references: [...references], presetOverride };
      }
      if (references.length > 1) {
        throw new RangeError(`single mastering takes at most one reference, got ${references.length}`);
      }
      return {
        strategy,
        target,
        reference: references.length === 1 ? { kind: 'track', candidate: references[0] } : null,
        presetOverride,
      };
    }

    case 'album':
      return {
        strategy,
        candidates: [...candidates],
        albumName: albumName(input),
        reference: sharedReference(references),
        presetOverride,
      };

    case 'batch':
      return {
        strategy,
        candidates: [...candidates],
        groups: groupByGenre(candidates),
        reference: sharedReference(references),
        presetOverride,
      };
  }
}

/**
 * Picks the processing plan for a resolved input.
 *
 * Rules, first match wins:
 * 1. no candidates                         → NoCandidatesFoundError
 * 2. more than 5 references                → TooManyReferencesError
 * 3. blend requested with < 2 references   → InsufficientReferencesError
 * 4. one candidate, 2-5 references         → blended
 * 5. one candidate                         → single
 * 6. album evidence                        → album (beats genre evidence)
 * 7. otherwise                             → batch, grouped by genre
 *
 * With several candidates, one reference is shared as a track and 2-5 are
 * shared as a blend.
 */
export function classify(input: ClassifierInput, policy: ClassifierPolicy = DEFAULT_CLASSIFIER_POLICY): ProcessingPlan {
  validateInput(input);
  return buildPlan(chooseStrategy(input, policy), input);
}
