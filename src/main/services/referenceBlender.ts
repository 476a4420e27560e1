/**
 * Reference Blender
 *
 * Turns 2-5 reference tracks into four synthetic reference profiles:
 *
 * - A  equal:             every reference weighs the same
 * - B  first-dominant:    the first reference gets `dominantShare`, the rest split evenly
 * - C  last-dominant:     same, on the last reference
 * - D  inverse-loudness:  w_i ∝ 10^(-(L_i - L_min) / 20), the quietest reference weighs most
 *
 * Weights are non-negative and sum to 1. Output is deterministic.
 */

import * as path from 'path';
import type { BlendLabel, BlendStrategy, Candidate, ReferenceProfile } from '../../shared/types';
import { InvalidReferenceCountError } from './errors';

export interface BlendPolicy {
  /** Weight of the dominant reference in B and C, in [0.5, 1) */
  dominantShare: number;
}

export const DEFAULT_BLEND_POLICY: BlendPolicy = {
  dominantShare: 0.6,
};

export const MIN_BLEND_REFERENCES = 2;
export const MAX_BLEND_REFERENCES = 5;

const PROFILE_STRATEGIES: ReadonlyArray<[BlendLabel, BlendStrategy]> = [
  ['A', 'equal'],
  ['B', 'first-dominant'],
  ['C', 'last-dominant'],
  ['D', 'inverse-loudness'],
];

/**
 * @throws RangeError when dominantShare is outside [0.5, 1)
 */
export function validateBlendPolicy(policy: BlendPolicy): BlendPolicy {
  const share = policy.dominantShare;
  if (!Number.isFinite(share) || share < 0.5 || share >= 1) {
    throw new RangeError(`dominantShare must be in [0.5, 1), got ${share}`);
  }
  return policy;
}

/**
 * Scales weights to sum to 1; the last weight absorbs rounding.
 */
export function normalizeWeights(raw: readonly number[]): number[] {
  const total = raw.reduce((sum, w) => sum + w, 0);
  if (!(total > 0) || !Number.isFinite(total)) {
    return equalWeights(raw.length);
  }
  return absorbRounding(raw.map((w) => w / total));
}

function absorbRounding(weights: number[]): number[] {
  if (weights.length === 0) return weights;
  const head = weights.slice(0, -1).reduce((sum, w) => sum + w, 0);
  weights[weights.length - 1] = Math.max(0, 1 - head);
  return weights;
}

function equalWeights(count: number): number[] {
  return absorbRounding(new Array<number>(count).fill(1 / count));
}

function dominantWeights(count: number, dominantIndex: number, share: number): number[] {
  const rest = (1 - share) / (count - 1);
  return normalizeWeights(Array.from({ length: count }, (_, i) => (i === dominantIndex ? share : rest)));
}

/**
 * Inverse linear amplitude of each reference's loudness, relative to the
 * quietest one so the largest term is 1. Unknown loudness takes the mean of
 * the known values; with none known every weight is equal.
 */
export function inverseLoudnessWeights(references: readonly Candidate[]): number[] {
  const known = references
    .map((r) => r.loudness)
    .filter((l): l is number => l !== null && Number.isFinite(l));
  if (known.length === 0) {
    return equalWeights(references.length);
  }

  const mean = known.reduce((sum, l) => sum + l, 0) / known.length;
  const quietest = Math.min(...known);
  return normalizeWeights(
    references.map((r) => {
      const loudness = r.loudness !== null && Number.isFinite(r.loudness) ? r.loudness : mean;
      return Math.pow(10, -(loudness - quietest) / 20);
    }),
  );
}

function weightsFor(strategy: BlendStrategy, references: readonly Candidate[], policy: BlendPolicy): number[] {
  const count = references.length;
  switch (strategy) {
    case 'equal':
      return equalWeights(count);
    case 'first-dominant':
      return dominantWeights(count, 0, policy.dominantShare);
    case 'last-dominant':
      return dominantWeights(count, count - 1, policy.dominantShare);
    case 'inverse-loudness':
      return inverseLoudnessWeights(references);
  }
}

/**
 * Builds the four blend profiles, labelled A-D, for an ordered reference list.
 *
 * @throws InvalidReferenceCountError for fewer than 2 or more than 5 references
 * @throws RangeError for an invalid policy
 */
export function blend(references: readonly Candidate[], policy: BlendPolicy = DEFAULT_BLEND_POLICY): ReferenceProfile[] {
  if (references.length < MIN_BLEND_REFERENCES || references.length > MAX_BLEND_REFERENCES) {
    throw new InvalidReferenceCountError(references.length);
  }
  validateBlendPolicy(policy);

  return PROFILE_STRATEGIES.map(([label, strategy]) => ({
    label,
    strategy,
    weights: weightsFor(strategy, references, policy),
  }));
}

/**
 * Human-readable blend, e.g. "60% kick_ref + 40% vocal_ref".
 */
export function describeBlend(profile: ReferenceProfile, references: readonly Candidate[]): string {
  return profile.weights
    .map((weight, i) => {
      const reference = references[i];
      const name = reference ? path.basename(reference.path, path.extname(reference.path)) : `ref${i + 1}`;
      return `${Math.round(weight * 100)}% ${name}`;
    })
    .join(' + ');
}
