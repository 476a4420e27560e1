/**
 * Album Sequencer
 *
 * Orders mastered album tracks with a greedy nearest-neighbour walk over
 * pairwise compatibility, and scores the result (cohesion, 0-100).
 *
 * Compatibility uses only the descriptors the mastering engine reported:
 * integrated loudness, spectral centroid and dynamic range.
 */

import type { AlbumSequence, AudioDescriptors, MasteredTrack } from '../../shared/types';

// ─── Policy ──────────────────────────────────────────────────────────────────

export interface SequencerPolicy {
  /** Loudness difference (LU) that counts as fully incompatible */
  loudnessSpan: number;
  /** Centroid distance in octaves that counts as fully incompatible */
  centroidOctaves: number;
  /** Dynamic range difference (dB) that counts as fully incompatible */
  dynamicRangeSpan: number;
  weights: {
    loudness: number;
    centroid: number;
    dynamicRange: number;
  };
  /** Score for a pair with no descriptor in common */
  unknownCompatibility: number;
}

export const DEFAULT_SEQUENCER_POLICY: SequencerPolicy = {
  loudnessSpan: 12,
  centroidOctaves: 2,
  dynamicRangeSpan: 10,
  weights: {
    loudness: 0.5,
    centroid: 0.3,
    dynamicRange: 0.2,
  },
  unknownCompatibility: 0.5,
};

// ─── Compatibility ───────────────────────────────────────────────────────────

function known(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Compatibility of two tracks in [0, 1]; 1 means identical descriptors.
 * Each shared descriptor contributes a distance clipped to 1; weights are
 * renormalised over the descriptors both tracks have.
 */
export function compatibility(
  a: AudioDescriptors | null,
  b: AudioDescriptors | null,
  policy: SequencerPolicy = DEFAULT_SEQUENCER_POLICY,
): number {
  if (!a || !b) return policy.unknownCompatibility;

  let weightedDistance = 0;
  let totalWeight = 0;
  const add = (distance: number, weight: number): void => {
    weightedDistance += Math.min(1, distance) * weight;
    totalWeight += weight;
  };

  if (known(a.integratedLoudness) && known(b.integratedLoudness)) {
    add(Math.abs(a.integratedLoudness - b.integratedLoudness) / policy.loudnessSpan, policy.weights.loudness);
  }
  if (known(a.spectralCentroid) && known(b.spectralCentroid) && a.spectralCentroid > 0 && b.spectralCentroid > 0) {
    add(Math.abs(Math.log2(a.spectralCentroid / b.spectralCentroid)) / policy.centroidOctaves, policy.weights.centroid);
  }
  if (known(a.dynamicRange) && known(b.dynamicRange)) {
    add(Math.abs(a.dynamicRange - b.dynamicRange) / policy.dynamicRangeSpan, policy.weights.dynamicRange);
  }

  if (totalWeight <= 0) return policy.unknownCompatibility;
  return 1 - weightedDistance / totalWeight;
}

// ─── Sequencing ──────────────────────────────────────────────────────────────

/**
 * Orders tracks: start from the track with the highest average compatibility,
 * then keep appending the unplaced track most compatible with the tail.
 * Ties go to the earlier input track.
 *
 * Fewer than two tracks come back in input order with cohesion 100.
 */
export function sequence(
  tracks: readonly MasteredTrack[],
  policy: SequencerPolicy = DEFAULT_SEQUENCER_POLICY,
): AlbumSequence {
  const count = tracks.length;
  if (count < 2) {
    return { tracks: [...tracks], cohesion: 100 };
  }

  const matrix = tracks.map((a, i) =>
    tracks.map((b, j) => (i === j ? 1 : compatibility(a.descriptors, b.descriptors, policy))),
  );

  let start = 0;
  let bestAverage = -Infinity;
  for (let i = 0; i < count; i++) {
    const average = matrix[i].reduce((sum, score, j) => (j === i ? sum : sum + score), 0) / (count - 1);
    if (average > bestAverage) {
      bestAverage = average;
      start = i;
    }
  }

  const order: number[] = [start];
  const placed = new Set<number>(order);
  while (order.length < count) {
    const tail = order[order.length - 1];
    let next = -1;
    let bestScore = -Infinity;
    for (let j = 0; j < count; j++) {
      if (placed.has(j)) continue;
      if (matrix[tail][j] > bestScore) {
        bestScore = matrix[tail][j];
        next = j;
      }
    }
    order.push(next);
    placed.add(next);
  }

  let adjacentTotal = 0;
  for (let k = 1; k < order.length; k++) {
    adjacentTotal += matrix[order[k - 1]][order[k]];
  }

  return {
    tracks: order.map((i) => tracks[i]),
    cohesion: (100 * adjacentTotal) / (count - 1),
  };
}
