import { describe, it, expect } from 'vitest';
import {
  blend,
  describeBlend,
  inverseLoudnessWeights,
  normalizeWeights,
  validateBlendPolicy,
} from '../../../src/main/services/referenceBlender';
import { InvalidReferenceCountError } from '../../../src/main/services/errors';
import type { Candidate, ReferenceProfile } from '../../../src/shared/types';
import { makeCandidate } from '../../helpers/candidates';

function sum(weights: number[]): number {
  return weights.reduce((a, b) => a + b, 0);
}

function profile(profiles: ReferenceProfile[], label: string): ReferenceProfile {
  const found = profiles.find((p) => p.label === label);
  if (!found) throw new Error(`missing profile ${label}`);
  return found;
}

const r1 = makeCandidate('/refs/r1.wav', { loudness: -8 });
const r2 = makeCandidate('/refs/r2.wav', { loudness: -12 });
const r3 = makeCandidate('/refs/r3.wav', { loudness: -14 });

describe('referenceBlender', () => {
  describe('blend', () => {
    it('should return exactly four profiles labelled A-D', () => {
      const profiles = blend([r1, r2, r3]);

      expect(profiles.map((p) => p.label)).toEqual(['A', 'B', 'C', 'D']);
      expect(profiles.map((p) => p.strategy)).toEqual(['equal', 'first-dominant', 'last-dominant', 'inverse-loudness']);
    });

    it('should weight [r1, r2, r3] as equal, r1-dominant, r3-dominant and quietest-first', () => {
      const profiles = blend([r1, r2, r3]);

      const a = profile(profiles, 'A').weights;
      expect(a[0]).toBeCloseTo(1 / 3, 6);
      expect(a[1]).toBeCloseTo(1 / 3, 6);
      expect(a[2]).toBeCloseTo(1 / 3, 6);

      const b = profile(profiles, 'B').weights;
      expect(b[0]).toBeCloseTo(0.6, 6);
      expect(b[1]).toBeCloseTo(0.2, 6);
      expect(b[2]).toBeCloseTo(0.2, 6);

      const c = profile(profiles, 'C').weights;
      expect(c[0]).toBeCloseTo(0.2, 6);
      expect(c[1]).toBeCloseTo(0.2, 6);
      expect(c[2]).toBeCloseTo(0.6, 6);

      const d = profile(profiles, 'D').weights;
      expect(d[0]).toBeCloseTo(0.2183, 3);
      expect(d[1]).toBeCloseTo(0.346, 3);
      expect(d[2]).toBeCloseTo(0.4356, 3);
    });

    it('should produce non-negative weights summing to 1 for every reference count', () => {
      for (let count = 2; count <= 5; count++) {
        const references = Array.from({ length: count }, (_, i) =>
          makeCandidate(`/refs/ref${i}.wav`, { loudness: -6 - i * 3 }),
        );
        for (const p of blend(references)) {
          expect(p.weights).toHaveLength(count);
          expect(p.weights.every((w) => w >= 0)).toBe(true);
          expect(Math.abs(sum(p.weights) - 1)).toBeLessThan(1e-6);
        }
      }
    });

    it('should split the remainder evenly in B for five references', () => {
      const references = Array.from({ length: 5 }, (_, i) => makeCandidate(`/refs/ref${i}.wav`));
      const b = profile(blend(references), 'B').weights;

      expect(b[0]).toBeCloseTo(0.6, 6);
      for (const w of b.slice(1)) {
        expect(w).toBeCloseTo(0.1, 6);
      }
    });

    it('should honour a custom dominant share', () => {
      const c = profile(blend([r1, r2], { dominantShare: 0.75 }), 'C').weights;
      expect(c[0]).toBeCloseTo(0.25, 6);
      expect(c[1]).toBeCloseTo(0.75, 6);
    });

    it('should be deterministic', () => {
      expect(blend([r1, r2, r3])).toEqual(blend([r1, r2, r3]));
    });

    it('should reject fewer than two or more than five references', () => {
      expect(() => blend([r1])).toThrow(InvalidReferenceCountError);
      expect(() => blend([])).toThrow(InvalidReferenceCountError);
      const six: Candidate[] = Array.from({ length: 6 }, (_, i) => makeCandidate(`/refs/ref${i}.wav`));
      expect(() => blend(six)).toThrow(InvalidReferenceCountError);
    });

    it('should report the offending count', () => {
      try {
        blend([r1]);
        throw new Error('expected blend to throw');
      } catch (error: unknown) {
        expect(error).toBeInstanceOf(InvalidReferenceCountError);
        if (error instanceof InvalidReferenceCountError) {
          expect(error.count).toBe(1);
          expect(error.category).toBe('InvalidReferenceCount');
        }
      }
    });
  });

  describe('inverseLoudnessWeights', () => {
    it('should give unknown loudness the mean of the known values', () => {
      const withGap = inverseLoudnessWeights([
        makeCandidate('/r/a.wav', { loudness: -10 }),
        makeCandidate('/r/b.wav'),
        makeCandidate('/r/c.wav', { loudness: -14 }),
      ]);
      const explicit = inverseLoudnessWeights([
        makeCandidate('/r/a.wav', { loudness: -10 }),
        makeCandidate('/r/b.wav', { loudness: -12 }),
        makeCandidate('/r/c.wav', { loudness: -14 }),
      ]);

      withGap.forEach((w, i) => expect(w).toBeCloseTo(explicit[i], 9));
    });

    it('should stay finite for widely spread loudness values', () => {
      const weights = inverseLoudnessWeights([
        makeCandidate('/r/silent.wav', { loudness: -7000 }),
        makeCandidate('/r/loud.wav', { loudness: -14 }),
      ]);

      expect(weights).toEqual([1, 0]);
      expect(profile(blend([makeCandidate('/r/a.wav', { loudness: -7000 }), r3]), 'D').weights).toEqual([1, 0]);
    });

    it('should return no weights for no references', () => {
      expect(inverseLoudnessWeights([])).toEqual([]);
    });

    it('should fall back to equal weights when no loudness is known', () => {
      const weights = inverseLoudnessWeights([makeCandidate('/r/a.wav'), makeCandidate('/r/b.wav')]);
      expect(weights).toEqual([0.5, 0.5]);
    });
  });

  describe('normalizeWeights', () => {
    it('should scale to 1 with the last weight absorbing rounding', () => {
      const weights = normalizeWeights([1, 1, 1]);
      expect(weights[2]).toBe(1 - (weights[0] + weights[1]));
    });

    it('should return equal weights for an all-zero vector', () => {
      expect(normalizeWeights([0, 0])).toEqual([0.5, 0.5]);
    });

    it('should return equal weights when the total overflows', () => {
      expect(normalizeWeights([Infinity, 1])).toEqual([0.5, 0.5]);
    });

    it('should return an empty vector unchanged', () => {
      expect(normalizeWeights([])).toEqual([]);
    });
  });

  describe('validateBlendPolicy', () => {
    it('should accept shares in [0.5, 1)', () => {
      expect(validateBlendPolicy({ dominantShare: 0.5 })).toEqual({ dominantShare: 0.5 });
      expect(validateBlendPolicy({ dominantShare: 0.95 })).toEqual({ dominantShare: 0.95 });
    });

    it('should reject shares outside [0.5, 1)', () => {
      expect(() => validateBlendPolicy({ dominantShare: 0.4 })).toThrow(RangeError);
      expect(() => validateBlendPolicy({ dominantShare: 1 })).toThrow(RangeError);
      expect(() => blend([r1, r2], { dominantShare: 1.2 })).toThrow(RangeError);
    });
  });

  describe('describeBlend', () => {
    it('should render percentages with reference names', () => {
      const kick = makeCandidate('/refs/kick_ref.wav');
      const vocal = makeCandidate('/refs/vocal_ref.wav');
      const b = profile(blend([kick, vocal]), 'B');

      expect(describeBlend(b, [kick, vocal])).toBe('60% kick_ref + 40% vocal_ref');
    });
  });
});
