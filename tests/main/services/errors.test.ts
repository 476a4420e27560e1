import { describe, it, expect } from 'vitest';
import {
  ArchiveError,
  BatchFailedError,
  DecodeError,
  InsufficientReferencesError,
  InvalidReferenceCountError,
  MasteringError,
  MissingReferenceError,
  NoCandidatesFoundError,
  PipelineError,
  TooManyReferencesError,
  UnknownPresetError,
  UnsupportedInputError,
  isPipelineError,
  wrapError,
} from '../../../src/main/services/errors';

describe('errors', () => {
  describe('PipelineError subclasses', () => {
    it('should carry category, default step and name', () => {
      const cases: Array<[PipelineError, string, string]> = [
        [new NoCandidatesFoundError('lofi'), 'NoCandidatesFound', 'resolving'],
        [new InvalidReferenceCountError(6), 'InvalidReferenceCount', 'blending'],
        [new TooManyReferencesError(6), 'TooManyReferences', 'classifying'],
        [new InsufficientReferencesError(1), 'InsufficientReferences', 'classifying'],
        [new MissingReferenceError('none'), 'MissingReference', 'mastering'],
        [new MasteringError('boom'), 'MasteringError', 'mastering'],
        [new DecodeError('bad'), 'DecodeError', 'decoding'],
        [new BatchFailedError(3, 'batch'), 'BatchFailed', 'dispatching'],
        [new UnsupportedInputError('url'), 'UnsupportedInput', 'resolving'],
        [new UnknownPresetError('x', ['general']), 'UnknownPreset', 'configuring'],
        [new ArchiveError('corrupt'), 'ArchiveError', 'extracting'],
      ];

      for (const [error, category, step] of cases) {
        expect(error).toBeInstanceOf(PipelineError);
        expect(error).toBeInstanceOf(Error);
        expect(error.category).toBe(category);
        expect(error.name).toBe(category);
        expect(error.step).toBe(step);
        expect(error.candidateId).toBeNull();
      }
    });

    it('should keep the reference-count hierarchy', () => {
      expect(new TooManyReferencesError(7)).toBeInstanceOf(InvalidReferenceCountError);
      expect(new InsufficientReferencesError(1)).toBeInstanceOf(InvalidReferenceCountError);
      expect(new TooManyReferencesError(7).count).toBe(7);
    });

    it('should build descriptive messages', () => {
      expect(new NoCandidatesFoundError('lofi').message).toBe('No audio candidates found for "lofi"');
      expect(new InvalidReferenceCountError(6).message).toBe('Blending needs 2 to 5 references, got 6');
      expect(new BatchFailedError(3, 'album').message).toBe('All 3 album units failed');
      expect(new UnknownPresetError('warp', ['general', 'pop']).message).toBe(
        'Unknown preset "warp". Available: general, pop',
      );
    });

    it('should let options override the step', () => {
      const error = new NoCandidatesFoundError('ref.wav', { step: 'resolving_references' });
      expect(error.step).toBe('resolving_references');
      expect(error.input).toBe('ref.wav');
    });
  });

  describe('toLogObject / toUserMessage', () => {
    it('should serialise the context', () => {
      const error = new DecodeError('bad header', { candidateId: '/music/a.wav', cause: new Error('EOF') });
      const log = error.toLogObject();

      expect(log).toMatchObject({
        category: 'DecodeError',
        message: 'bad header',
        candidateId: '/music/a.wav',
        step: 'decoding',
        cause: 'EOF',
      });
      expect(log.timestamp).toBe(error.timestamp.toISOString());
    });

    it('should include the status code for engine errors', () => {
      expect(new MasteringError('rejected', { statusCode: 400 }).toLogObject().statusCode).toBe(400);
      expect(new MasteringError('offline').toLogObject().statusCode).toBeNull();
    });

    it('should format a one-line user message', () => {
      expect(new MasteringError('offline', { candidateId: '/music/a.wav' }).toUserMessage()).toBe(
        'MasteringError [/music/a.wav]: offline',
      );
      expect(new NoCandidatesFoundError('lofi').toUserMessage()).toBe(
        'NoCandidatesFound: No audio candidates found for "lofi"',
      );
    });
  });

  describe('isPipelineError', () => {
    it('should distinguish pipeline errors', () => {
      expect(isPipelineError(new MasteringError('x'))).toBe(true);
      expect(isPipelineError(new Error('x'))).toBe(false);
      expect(isPipelineError('x')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('should wrap a plain Error in the requested category', () => {
      const cause = new Error('socket hang up');
      const wrapped = wrapError(cause, 'MasteringError', { candidateId: '/music/a.wav', step: 'mastering' });

      expect(wrapped).toBeInstanceOf(MasteringError);
      expect(wrapped.message).toBe('socket hang up');
      expect(wrapped.candidateId).toBe('/music/a.wav');
      expect(wrapped.cause).toBe(cause);
    });

    it('should wrap non-Error values', () => {
      const wrapped = wrapError('weird', 'DecodeError');
      expect(wrapped).toBeInstanceOf(DecodeError);
      expect(wrapped.message).toBe('weird');
    });

    it('should fall back to a generic message for an empty one', () => {
      expect(wrapError(new Error(''), 'MasteringError').message).toBe('Unknown error');
    });

    it('should return a PipelineError that already has a candidate unchanged', () => {
      const original = new DecodeError('bad', { candidateId: '/music/a.wav' });
      expect(wrapError(original, 'MasteringError', { candidateId: '/music/b.wav' })).toBe(original);
    });

    it('should fill in the candidate id of engine errors', () => {
      const original = new MasteringError('rejected', { statusCode: 400 });
      const wrapped = wrapError(original, 'MasteringError', { candidateId: '/music/a.wav' });

      expect(wrapped).toBeInstanceOf(MasteringError);
      expect(wrapped.candidateId).toBe('/music/a.wav');
      expect(wrapped.cause).toBe(original);
      if (wrapped instanceof MasteringError) {
        expect(wrapped.statusCode).toBe(400);
      }
    });

    it('should keep the category of other pipeline errors', () => {
      const original = new MissingReferenceError('none');
      expect(wrapError(original, 'MasteringError', { candidateId: '/music/a.wav' })).toBe(original);
    });
  });
});
