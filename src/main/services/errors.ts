/**
 * Error classes for master-dispatch.
 *
 * Every failure carries its kind (category) and, where one exists, the
 * offending candidate id so the report never drops a failure silently.
 */

/**
 * Error categories. One per failure kind the dispatcher and CLI surface.
 */
export type ErrorCategory =
  | 'NoCandidatesFound'
  | 'InvalidReferenceCount'
  | 'TooManyReferences'
  | 'InsufficientReferences'
  | 'MissingReference'
  | 'MasteringError'
  | 'DecodeError'
  | 'BatchFailed'
  | 'UnsupportedInput'
  | 'UnknownPreset'
  | 'ArchiveError';

/** Context shared by every error constructor */
export interface PipelineErrorOptions {
  candidateId?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all pipeline errors.
 */
export class PipelineError extends Error {
  readonly category: ErrorCategory;
  /** Candidate being processed when the error occurred */
  readonly candidateId: string | null;
  /** Processing step where the error occurred */
  readonly step: string;
  readonly cause: Error | null;
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: PipelineErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.candidateId = options?.candidateId ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Structured representation for log files and reports.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    candidateId: string | null;
    step: string;
    timestamp: string;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      candidateId: this.candidateId,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * One-line message for the terminal (no stack trace).
   */
  toUserMessage(): string {
    const candidateInfo = this.candidateId ? ` [${this.candidateId}]` : '';
    return `${this.category}${candidateInfo}: ${this.message}`;
  }
}

/** The resolver produced an empty candidate set. */
export class NoCandidatesFoundError extends PipelineError {
  /** The raw input that resolved to nothing */
  readonly input: string;

  constructor(input: string, options?: PipelineErrorOptions) {
    super(`No audio candidates found for "${input}"`, 'NoCandidatesFound', {
      step: 'resolving',
      ...options,
    });
    this.input = input;
  }
}

type ReferenceCountCategory = 'InvalidReferenceCount' | 'TooManyReferences' | 'InsufficientReferences';

/**
 * A reference list outside the accepted 2-5 range.
 */
export class InvalidReferenceCountError extends PipelineError {
  readonly count: number;

  constructor(
    count: number,
    message: string = `Blending needs 2 to 5 references, got ${count}`,
    category: ReferenceCountCategory = 'InvalidReferenceCount',
    options?: PipelineErrorOptions,
  ) {
    super(message, category, { step: 'blending', ...options });
    this.count = count;
  }
}

/** More than five references were supplied. */
export class TooManyReferencesError extends InvalidReferenceCountError {
  constructor(count: number, options?: PipelineErrorOptions) {
    super(count, `At most 5 references are supported, got ${count}`, 'TooManyReferences', {
      step: 'classifying',
      ...options,
    });
  }
}

/**
 * Blending was requested with fewer than two references.
 * The caller has to pick single mastering explicitly.
 */
export class InsufficientReferencesError extends InvalidReferenceCountError {
  constructor(count: number, options?: PipelineErrorOptions) {
    super(
      count,
      `Blending needs at least 2 references, got ${count}; use single mastering instead`,
      'InsufficientReferences',
      { step: 'classifying', ...options },
    );
  }
}

/** No reference was supplied and the reference library had none for the genre. */
export class MissingReferenceError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'MissingReference', { step: 'mastering', ...options });
  }
}

/** The mastering engine failed (DSP, transport or engine-side error). */
export class MasteringError extends PipelineError {
  /** HTTP status code (if the engine is remote) */
  readonly statusCode: number | null;

  constructor(message: string, options?: PipelineErrorOptions & { statusCode?: number }) {
    super(message, 'MasteringError', { step: 'mastering', ...options });
    this.statusCode = options?.statusCode ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & { statusCode: number | null } {
    return {
      ...super.toLogObject(),
      statusCode: this.statusCode,
    };
  }
}

/** The audio could not be decoded. */
export class DecodeError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'DecodeError', { step: 'decoding', ...options });
  }
}

/** Every unit of a fan-out failed. */
export class BatchFailedError extends PipelineError {
  readonly failureCount: number;

  constructor(failureCount: number, strategy: string, options?: PipelineErrorOptions) {
    super(`All ${failureCount} ${strategy} units failed`, 'BatchFailed', {
      step: 'dispatching',
      ...options,
    });
    this.failureCount = failureCount;
  }
}

/** Input the resolver recognises but does not handle (URLs). */
export class UnsupportedInputError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'UnsupportedInput', { step: 'resolving', ...options });
  }
}

/** A preset override named a preset that does not exist. */
export class UnknownPresetError extends PipelineError {
  readonly presetName: string;

  constructor(presetName: string, available: readonly string[]) {
    super(`Unknown preset "${presetName}". Available: ${available.join(', ')}`, 'UnknownPreset', {
      step: 'configuring',
    });
    this.presetName = presetName;
  }
}

/** Archive extraction failed. */
export class ArchiveError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ArchiveError', { step: 'extracting', ...options });
  }
}

/**
 * Type guard for PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Re-creates an engine or decode error that lacks a candidate id with the
 * given one. Other errors are returned unchanged.
 */
function withCandidate(error: PipelineError, candidateId: string | undefined): PipelineError {
  if (error.candidateId !== null || !candidateId) {
    return error;
  }
  const options = { candidateId, step: error.step, cause: error.cause ?? error };
  if (error instanceof DecodeError) {
    return new DecodeError(error.message, options);
  }
  if (error instanceof MasteringError) {
    return new MasteringError(error.message, { ...options, statusCode: error.statusCode ?? undefined });
  }
  return error;
}

/**
 * Wraps an arbitrary thrown value in a PipelineError of the given category.
 * PipelineErrors are returned as they are, with the candidate id filled in
 * when they had none.
 *
 * Only the per-unit categories (engine and decoder failures) are wrapped;
 * anything else is reported as a MasteringError.
 */
export function wrapError(
  error: unknown,
  category: 'MasteringError' | 'DecodeError',
  options?: { candidateId?: string; step?: string },
): PipelineError {
  if (error instanceof PipelineError) {
    return withCandidate(error, options?.candidateId);
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'DecodeError':
      return new DecodeError(message, { ...options, cause });
    case 'MasteringError':
      return new MasteringError(message, { ...options, cause });
  }
}
