/**
 * Mastering Engine Adapter
 *
 * The mastering primitive itself (matching a target to a reference) runs in
 * an external engine. This module defines the contract the dispatcher calls
 * and an HTTP client for engines exposed as a JSON service.
 *
 * POST <endpoint>/master
 *   { target, reference, config, outputPath }
 * → { outputPath, descriptors?: { integratedLoudness, spectralCentroid, dynamicRange } }
 *
 * Retries 5xx, 429 and network errors with exponential backoff.
 */

import axios from 'axios';
import type { AudioDescriptors, MasteringConfig } from '../../shared/types';
import { DecodeError, MasteringError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Reference handed to the engine: a real track or a weighted blend */
export type ReferenceInput =
  | { kind: 'track'; path: string }
  | { kind: 'blend'; label: string; sources: Array<{ path: string; weight: number }> };

export interface MasteringRequest {
  /** Candidate id of the target (used in errors) */
  candidateId: string;
  /** Path of the target audio */
  target: string;
  reference: ReferenceInput;
  config: MasteringConfig;
  /** Where the engine writes the master */
  outputPath: string;
}

export interface MasteringOutput {
  outputPath: string;
  descriptors: AudioDescriptors | null;
}

/** The external mastering primitive */
export interface MasteringEngine {
  /**
   * @throws MasteringError on DSP or transport failure
   * @throws DecodeError when the engine cannot decode an input
   */
  master(request: MasteringRequest): Promise<MasteringOutput>;
}

/** Options for the HTTP engine client */
export interface HttpMasteringEngineOptions {
  /** Engine base URL, e.g. http://127.0.0.1:8360 */
  endpoint: string;
  /** Maximum number of retries for transient failures */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff */
  baseRetryDelay?: number;
  /** HTTP timeout per request in ms */
  timeout?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_BASE_RETRY_DELAY = 1000;
/** Mastering a long track can take minutes */
const DEFAULT_TIMEOUT = 10 * 60 * 1000;

// ─── Axios Error Detection ──────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    data?: unknown;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error instanceof Error &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

function isDecodeFailure(data: unknown): boolean {
  return typeof data === 'object' && data !== null && 'error' in data && data.error === 'decode';
}

// ─── Response Mapping ───────────────────────────────────────────────────────

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Maps the engine's JSON response; unknown or missing descriptor fields
 * become null.
 *
 * @returns null when the response has no output path
 */
export function mapEngineResponse(data: unknown): MasteringOutput | null {
  if (typeof data !== 'object' || data === null) return null;
  if (!('outputPath' in data) || typeof data.outputPath !== 'string' || data.outputPath === '') {
    return null;
  }

  let descriptors: AudioDescriptors | null = null;
  if ('descriptors' in data && typeof data.descriptors === 'object' && data.descriptors !== null) {
    const raw: Record<string, unknown> = { ...data.descriptors };
    descriptors = {
      integratedLoudness: numberOrNull(raw.integratedLoudness),
      spectralCentroid: numberOrNull(raw.spectralCentroid),
      dynamicRange: numberOrNull(raw.dynamicRange),
    };
  }

  return { outputPath: data.outputPath, descriptors };
}

// ─── HTTP Engine ─────────────────────────────────────────────────────────────

/**
 * MasteringEngine backed by an HTTP service.
 */
export class HttpMasteringEngine implements MasteringEngine {
  private readonly endpoint: string;
  private readonly maxRetries: number;
  private readonly baseRetryDelay: number;
  private readonly timeout: number;

  constructor(options: HttpMasteringEngineOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseRetryDelay = options.baseRetryDelay ?? DEFAULT_BASE_RETRY_DELAY;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  async master(request: MasteringRequest): Promise<MasteringOutput> {
    const context = { candidateId: request.candidateId, step: 'mastering' };
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        // Exponential backoff: baseDelay * 2^(attempt-1)
        const delay = this.baseRetryDelay * Math.pow(2, attempt - 1);
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
      }

      try {
        const response = await axios.post<unknown>(
          `${this.endpoint}/master`,
          {
            target: request.target,
            reference: request.reference,
            config: request.config,
            outputPath: request.outputPath,
          },
          {
            headers: { Accept: 'application/json' },
            timeout: this.timeout,
          },
        );

        const output = mapEngineResponse(response.data);
        if (!output) {
          throw new MasteringError('Mastering engine returned a response without an output path', context);
        }
        return output;
      } catch (error: unknown) {
        if (error instanceof MasteringError) {
          throw error;
        }

        if (isAxiosLikeError(error)) {
          const status = error.response?.status;

          if (status === 422 && isDecodeFailure(error.response?.data)) {
            throw new DecodeError(`Mastering engine could not decode "${request.target}"`, {
              ...context,
              cause: error,
            });
          }

          // 4xx other than 429 will not get better on retry
          if (status && status >= 400 && status < 500 && status !== 429) {
            throw new MasteringError(`Mastering engine rejected the request (${status})`, {
              ...context,
              statusCode: status,
              cause: error,
            });
          }

          lastError = new MasteringError(`Mastering engine request failed: ${error.message}`, {
            ...context,
            statusCode: status,
            cause: error,
          });
        } else if (error instanceof Error) {
          lastError = error;
        } else {
          lastError = new Error(String(error));
        }
      }
    }

    const statusCode = lastError instanceof MasteringError ? lastError.statusCode ?? undefined : undefined;
    throw new MasteringError(
      `Mastering engine request failed after ${this.maxRetries + 1} attempts: ${lastError?.message ?? 'unknown error'}`,
      { ...context, statusCode, cause: lastError ?? undefined },
    );
  }
}
