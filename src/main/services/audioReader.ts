/**
 * Audio Reader Service
 *
 * Probes audio files with the music-metadata library: duration, embedded
 * genre tags, track number and a ReplayGain-derived loudness estimate.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as mm from 'music-metadata';
import { SUPPORTED_EXTENSIONS } from '../../shared/types';
import type { AudioFormat } from '../../shared/types';
import { DecodeError } from './errors';

/** What a probe learns about a file */
export interface AudioProbe {
  format: AudioFormat;
  /** Duration in seconds */
  duration: number | null;
  /** Embedded genre tags (may be empty) */
  genres: string[];
  trackNumber: number | null;
  /** Integrated loudness estimate in LUFS */
  loudness: number | null;
}

/** ReplayGain 2.0 reference level */
const REPLAYGAIN_REFERENCE_LUFS = -18;

const FORMATS: Record<string, AudioFormat> = {
  '.wav': 'wav',
  '.mp3': 'mp3',
  '.flac': 'flac',
  '.aiff': 'aiff',
  '.aif': 'aif',
  '.ogg': 'ogg',
  '.m4a': 'm4a',
  '.wma': 'wma',
  '.opus': 'opus',
};

/**
 * Maps a file extension to its AudioFormat.
 * @returns null if the extension is not a supported audio format
 */
export function getAudioFormat(filePath: string): AudioFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(ext)) {
    return null;
  }
  return FORMATS[ext] ?? null;
}

/**
 * Converts a ReplayGain track gain back into the loudness it was computed from.
 * A track at -18 LUFS has 0 dB gain; louder tracks have negative gain.
 */
export function loudnessFromReplayGain(gainDb: number): number {
  return REPLAYGAIN_REFERENCE_LUFS - gainDb;
}

/**
 * Probes one audio file.
 *
 * @throws DecodeError if the file is missing, unsupported or unparseable
 */
export async function probeAudioFile(filePath: string): Promise<AudioProbe> {
  if (!fs.existsSync(filePath)) {
    throw new DecodeError(`File not found: ${filePath}`, { candidateId: filePath, step: 'probing' });
  }

  const format = getAudioFormat(filePath);
  if (format === null) {
    throw new DecodeError(`Unsupported audio format: ${path.extname(filePath)}`, {
      candidateId: filePath,
      step: 'probing',
    });
  }

  let metadata: mm.IAudioMetadata;
  try {
    metadata = await mm.parseFile(filePath, {
      duration: true,
      skipCovers: true,
    });
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new DecodeError(`Failed to parse "${path.basename(filePath)}": ${cause.message}`, {
      candidateId: filePath,
      step: 'probing',
      cause,
    });
  }

  return mapToProbe(format, metadata);
}

function mapToProbe(format: AudioFormat, metadata: mm.IAudioMetadata): AudioProbe {
  const common = metadata.common;
  const gain = common.replaygain_track_gain?.dB;

  return {
    format,
    duration: metadata.format.duration ?? null,
    genres: common.genre ?? [],
    trackNumber: common.track.no ?? null,
    loudness: typeof gain === 'number' && Number.isFinite(gain) ? loudnessFromReplayGain(gain) : null,
  };
}
