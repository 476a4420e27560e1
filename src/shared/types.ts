/**
 * Shared type definitions for master-dispatch.
 * Used by the resolver, classifier, blender, dispatcher and CLI.
 */

/** Supported audio file formats */
export type AudioFormat = 'wav' | 'mp3' | 'flac' | 'aiff' | 'aif' | 'ogg' | 'm4a' | 'wma' | 'opus';

/** Supported audio file extensions (with dot prefix) */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.wav',
  '.mp3',
  '.flac',
  '.aiff',
  '.aif',
  '.ogg',
  '.m4a',
  '.wma',
  '.opus',
] as const;

/** Playlist files whose entries are resolved relative to the playlist folder */
export const PLAYLIST_EXTENSIONS: readonly string[] = ['.m3u', '.m3u8', '.pls', '.txt'] as const;

/** Archive files that are extracted before classification */
export const ARCHIVE_EXTENSIONS: readonly string[] = ['.zip'] as const;

/** Finite set of genre tags inferred from file names and embedded tags */
export const GENRE_TAGS = [
  'pop',
  'trap',
  'gangsta_rap',
  'funk',
  'rnb_soul',
  'drill',
  'afrobeat',
  'reggaeton',
  'lofi_hip_hop',
  'boom_bap',
  'phonk',
  'jazz_fusion',
  'metal',
  'ambient',
  'house',
  'dubstep',
  'hip_hop',
  'electronic',
  'rock',
  'classical',
] as const;

export type GenreTag = (typeof GENRE_TAGS)[number];

/** A resolved audio source. Frozen once the resolver returns it. */
export interface Candidate {
  /** Stable identifier (absolute path) */
  readonly id: string;
  /** Absolute path to the audio file */
  readonly path: string;
  readonly format: AudioFormat;
  /** Inferred genre, null when nothing matched */
  readonly genre: GenreTag | null;
  /** Duration in seconds */
  readonly duration: number | null;
  /** Track number from embedded tags */
  readonly trackNumber: number | null;
  /** Integrated loudness in LUFS, when known */
  readonly loudness: number | null;
}

/** Shape of the raw input the resolver recognised */
export type InputKind = 'file' | 'directory' | 'archive' | 'playlist' | 'query';

/** Output of the candidate resolver */
export interface ResolvedInput {
  kind: InputKind;
  /** Folder the candidates were found in (null for queries) */
  root: string | null;
  candidates: Candidate[];
}

/** Engine configuration bundle (a preset) */
export interface MasteringConfig {
  /** Preset key */
  name: string;
  /** Limiter threshold, in (0, 1] */
  threshold: number;
  limiter: boolean;
  normalize: boolean;
  rmsCorrectionSteps: number;
  lowessFrac: number | null;
}

/** Reference material shared by a plan */
export type ReferenceSource =
  | { kind: 'track'; candidate: Candidate }
  | { kind: 'blend'; references: Candidate[] };

/** Candidates sharing one inferred genre (and therefore one preset) */
export interface GenreGroup {
  genre: GenreTag | null;
  candidates: Candidate[];
}

export interface SingleMasterPlan {
  strategy: 'single';
  target: Candidate;
  /** null means the reference still has to be supplied */
  reference: ReferenceSource | null;
  presetOverride: string | null;
}

export interface BatchMasterPlan {
  strategy: 'batch';
  candidates: Candidate[];
  groups: GenreGroup[];
  reference: ReferenceSource | null;
  presetOverride: string | null;
}

export interface AlbumMasterPlan {
  strategy: 'album';
  candidates: Candidate[];
  albumName: string;
  reference: ReferenceSource | null;
  presetOverride: string | null;
}

export interface BlendedMasterPlan {
  strategy: 'blended';
  target: Candidate;
  references: Candidate[];
  presetOverride: string | null;
}

/** What to run, produced by the classifier and consumed once by the dispatcher */
export type ProcessingPlan = SingleMasterPlan | BatchMasterPlan | AlbumMasterPlan | BlendedMasterPlan;

export type Strategy = ProcessingPlan['strategy'];

/** Blend profile labels, in output order */
export const BLEND_LABELS = ['A', 'B', 'C', 'D'] as const;

export type BlendLabel = (typeof BLEND_LABELS)[number];

export type BlendStrategy = 'equal' | 'first-dominant' | 'last-dominant' | 'inverse-loudness';

/** Synthetic reference: weights over the ordered reference list */
export interface ReferenceProfile {
  label: BlendLabel;
  strategy: BlendStrategy;
  /** Non-negative, sums to 1 */
  weights: number[];
}

/** Coarse descriptors reported by the mastering engine for its output */
export interface AudioDescriptors {
  /** Integrated loudness, LUFS */
  integratedLoudness: number | null;
  /** Spectral centroid, Hz */
  spectralCentroid: number | null;
  /** Loudness range / crest, dB */
  dynamicRange: number | null;
}

/** Output of one mastering call */
export interface MasteredTrack {
  candidateId: string;
  candidate: Candidate;
  strategy: Strategy;
  /** Blend profile used, if any */
  profile: ReferenceProfile | null;
  /** Reference track id when a single track was the reference */
  referenceId: string | null;
  preset: MasteringConfig;
  outputPath: string;
  descriptors: AudioDescriptors | null;
}

/** Ordered album with its cohesion score (0-100) */
export interface AlbumSequence {
  tracks: MasteredTrack[];
  cohesion: number;
}

/** Progress update emitted by the dispatcher */
export interface ProgressUpdate {
  totalUnits: number;
  processedUnits: number;
  successCount: number;
  errorCount: number;
  /** Unit currently starting, e.g. "song.wav" or "song.wav [B]" */
  currentUnit: string | null;
  /** Estimated time remaining in seconds */
  estimatedTimeRemaining: number | null;
}

/** Application settings */
export interface AppSettings {
  /** Root of the per-run output tree */
  outputDir: string;
  /** Number of concurrent mastering calls */
  concurrency: number;
  /** Base URL of the mastering engine */
  masteringEndpoint: string;
  /** Folder holding per-genre reference tracks (null = none) */
  referenceLibraryDir: string | null;
  /** Folders searched for free-text queries (empty = built-in defaults) */
  searchRoots: string[];
  /** Weight of the dominant reference in blend profiles B and C */
  blendDominantShare: number;
  /** Share of numbered file names that marks a folder as an album */
  numberedRatio: number;
  /** Smallest flat folder treated as an album */
  albumMinTracks: number;
  /** Largest flat folder treated as an album */
  albumMaxTracks: number;
  /** Whether to store a summary of each run in the history database */
  recordHistory: boolean;
  /** Log directory (null = platform default) */
  logDir: string | null;
}

/** Default application settings */
export const DEFAULT_SETTINGS: AppSettings = {
  outputDir: './mastered',
  concurrency: 4,
  masteringEndpoint: 'http://127.0.0.1:8360',
  referenceLibraryDir: null,
  searchRoots: [],
  blendDominantShare: 0.6,
  numberedRatio: 0.6,
  albumMinTracks: 3,
  albumMaxTracks: 30,
  recordHistory: true,
  logDir: null,
};
