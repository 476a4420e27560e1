/**
 * Candidate Resolver
 *
 * Turns a raw input (audio file, folder, .zip archive, playlist or free-text
 * query) into an ordered list of probed, frozen Candidates.
 *
 * Detection order:
 * 1. existing audio file     → 'file'
 * 2. existing .zip           → 'archive' (extracted, then scanned)
 * 3. existing playlist       → 'playlist' (.m3u/.m3u8/.pls/.txt)
 * 4. existing folder         → 'directory' (recursive scan)
 * 5. URL                     → UnsupportedInputError
 * 6. anything else           → 'query' (file-name search in the search roots)
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Candidate, InputKind, ResolvedInput } from '../../shared/types';
import { isArchiveFile, isPlaylistFile, isSupportedAudioFile, sanitizeFilename, scanDirectoryForAudioFiles } from '../utils/fileScanner';
import { ZipExtractor } from './archiveExtractor';
import type { ArchiveExtractor } from './archiveExtractor';
import { getAudioFormat, probeAudioFile } from './audioReader';
import type { AudioProbe } from './audioReader';
import { NoCandidatesFoundError, UnsupportedInputError, isPipelineError } from './errors';
import { inferGenreTag } from './genreDetector';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface ResolverOptions {
  /** Extracts archives. Defaults to ZipExtractor */
  extractor?: ArchiveExtractor;
  /** Folder that receives extracted archives. Defaults to <tmp>/master-dispatch */
  workspaceDir?: string;
  /** Folders searched for queries. Defaults to getDefaultSearchRoots() */
  searchRoots?: string[];
  /** Cap on query matches. Defaults to 200 */
  maxQueryResults?: number;
  /** Probe used for metadata. Defaults to probeAudioFile */
  probe?: (filePath: string) => Promise<AudioProbe>;
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_MAX_QUERY_RESULTS = 200;

const URL_PATTERN = /^(https?:\/\/|spotify:|(www\.)?youtube\.com|youtu\.be)/i;

const PLS_FILE_LINE = /^File\d+=(.+)$/i;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Folders searched for free-text queries: ~/Music, ~/Downloads, ~/Desktop, cwd.
 */
export function getDefaultSearchRoots(): string[] {
  const home = os.homedir();
  return [
    path.join(home, 'Music'),
    path.join(home, 'Downloads'),
    path.join(home, 'Desktop'),
    process.cwd(),
  ];
}

export function isUrlInput(raw: string): boolean {
  return URL_PATTERN.test(raw.trim());
}

/**
 * Parses playlist text into the audio files it names.
 * Entries are resolved against `baseDir`; missing or non-audio entries and
 * duplicates are dropped. `.pls` files contribute their `FileN=` lines only.
 */
export function parsePlaylist(content: string, playlistPath: string): string[] {
  const baseDir = path.dirname(playlistPath);
  const isPls = path.extname(playlistPath).toLowerCase() === '.pls';
  const seen = new Set<string>();
  const files: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    let entry = line;
    if (isPls) {
      const match = PLS_FILE_LINE.exec(line);
      if (!match) continue;
      entry = match[1].trim();
    }

    const resolved = path.resolve(baseDir, entry);
    if (seen.has(resolved) || !isSupportedAudioFile(resolved) || !fs.existsSync(resolved)) {
      continue;
    }
    seen.add(resolved);
    files.push(resolved);
  }

  return files;
}

/**
 * Finds audio files whose base name contains `query` (case-insensitive).
 * Roots are searched in order; results keep that order and are de-duplicated.
 */
export function listCandidates(
  query: string,
  searchRoots: readonly string[] = getDefaultSearchRoots(),
  maxResults: number = DEFAULT_MAX_QUERY_RESULTS,
): string[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [];

  const seen = new Set<string>();
  const matches: string[] = [];

  for (const root of searchRoots) {
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) continue;

    for (const file of scanDirectoryForAudioFiles(root)) {
      if (seen.has(file)) continue;
      if (path.basename(file).toLowerCase().includes(needle)) {
        seen.add(file);
        matches.push(file);
        if (matches.length >= maxResults) {
          return matches;
        }
      }
    }
  }

  return matches;
}

/**
 * Probes a file and builds its Candidate. A failed probe is logged and the
 * candidate is kept with the metadata it can get from the file name.
 */
export async function buildCandidate(filePath: string, options: ResolverOptions = {}): Promise<Candidate> {
  const absolute = path.resolve(filePath);
  const probe = options.probe ?? probeAudioFile;

  let probed: AudioProbe | null = null;
  try {
    probed = await probe(absolute);
  } catch (error: unknown) {
    if (!isPipelineError(error) || error.category !== 'DecodeError') {
      throw error;
    }
    options.logger?.warn(`Metadata probe failed, using file name only: ${error.message}`, {
      candidateId: absolute,
      step: 'probing',
    });
  }

  const format = probed?.format ?? getAudioFormat(absolute);
  if (format === null) {
    throw new UnsupportedInputError(`Not a supported audio file: ${absolute}`, { candidateId: absolute });
  }

  const candidate: Candidate = {
    id: absolute,
    path: absolute,
    format,
    genre: inferGenreTag(absolute, probed?.genres ?? []),
    duration: probed?.duration ?? null,
    trackNumber: probed?.trackNumber ?? null,
    loudness: probed?.loudness ?? null,
  };
  return Object.freeze(candidate);
}

async function buildCandidates(filePaths: string[], options: ResolverOptions): Promise<Candidate[]> {
  const candidates: Candidate[] = [];
  for (const filePath of filePaths) {
    candidates.push(await buildCandidate(filePath, options));
  }
  return candidates;
}

// ─── Resolution ──────────────────────────────────────────────────────────────

async function extractArchive(archivePath: string, options: ResolverOptions): Promise<string> {
  const extractor = options.extractor ?? new ZipExtractor();
  const workspace = options.workspaceDir ?? path.join(os.tmpdir(), 'master-dispatch');
  const stem = sanitizeFilename(path.basename(archivePath, path.extname(archivePath))) || 'archive';
  const destination = path.join(workspace, 'extracted', stem);

  options.logger?.info(`Extracting archive to ${destination}`, { candidateId: archivePath, step: 'extracting' });
  // Leftovers from an earlier archive with the same name must not be classified
  await fs.promises.rm(destination, { recursive: true, force: true });
  await extractor.extract(archivePath, destination);
  return destination;
}

async function locate(raw: string, options: ResolverOptions): Promise<{ kind: InputKind; root: string | null; files: string[] }> {
  const trimmed = raw.trim();
  const absolute = path.resolve(trimmed);
  const stat = trimmed && fs.existsSync(absolute) ? fs.statSync(absolute) : null;

  if (stat?.isFile()) {
    if (isSupportedAudioFile(absolute)) {
      return { kind: 'file', root: path.dirname(absolute), files: [absolute] };
    }
    if (isArchiveFile(absolute)) {
      const extracted = await extractArchive(absolute, options);
      return { kind: 'archive', root: extracted, files: scanDirectoryForAudioFiles(extracted) };
    }
    if (isPlaylistFile(absolute)) {
      const content = await fs.promises.readFile(absolute, 'utf-8');
      return { kind: 'playlist', root: path.dirname(absolute), files: parsePlaylist(content, absolute) };
    }
    throw new UnsupportedInputError(`Unknown file type: ${path.extname(absolute) || path.basename(absolute)}`, {
      candidateId: absolute,
    });
  }

  if (stat?.isDirectory()) {
    const files = scanDirectoryForAudioFiles(absolute, (dir, error) => {
      options.logger?.warn(`Could not read folder: ${error instanceof Error ? error.message : String(error)}`, {
        candidateId: dir,
        step: 'resolving',
      });
    });
    return { kind: 'directory', root: absolute, files };
  }

  if (isUrlInput(trimmed)) {
    throw new UnsupportedInputError(`URL inputs are not supported: ${trimmed}`);
  }

  const files = listCandidates(trimmed, options.searchRoots ?? getDefaultSearchRoots(), options.maxQueryResults);
  return { kind: 'query', root: null, files };
}

/**
 * Resolves a raw input into candidates.
 *
 * @throws NoCandidatesFoundError when nothing resolves
 * @throws UnsupportedInputError for URLs and unknown file types
 */
export async function resolveInput(raw: string, options: ResolverOptions = {}): Promise<ResolvedInput> {
  const located = await locate(raw, options);
  options.logger?.info(`Resolved "${raw}" as ${located.kind} with ${located.files.length} audio file(s)`, {
    step: 'resolving',
  });

  if (located.files.length === 0) {
    throw new NoCandidatesFoundError(raw);
  }

  return {
    kind: located.kind,
    root: located.root,
    candidates: await buildCandidates(located.files, options),
  };
}

/**
 * Resolves reference arguments. Each must be an existing audio file.
 *
 * @throws NoCandidatesFoundError for a reference that is not an audio file
 */
export async function resolveReferences(raws: readonly string[], options: ResolverOptions = {}): Promise<Candidate[]> {
  const references: Candidate[] = [];
  for (const raw of raws) {
    const absolute = path.resolve(raw.trim());
    if (!fs.existsSync(absolute) || !fs.statSync(absolute).isFile() || !isSupportedAudioFile(absolute)) {
      throw new NoCandidatesFoundError(raw, { step: 'resolving_references' });
    }
    references.push(await buildCandidate(absolute, options));
  }
  return references;
}
