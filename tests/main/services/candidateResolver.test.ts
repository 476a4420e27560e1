import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  buildCandidate,
  isUrlInput,
  listCandidates,
  parsePlaylist,
  resolveInput,
  resolveReferences,
} from '../../../src/main/services/candidateResolver';
import type { ResolverOptions } from '../../../src/main/services/candidateResolver';
import type { ArchiveExtractor } from '../../../src/main/services/archiveExtractor';
import type { AudioProbe } from '../../../src/main/services/audioReader';
import { getAudioFormat } from '../../../src/main/services/audioReader';
import {
  DecodeError,
  NoCandidatesFoundError,
  UnsupportedInputError,
} from '../../../src/main/services/errors';
import { Logger } from '../../../src/main/services/logger';

// ─── Test Helpers ────────────────────────────────────────────────────────

/** Probe stand-in: track number from a leading number, genres from a lookup */
function fakeProbe(genres: Record<string, string[]> = {}): (filePath: string) => Promise<AudioProbe> {
  return async (filePath) => {
    const name = path.basename(filePath);
    const leading = /^(\d+)/.exec(name);
    return {
      format: getAudioFormat(filePath) ?? 'wav',
      duration: 120,
      genres: genres[name] ?? [],
      trackNumber: leading ? Number(leading[1]) : null,
      loudness: -11,
    };
  };
}

async function writeZip(archivePath: string, entries: string[]): Promise<void> {
  const zip = new JSZip();
  for (const entry of entries) {
    zip.file(entry, 'pcm');
  }
  fs.writeFileSync(archivePath, await zip.generateAsync({ type: 'nodebuffer' }));
}

/** Extractor stand-in that writes the given entries */
class FakeExtractor implements ArchiveExtractor {
  readonly calls: Array<[string, string]> = [];

  constructor(private readonly entries: string[]) {}

  async extract(archivePath: string, destinationDir: string): Promise<void> {
    this.calls.push([archivePath, destinationDir]);
    for (const entry of this.entries) {
      const target = path.join(destinationDir, entry);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, '');
    }
  }
}

describe('candidateResolver', () => {
  let tempDir: string;
  let logger: Logger;

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resolver-test-'));
    logger = new Logger({ writeToFile: false });
    await logger.initialize();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function touch(...segments: string[]): string {
    const filePath = path.join(tempDir, ...segments);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '');
    return filePath;
  }

  function options(overrides: Partial<ResolverOptions> = {}): ResolverOptions {
    return { probe: fakeProbe(), logger, workspaceDir: path.join(tempDir, 'work'), searchRoots: [tempDir], ...overrides };
  }

  // ─── isUrlInput ──────────────────────────────────────────────────────

  describe('isUrlInput', () => {
    it('should recognise web and streaming links', () => {
      expect(isUrlInput('https://example.test/track')).toBe(true);
      expect(isUrlInput('spotify:track:123')).toBe(true);
      expect(isUrlInput('youtu.be/abc')).toBe(true);
      expect(isUrlInput('www.youtube.com/watch?v=abc')).toBe(true);
    });

    it('should not treat queries and paths as URLs', () => {
      expect(isUrlInput('lofi chill')).toBe(false);
      expect(isUrlInput('./music/song.wav')).toBe(false);
    });
  });

  // ─── parsePlaylist ───────────────────────────────────────────────────

  describe('parsePlaylist', () => {
    it('should resolve entries against the playlist folder, skipping comments, missing files and duplicates', () => {
      const a = touch('set', 'a.wav');
      const b = touch('set', 'sub', 'b.mp3');
      touch('set', 'cover.png');
      const playlist = path.join(tempDir, 'set', 'set.m3u');

      const files = parsePlaylist(
        ['#EXTM3U', '#EXTINF:123,A', 'a.wav', '', 'sub/b.mp3', 'missing.wav', 'cover.png', 'a.wav'].join('\n'),
        playlist,
      );

      expect(files).toEqual([a, b]);
    });

    it('should read only FileN lines from .pls playlists', () => {
      const a = touch('a.wav');
      const b = touch('b.flac');
      const playlist = path.join(tempDir, 'set.pls');

      const files = parsePlaylist(
        ['[playlist]', 'File1=a.wav', 'Title1=A', `File2=${b}`, 'NumberOfEntries=2'].join('\r\n'),
        playlist,
      );

      expect(files).toEqual([a, b]);
    });
  });

  // ─── listCandidates ──────────────────────────────────────────────────

  describe('listCandidates', () => {
    it('should match base names case-insensitively in scan order', () => {
      const upper = touch('Lofi Rain.mp3');
      const lower = touch('nested', 'lofi_chill.wav');
      touch('trap.wav');

      expect(listCandidates('LOFI', [tempDir])).toEqual([upper, lower]);
    });

    it('should cap and de-duplicate results across roots', () => {
      touch('lofi1.wav');
      touch('lofi2.wav');

      expect(listCandidates('lofi', [tempDir, tempDir])).toHaveLength(2);
      expect(listCandidates('lofi', [tempDir], 1)).toHaveLength(1);
    });

    it('should skip missing roots and blank queries', () => {
      touch('a.wav');
      expect(listCandidates('a', [path.join(tempDir, 'missing')])).toEqual([]);
      expect(listCandidates('   ', [tempDir])).toEqual([]);
    });
  });

  // ─── buildCandidate ──────────────────────────────────────────────────

  describe('buildCandidate', () => {
    it('should build a frozen candidate from the probe', async () => {
      const filePath = touch('03 night.flac');
      const candidate = await buildCandidate(filePath, options({ probe: fakeProbe({ '03 night.flac': ['House'] }) }));

      expect(candidate).toEqual({
        id: filePath,
        path: filePath,
        format: 'flac',
        genre: 'house',
        duration: 120,
        trackNumber: 3,
        loudness: -11,
      });
      expect(Object.isFrozen(candidate)).toBe(true);
    });

    it('should keep the candidate when the probe cannot decode it', async () => {
      const filePath = touch('trap_beat.wav');
      const probe = async (): Promise<AudioProbe> => {
        throw new DecodeError('bad header');
      };

      const candidate = await buildCandidate(filePath, options({ probe }));

      expect(candidate).toMatchObject({ format: 'wav', genre: 'trap', duration: null, loudness: null });
      expect(logger.getWarnings()).toHaveLength(1);
      expect(logger.getWarnings()[0].candidateId).toBe(filePath);
    });

    it('should rethrow other probe failures', async () => {
      const filePath = touch('a.wav');
      const probe = async (): Promise<AudioProbe> => {
        throw new Error('EACCES');
      };

      await expect(buildCandidate(filePath, options({ probe }))).rejects.toThrow('EACCES');
    });
  });

  // ─── resolveInput ────────────────────────────────────────────────────

  describe('resolveInput', () => {
    it('should resolve a single audio file', async () => {
      const filePath = touch('song.wav');
      const resolved = await resolveInput(filePath, options());

      expect(resolved.kind).toBe('file');
      expect(resolved.root).toBe(tempDir);
      expect(resolved.candidates.map((c) => c.path)).toEqual([filePath]);
    });

    it('should resolve a folder recursively in sorted order', async () => {
      const album = path.join(tempDir, 'album');
      const files = [touch('album', '02 b.wav'), touch('album', '01 a.wav'), touch('album', 'cd2', '03 c.wav')];

      const resolved = await resolveInput(album, options());

      expect(resolved.kind).toBe('directory');
      expect(resolved.root).toBe(album);
      expect(resolved.candidates.map((c) => c.path)).toEqual([files[1], files[0], files[2]]);
      expect(resolved.candidates.map((c) => c.trackNumber)).toEqual([1, 2, 3]);
    });

    it('should extract an archive into the workspace and resolve its contents', async () => {
      const archive = touch('stems.zip');
      const extractor = new FakeExtractor(['x.wav', 'inner/y.wav']);

      const resolved = await resolveInput(archive, options({ extractor }));

      const destination = path.join(tempDir, 'work', 'extracted', 'stems');
      expect(extractor.calls).toEqual([[archive, destination]]);
      expect(resolved.kind).toBe('archive');
      expect(resolved.root).toBe(destination);
      expect(resolved.candidates.map((c) => path.relative(destination, c.path))).toEqual([
        path.join('inner', 'y.wav'),
        'x.wav',
      ]);
    });

    it('should not keep files from an earlier archive with the same name', async () => {
      const archive = path.join(tempDir, 'drop.zip');
      await writeZip(archive, ['01_x.wav', '02_y.wav', '03_z.wav']);
      const first = await resolveInput(archive, options());
      expect(first.candidates).toHaveLength(3);

      await writeZip(archive, ['beat.wav']);
      const second = await resolveInput(archive, options());

      expect(second.candidates.map((c) => path.basename(c.path))).toEqual(['beat.wav']);
      expect(fs.readdirSync(path.join(tempDir, 'work', 'extracted', 'drop'))).toEqual(['beat.wav']);
    });

    it('should resolve a playlist', async () => {
      const a = touch('a.wav');
      const playlist = path.join(tempDir, 'list.txt');
      fs.writeFileSync(playlist, 'a.wav\nmissing.wav\n');

      const resolved = await resolveInput(playlist, options());

      expect(resolved.kind).toBe('playlist');
      expect(resolved.candidates.map((c) => c.path)).toEqual([a]);
    });

    it('should fall back to a file-name query', async () => {
      const match = touch('library', 'lofi_chill.wav');
      touch('library', 'rock.wav');

      const resolved = await resolveInput('lofi', options());

      expect(resolved.kind).toBe('query');
      expect(resolved.root).toBeNull();
      expect(resolved.candidates.map((c) => c.path)).toEqual([match]);
      expect(resolved.candidates[0].genre).toBe('lofi_hip_hop');
    });

    it('should reject URLs', async () => {
      await expect(resolveInput('https://www.youtube.com/watch?v=abc', options())).rejects.toThrow(
        UnsupportedInputError,
      );
    });

    it('should reject unknown file types', async () => {
      const pdf = touch('notes.pdf');
      await expect(resolveInput(pdf, options())).rejects.toThrow('Unknown file type: .pdf');
    });

    it('should throw NoCandidatesFoundError for an empty folder or query', async () => {
      fs.mkdirSync(path.join(tempDir, 'empty'));

      await expect(resolveInput(path.join(tempDir, 'empty'), options())).rejects.toThrow(NoCandidatesFoundError);
      await expect(resolveInput('no such song', options())).rejects.toThrow(
        'No audio candidates found for "no such song"',
      );
    });
  });

  // ─── resolveReferences ───────────────────────────────────────────────

  describe('resolveReferences', () => {
    it('should resolve reference files in order', async () => {
      const r1 = touch('refs', 'kick_ref.wav');
      const r2 = touch('refs', 'vocal_ref.wav');

      const references = await resolveReferences([r2, r1], options());

      expect(references.map((r) => r.path)).toEqual([r2, r1]);
    });

    it('should reject a reference that is not an audio file', async () => {
      const folder = path.join(tempDir, 'refs');
      fs.mkdirSync(folder);

      const error = await resolveReferences([folder], options()).then(
        () => null,
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(NoCandidatesFoundError);
      if (error instanceof NoCandidatesFoundError) {
        expect(error.step).toBe('resolving_references');
        expect(error.input).toBe(folder);
      }
    });
  });
});
