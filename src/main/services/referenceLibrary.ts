/**
 * Reference library: a folder of reference tracks named after genre tags,
 * e.g. `trap.wav`, `lofi_hip_hop.flac`, plus an optional `general.*` used
 * when no genre-specific reference exists.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { GenreTag } from '../../shared/types';
import { scanDirectoryForAudioFiles } from '../utils/fileScanner';
import { DEFAULT_PRESET_NAME } from './presets';

/** Supplies a reference track when none was given */
export interface ReferenceLibrary {
  /** Reference path for a genre, or null if the library has none */
  findReference(genre: GenreTag | null): string | null;
}

/**
 * ReferenceLibrary over a folder. The folder is scanned once, on first lookup.
 * When two files share a stem, the first in sorted order wins.
 */
export class FolderReferenceLibrary implements ReferenceLibrary {
  private readonly dir: string;
  private index: Map<string, string> | null = null;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  getDir(): string {
    return this.dir;
  }

  findReference(genre: GenreTag | null): string | null {
    const index = this.getIndex();
    if (genre !== null) {
      const match = index.get(genre);
      if (match) return match;
    }
    return index.get(DEFAULT_PRESET_NAME) ?? null;
  }

  private getIndex(): Map<string, string> {
    if (this.index) return this.index;

    const index = new Map<string, string>();
    if (fs.existsSync(this.dir)) {
      for (const file of scanDirectoryForAudioFiles(this.dir)) {
        const stem = path.basename(file, path.extname(file)).trim().toLowerCase().replace(/[\s-]+/g, '_');
        if (!index.has(stem)) {
          index.set(stem, file);
        }
      }
    }
    this.index = index;
    return index;
  }
}
