/**
 * Archive Extraction
 *
 * Extracts dropped .zip archives in-process with jszip so the extracted
 * folder can be resolved and classified like any other folder.
 */

import * as fs from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import { ArchiveError } from './errors';

/** Extracts an archive into a folder */
export interface ArchiveExtractor {
  extract(archivePath: string, destinationDir: string): Promise<void>;
}

/**
 * Target path of one archive entry, or null for entries that would land
 * outside the destination (absolute paths, `..` segments).
 */
export function entryTargetPath(destinationDir: string, entryName: string): string | null {
  const root = path.resolve(destinationDir);
  const target = path.resolve(root, entryName);
  if (target === root || !target.startsWith(root + path.sep)) {
    return null;
  }
  return target;
}

/**
 * ArchiveExtractor backed by jszip. Entries that would escape the
 * destination are rejected.
 */
export class ZipExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destinationDir: string): Promise<void> {
    if (!fs.existsSync(archivePath)) {
      throw new ArchiveError(`Archive not found: ${archivePath}`, { candidateId: archivePath });
    }

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(await fs.promises.readFile(archivePath));
    } catch (error: unknown) {
      throw new ArchiveError(
        `Extraction failed for "${path.basename(archivePath)}": ${error instanceof Error ? error.message : String(error)}`,
        { candidateId: archivePath, cause: error instanceof Error ? error : undefined },
      );
    }

    await fs.promises.mkdir(destinationDir, { recursive: true });

    for (const entry of Object.values(zip.files)) {
      const target = entryTargetPath(destinationDir, entry.name);
      if (target === null) {
        if (entry.dir) continue;
        throw new ArchiveError(`Archive entry escapes the extraction folder: ${entry.name}`, {
          candidateId: archivePath,
        });
      }
      if (entry.dir) {
        await fs.promises.mkdir(target, { recursive: true });
        continue;
      }
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, await entry.async('nodebuffer'));
    }
  }
}
