/**
 * File Scanner Utility
 *
 * Extension checks, recursive audio scans and output-name helpers.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ARCHIVE_EXTENSIONS, PLAYLIST_EXTENSIONS, SUPPORTED_EXTENSIONS } from '../../shared/types';

/**
 * Checks if a file has a supported audio extension (case-insensitive).
 */
export function isSupportedAudioFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

export function isPlaylistFile(filePath: string): boolean {
  return PLAYLIST_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

export function isArchiveFile(filePath: string): boolean {
  return ARCHIVE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * Recursively scans a directory for audio files with supported extensions.
 * Unreadable directories are skipped.
 *
 * @param dirPath - Directory to scan
 * @param onUnreadable - Called with each directory that could not be read
 * @returns Sorted absolute paths
 */
export function scanDirectoryForAudioFiles(
  dirPath: string,
  onUnreadable?: (dir: string, error: unknown) => void,
): string[] {
  const audioFiles: string[] = [];

  function scanRecursive(currentPath: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (error: unknown) {
      onUnreadable?.(currentPath, error);
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        scanRecursive(fullPath);
      } else if (entry.isFile() && isSupportedAudioFile(entry.name)) {
        audioFiles.push(path.resolve(fullPath));
      }
    }
  }

  scanRecursive(dirPath);
  return audioFiles.sort();
}

/**
 * Removes characters invalid in file names on Windows and collapses spaces.
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[/\\:*?"<>|]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Appends (1), (2), ... until the path neither exists nor is in `reserved`.
 * The returned path is added to `reserved` when one is given.
 */
export function getUniqueFilePath(desiredPath: string, reserved?: Set<string>): string {
  const isTaken = (candidate: string): boolean => (reserved?.has(candidate) ?? false) || fs.existsSync(candidate);

  let candidatePath = desiredPath;
  if (isTaken(candidatePath)) {
    const dir = path.dirname(desiredPath);
    const ext = path.extname(desiredPath);
    const baseName = path.basename(desiredPath, ext);

    let counter = 1;
    do {
      candidatePath = path.join(dir, `${baseName} (${counter})${ext}`);
      counter++;
    } while (isTaken(candidatePath));
  }

  reserved?.add(candidatePath);
  return candidatePath;
}
