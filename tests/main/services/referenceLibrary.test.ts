import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FolderReferenceLibrary } from '../../../src/main/services/referenceLibrary';

describe('FolderReferenceLibrary', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reference-library-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function touch(name: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, '');
    return filePath;
  }

  it('should find references by genre with normalised file names', () => {
    const trap = touch('Trap.wav');
    const lofi = touch('lofi-hip hop.flac');

    const library = new FolderReferenceLibrary(tempDir);

    expect(library.findReference('trap')).toBe(trap);
    expect(library.findReference('lofi_hip_hop')).toBe(lofi);
  });

  it('should fall back to the general reference', () => {
    const general = touch('general.mp3');
    touch('trap.wav');

    const library = new FolderReferenceLibrary(tempDir);

    expect(library.findReference('rock')).toBe(general);
    expect(library.findReference(null)).toBe(general);
  });

  it('should return null without a match or a general reference', () => {
    touch('trap.wav');
    expect(new FolderReferenceLibrary(tempDir).findReference('rock')).toBeNull();
  });

  it('should return null for a missing folder', () => {
    const library = new FolderReferenceLibrary(path.join(tempDir, 'missing'));
    expect(library.findReference('trap')).toBeNull();
    expect(library.getDir()).toBe(path.join(tempDir, 'missing'));
  });

  it('should prefer the first file in sorted order for a shared stem', () => {
    const flac = touch('pop.flac');
    touch('pop.wav');
    expect(new FolderReferenceLibrary(tempDir).findReference('pop')).toBe(flac);
  });
});
