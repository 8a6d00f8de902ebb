import { describe, it, expect } from 'vitest';
import { baseName, compareFileNames, extensionOf, isImageFile, listImageFiles, stemOf } from './imageFiles';
import { MemoryFileSystem } from '../../../tests/utils/fakes';

describe('path helpers', () => {
  it('extracts base name, stem and extension', () => {
    expect(baseName('/a/b/Sample.TIF')).toBe('Sample.TIF');
    expect(baseName('C:\\scans\\x.png')).toBe('x.png');
    expect(stemOf('Sample.TIF')).toBe('Sample');
    expect(stemOf('.hidden')).toBe('.hidden');
    expect(extensionOf('/a/b/Sample.TIF')).toBe('tif');
    expect(extensionOf('/a/b/README')).toBe('');
  });

  it('matches the image whitelist case-insensitively', () => {
    expect(isImageFile('x.JPG')).toBe(true);
    expect(isImageFile('x.heic')).toBe(true);
    expect(isImageFile('x.txt')).toBe(false);
  });

  it('orders names naturally', () => {
    const names = ['img10.png', 'img2.png', 'IMG1.png'];
    expect([...names].sort(compareFileNames)).toEqual(['IMG1.png', 'img2.png', 'img10.png']);
  });
});

describe('listImageFiles', () => {
  it('walks sub-folders, skips hidden entries and sorts by file name', async () => {
    const fs = new MemoryFileSystem();
    for (const p of [
      '/scans/img10.png',
      '/scans/img2.jpg',
      '/scans/notes.txt',
      '/scans/.cache/img0.png',
      '/scans/sub/img3.tif',
      '/scans/.DS_Store',
    ]) {
      await fs.writeText(p, '');
    }
    expect(await listImageFiles('/scans', fs)).toEqual(['/scans/img2.jpg', '/scans/sub/img3.tif', '/scans/img10.png']);
  });
});
