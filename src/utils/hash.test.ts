import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { embeddingCacheKey, hashFile, hashString } from './hash.js';

describe('hashString', () => {
  it('should produce the MD5 hex digest', () => {
    expect(hashString('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
    expect(hashString('abc')).toBe('900150983cd24fb0d6963f7d28e17f72');
  });
});

describe('hashFile', () => {
  it('should hash file contents like the string hash', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'hash-test-'));
    try {
      const path = join(dir, 'doc.txt');
      await writeFile(path, 'abc');

      await expect(hashFile(path)).resolves.toBe(hashString('abc'));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('embeddingCacheKey', () => {
  it('should differ per model for the same text', () => {
    expect(embeddingCacheKey('model-a', 'Article 1')).not.toBe(
      embeddingCacheKey('model-b', 'Article 1')
    );
  });

  it('should be stable', () => {
    expect(embeddingCacheKey('model-a', 'Article 1')).toBe(embeddingCacheKey('model-a', 'Article 1'));
    expect(embeddingCacheKey('model-a', 'Article 1')).toMatch(/^[a-f0-9]{32}$/);
  });
});
