import { createHash } from 'crypto';
import { readFile } from 'fs/promises';

/**
 * MD5 of a string, hex encoded
 */
export function hashString(content: string): string {
  return createHash('md5').update(content).digest('hex');
}

/**
 * MD5 of a file's bytes; identifies a document across re-ingestion
 */
export async function hashFile(filepath: string): Promise<string> {
  const content = await readFile(filepath);
  return createHash('md5').update(content).digest('hex');
}

/**
 * Cache key for an embedding: the same text embedded by two models must not
 * share an entry
 */
export function embeddingCacheKey(model: string, text: string): string {
  return hashString(`${model}\u0000${text}`);
}
