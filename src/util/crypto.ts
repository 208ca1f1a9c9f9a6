import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

/** Length of a SHA-256 digest in lowercase hex. */
export const DIGEST_HEX_LENGTH = 64;

export function sha256Hex(data: Buffer | Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Stream a file through SHA-256. Returns null when the file cannot be read.
 */
export async function hashFile(path: string): Promise<string | null> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk);
    }
  } catch {
    return null;
  }
  return hash.digest('hex');
}
