import { hashFile, sha256Hex } from '../util/crypto.js';

export interface IntegrityResult {
  ok: boolean;
  expected: string;
  /** Digest of the checked content, or null when it could not be read. */
  actual: string | null;
}

// Plain string equality over the hex form: no case folding or trimming.
function compare(expected: string, actual: string | null): IntegrityResult {
  return { ok: actual !== null && actual === expected, expected, actual };
}

export async function verifyImage(path: string, expected: string): Promise<IntegrityResult> {
  return compare(expected, await hashFile(path));
}

export function verifyBytes(data: Buffer, expected: string): IntegrityResult {
  return compare(expected, sha256Hex(data));
}
