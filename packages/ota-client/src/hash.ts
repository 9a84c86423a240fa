import { createHash } from 'node:crypto';

/**
 * Git blob object id of `data`: SHA-1 over `"blob <length>\0"` followed by the bytes.
 * Repository tree listings publish this value per file, so downloads can be checked
 * without a separate manifest.
 */
export function computeBlobDigest(data: Uint8Array): string {
  return createHash('sha1')
    .update(`blob ${data.byteLength}\0`)
    .update(data)
    .digest('hex');
}

export function verifyBlobDigest(data: Uint8Array, expected: string): boolean {
  return computeBlobDigest(data) === expected.trim().toLowerCase();
}
