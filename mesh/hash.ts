/**
 * Mesh Client: Hashing Utilities
 *
 * Cache entries are addressed by the SHA-224 of the canonical query text.
 */

import { sha224 } from '@noble/hashes/sha2.js';
import { bytesToHex } from '@noble/hashes/utils.js';

/**
 * Compute SHA-224 and return as lowercase hex string (56 chars).
 */
export function sha224Hex(data: Uint8Array | string): string {
    const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    return bytesToHex(sha224(bytes));
}
