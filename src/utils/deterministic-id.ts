import crypto from 'crypto';

/**
 * Generate a deterministic id from arbitrary stringifiable parts.
 * Returns a hex string of length `len` (default 16).
 */
export function deterministicIdFrom(parts: Array<string | number | bigint>, len = 16): string {
    const joined = parts.map(p => String(p)).join('|');
    const hash = crypto.createHash('sha256').update(joined).digest('hex');
    return hash.substring(0, len);
}

/**
 * Deterministic 0x-prefixed, 20-byte address derived from the given parts.
 */
export function deterministicAddressFrom(parts: Array<string | number | bigint>): string {
    return `0x${deterministicIdFrom(parts, 40)}`;
}

export default { deterministicIdFrom, deterministicAddressFrom };
