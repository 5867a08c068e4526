import { createHash, timingSafeEqual } from 'crypto';

/**
 * Room passwords are stored only as a hex digest.
 * The plaintext never leaves the join handshake.
 */
export function hashPassword(plaintext: string): string {
    return createHash('sha256').update(plaintext, 'utf8').digest('hex');
}

export function passwordMatches(storedHash: string, plaintext: string | undefined): boolean {
    if (plaintext === undefined) return false;

    const expected = Buffer.from(storedHash, 'hex');
    const actual = Buffer.from(hashPassword(plaintext), 'hex');
    return expected.length === actual.length && timingSafeEqual(expected, actual);
}
