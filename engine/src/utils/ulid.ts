import { randomBytes } from 'node:crypto';

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

/**
 * 26-character ULID: 48-bit timestamp then 80 random bits, Crockford base32
 */
export function ulid(timestampMs: number = Date.now()): string {
  let time = Math.max(0, Math.floor(timestampMs));
  let timePart = '';
  for (let i = 0; i < 10; i++) {
    timePart = CROCKFORD[time % 32] + timePart;
    time = Math.floor(time / 32);
  }

  const bytes = randomBytes(10);
  let bits = 0;
  let buffer = 0;
  let randomPart = '';
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      randomPart += CROCKFORD[(buffer >> bits) & 31];
    }
    buffer &= (1 << bits) - 1;
  }

  return timePart + randomPart;
}
