import { createHash, randomBytes, timingSafeEqual } from 'crypto';

const LEAF_PREFIX = Buffer.from([0x00]);
const NODE_PREFIX = Buffer.from([0x01]);

function sha256(...parts: Buffer[]): Buffer {
  const hash = createHash('sha256');
  parts.forEach((part) => hash.update(part));
  return hash.digest();
}

/** 32 random bytes, hex encoded. Kept secret until the draw completes. */
export function generateServerSeed(): string {
  return randomBytes(32).toString('hex');
}

export function hashServerSeed(serverSeed: string): string {
  return createHash('sha256').update(serverSeed).digest('hex');
}

export function verifyServerSeed(serverSeed: string, serverSeedHash: string): boolean {
  const expected = Buffer.from(hashServerSeed(serverSeed), 'hex');
  const actual = Buffer.from(serverSeedHash, 'hex');
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

/**
 * Merkle root (hex) over the ticket numbers in lexical order. Leaves and
 * inner nodes are domain-separated; an unpaired node moves up unchanged.
 */
export function merkleRoot(ticketNumbers: readonly string[]): string {
  let level = [...ticketNumbers]
    .sort()
    .map((ticketNumber) => sha256(LEAF_PREFIX, Buffer.from(ticketNumber, 'utf8')));

  if (level.length === 0) {
    return sha256().toString('hex');
  }

  while (level.length > 1) {
    const next: Buffer[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = level[i + 1];
      next.push(right ? sha256(NODE_PREFIX, left, right) : left);
    }
    level = next;
  }
  return level[0].toString('hex');
}

export interface DrawSeedInput {
  raffleId: string;
  drawDate: Date;
  merkleRoot: string;
  serverSeed: string;
}

/**
 * Seed of a draw. Anyone holding the revealed server seed and the ticket
 * numbers can recompute it.
 */
export function deriveDrawSeed(input: DrawSeedInput): string {
  return createHash('sha256')
    .update([input.raffleId, input.drawDate.toISOString(), input.merkleRoot, input.serverSeed].join('|'))
    .digest('hex');
}
