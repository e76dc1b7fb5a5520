import { createHmac } from 'crypto';

const UINT32_RANGE = 2 ** 32;

/**
 * Deterministic generator: HMAC-SHA256 keyed by the draw seed over a block
 * counter, consumed four bytes at a time.
 */
export class SeededRandom {
  private readonly key: Buffer;
  private counter = 0;
  private block: Buffer = Buffer.alloc(0);
  private offset = 0;

  constructor(seed: string) {
    if (!/^[0-9a-f]+$/i.test(seed) || seed.length % 2 !== 0) {
      throw new Error('Seed must be a hex string');
    }
    this.key = Buffer.from(seed, 'hex');
  }

  nextUint32(): number {
    if (this.offset + 4 > this.block.length) {
      const counter = Buffer.alloc(4);
      counter.writeUInt32BE(this.counter);
      this.counter += 1;
      this.block = createHmac('sha256', this.key).update(counter).digest();
      this.offset = 0;
    }
    const value = this.block.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  /** Uniform integer in [0, bound) using rejection sampling. */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
      throw new RangeError(`Bound must be an integer between 1 and 2^32, got ${bound}`);
    }
    const limit = Math.floor(UINT32_RANGE / bound) * bound;
    let value = this.nextUint32();
    while (value >= limit) {
      value = this.nextUint32();
    }
    return value % bound;
  }
}
