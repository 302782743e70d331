import { randomBytes } from 'crypto';

/**
 * A supply of uniformly distributed random bits.
 */
export interface RandomSource {
  /** Returns an unsigned integer of at most `bits` bits. */
  nextBigInt(bits: number): bigint;
}

/** `shared`: one process-wide source; `local`: one source per generator. */
export type RandomScope = 'shared' | 'local';

export const RANDOM_SCOPES: readonly RandomScope[] = ['shared', 'local'];

export const isRandomScope = (value: string): value is RandomScope =>
  RANDOM_SCOPES.some((scope) => scope === value);

const DEFAULT_POOL_SIZE = 4096;

/**
 * Cryptographically strong source backed by `crypto.randomBytes`.
 *
 * Bytes are fetched in pools so that a draw is usually a slice of memory
 * rather than a call into the OS. A draw runs synchronously to completion,
 * so two callers on the event loop never observe the pool mid-update.
 */
export class CryptoRandomSource implements RandomSource {
  private pool: Buffer;
  private offset: number;

  constructor(private readonly poolSize: number = DEFAULT_POOL_SIZE) {
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new Error(`Pool size must be a positive integer, got ${poolSize}`);
    }
    this.pool = randomBytes(poolSize);
    this.offset = 0;
  }

  public nextBigInt(bits: number): bigint {
    if (!Number.isInteger(bits) || bits < 1) {
      throw new Error(`Bit count must be a positive integer, got ${bits}`);
    }
    const bytes = this.take(Math.ceil(bits / 8));
    let value = 0n;
    for (const byte of bytes) {
      value = (value << 8n) | BigInt(byte);
    }
    return BigInt.asUintN(bits, value);
  }

  private take(length: number): Buffer {
    if (length > this.poolSize) {
      return randomBytes(length);
    }
    if (this.offset + length > this.poolSize) {
      this.pool = randomBytes(this.poolSize);
      this.offset = 0;
    }
    const bytes = this.pool.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }
}

let shared: CryptoRandomSource | undefined;

/**
 * The process-wide source, created on first use.
 */
export function sharedRandomSource(): RandomSource {
  if (!shared) {
    shared = new CryptoRandomSource();
  }
  return shared;
}

export function resolveRandomSource(scope: RandomScope): RandomSource {
  return scope === 'shared' ? sharedRandomSource() : new CryptoRandomSource();
}
