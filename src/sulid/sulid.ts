import * as crockford from '../utils/crockford';
import { BYTE_LENGTH, bigIntToBytes, bytesToBigInt } from '../utils/bytes';
import { DecodeError, PreconditionError } from './errors';
import {
  DATA_CENTER_BITS,
  DATA_CENTER_MASK,
  DATA_CENTER_SHIFT,
  type DecodedParts,
  MACHINE_BITS,
  MACHINE_MASK,
  RANDOM_BITS,
  RANDOM_MASK,
  RANDOM_SHIFT,
  type SulidParts,
  type SulidVersion,
  TIME_BITS,
  TIMESTAMP_MASK,
  TIMESTAMP_SHIFT,
  WORKER_BITS,
  WORKER_MASK,
} from './layout';

const U128_BITS = 128;

export interface FromPartsOptions {
  /**
   * Throw a {@link PreconditionError} for fields wider than their bit width
   * instead of discarding the overflow bits. Defaults to `false`.
   */
  strict?: boolean;
}

export type ParseResult =
  | { ok: true; value: Sulid }
  | { ok: false; error: DecodeError };

/**
 * Reduce a timestamp to whole milliseconds, clamped to the epoch.
 */
const normalizeTimestamp = (timestampMs: number | bigint): bigint => {
  if (typeof timestampMs === 'bigint') {
    return timestampMs < 0n ? 0n : timestampMs;
  }
  if (!Number.isFinite(timestampMs)) {
    throw new PreconditionError(`timestampMs must be a finite number, got ${timestampMs}`);
  }
  return timestampMs <= 0 ? 0n : BigInt(Math.floor(timestampMs));
};

/**
 * Check that `value` is an unsigned integer and fit it into `mask`:
 * masked by default, rejected when strict.
 */
const fitField = (
  name: string,
  value: number | bigint,
  bits: bigint,
  mask: bigint,
  strict: boolean
): bigint => {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new PreconditionError(`${name} must be an integer, got ${value}`);
  }
  const field = BigInt(value);
  if (field < 0n) {
    throw new PreconditionError(`${name} must not be negative, got ${value}`);
  }
  if (strict && field > mask) {
    throw new PreconditionError(`${name} must be between 0 and ${mask} (${bits} bits), got ${value}`);
  }
  return field & mask;
};

/**
 * A SULID: a 128-bit, lexicographically sortable identifier.
 *
 * Canonically represented as a 26 character Crockford Base32 string. The
 * value is immutable; every accessor is a read of the packed integer.
 *
 * @example
 * ```ts
 * const id = Sulid.fromString('01D39ZY06FGSCTVN4T2V9PKHFZ');
 * const same = Sulid.fromParts(id.toParts('v1'));
 * id.equals(same); // true
 * ```
 */
export class Sulid {
  static readonly TIME_BITS = Number(TIME_BITS);
  static readonly RANDOM_BITS = Number(RANDOM_BITS);
  static readonly DATA_CENTER_BITS = Number(DATA_CENTER_BITS);
  static readonly MACHINE_BITS = Number(MACHINE_BITS);
  static readonly WORKER_BITS = Number(WORKER_BITS);
  static readonly ENCODED_LENGTH = crockford.ENCODED_LENGTH;
  static readonly BYTE_LENGTH = BYTE_LENGTH;

  private static readonly NIL = new Sulid(0n);

  private constructor(private readonly value: bigint) {}

  /**
   * Reinterpret a raw integer. Values outside 0..2^128-1 are reduced modulo 2^128.
   */
  public static fromBigInt(value: bigint): Sulid {
    return new Sulid(BigInt.asUintN(U128_BITS, value));
  }

  /**
   * Pack separated parts at the offsets of their layout version.
   *
   * Overflow bits of any field are discarded unless `options.strict` is set.
   * A timestamp before the epoch is clamped to the epoch.
   */
  public static fromParts(parts: SulidParts, options: FromPartsOptions = {}): Sulid {
    const strict = options.strict ?? false;

    const timestamp = normalizeTimestamp(parts.timestampMs);
    if (strict && timestamp > TIMESTAMP_MASK) {
      throw new PreconditionError(
        `timestampMs must be between 0 and ${TIMESTAMP_MASK} (${TIME_BITS} bits), got ${parts.timestampMs}`
      );
    }
    const random = fitField('random', parts.random, RANDOM_BITS, RANDOM_MASK, strict);

    let identity: bigint;
    if (parts.version === 'v1') {
      const dataCenterId = fitField('dataCenterId', parts.dataCenterId, DATA_CENTER_BITS, DATA_CENTER_MASK, strict);
      const machineId = fitField('machineId', parts.machineId, MACHINE_BITS, MACHINE_MASK, strict);
      identity = (dataCenterId << DATA_CENTER_SHIFT) | machineId;
    } else {
      identity = fitField('workerId', parts.workerId, WORKER_BITS, WORKER_MASK, strict);
    }

    return new Sulid(
      ((timestamp & TIMESTAMP_MASK) << TIMESTAMP_SHIFT) |
      (random << RANDOM_SHIFT) |
      identity
    );
  }

  /**
   * Create a Sulid from 16 big-endian bytes.
   */
  public static fromBytes(bytes: Uint8Array): Sulid {
    if (bytes.length !== BYTE_LENGTH) {
      throw new PreconditionError(`Expected ${BYTE_LENGTH} bytes, got ${bytes.length}`);
    }
    return new Sulid(bytesToBigInt(bytes));
  }

  /**
   * Decode the canonical text form.
   * @throws {DecodeError} `InvalidLength` or `InvalidChar`
   */
  public static fromString(text: string): Sulid {
    return new Sulid(crockford.decode(text));
  }

  /**
   * Like {@link Sulid.fromString}, returning the decode failure instead of throwing it.
   */
  public static safeParse(text: string): ParseResult {
    try {
      return { ok: true, value: Sulid.fromString(text) };
    } catch (error) {
      if (error instanceof DecodeError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /** The nil Sulid, all 128 bits zero. */
  public static nil(): Sulid {
    return Sulid.NIL;
  }

  /** Comparator for `Array.prototype.sort`. */
  public static compare(a: Sulid, b: Sulid): -1 | 0 | 1 {
    return a.compareTo(b);
  }

  get timestampMs(): number {
    return Number(this.value >> TIMESTAMP_SHIFT);
  }

  get random(): bigint {
    return (this.value >> RANDOM_SHIFT) & RANDOM_MASK;
  }

  /** v1 layout */
  get dataCenterId(): number {
    return Number((this.value >> DATA_CENTER_SHIFT) & DATA_CENTER_MASK);
  }

  /** v1 layout */
  get machineId(): number {
    return Number(this.value & MACHINE_MASK);
  }

  /** v2 layout */
  get workerId(): number {
    return Number(this.value & WORKER_MASK);
  }

  public toDate(): Date {
    return new Date(this.timestampMs);
  }

  public toParts(version: 'v1'): DecodedParts<'v1'>;
  public toParts(version: 'v2'): DecodedParts<'v2'>;
  public toParts(version: SulidVersion): DecodedParts<'v1'> | DecodedParts<'v2'>;
  public toParts(version: SulidVersion): DecodedParts<'v1'> | DecodedParts<'v2'> {
    if (version === 'v1') {
      return {
        version,
        timestampMs: this.timestampMs,
        random: this.random,
        dataCenterId: this.dataCenterId,
        machineId: this.machineId,
      };
    }
    return {
      version,
      timestampMs: this.timestampMs,
      random: this.random,
      workerId: this.workerId,
    };
  }

  public toBigInt(): bigint {
    return this.value;
  }

  /** Big-endian, byte 0 is the most significant. */
  public toBytes(): Uint8Array {
    return bigIntToBytes(this.value, BYTE_LENGTH);
  }

  public isNil(): boolean {
    return this.value === 0n;
  }

  /**
   * Add one to the random field, leaving timestamp and identity bits untouched.
   *
   * @returns `undefined` once the random field is exhausted (all 70 bits set)
   */
  public increment(): Sulid | undefined {
    if (this.random === RANDOM_MASK) {
      return undefined;
    }
    return new Sulid(this.value + (1n << RANDOM_SHIFT));
  }

  public compareTo(other: Sulid): -1 | 0 | 1 {
    if (this.value < other.value) return -1;
    if (this.value > other.value) return 1;
    return 0;
  }

  public equals(other: Sulid): boolean {
    return this.value === other.value;
  }

  /**
   * Write the 26 ASCII characters of the canonical form into `buffer`.
   * @throws {EncodeError} `BufferTooSmall`
   */
  public encodeInto(buffer: Uint8Array, offset: number = 0): Uint8Array {
    return crockford.encodeInto(this.value, buffer, offset);
  }

  public toString(): string {
    return crockford.encode(this.value);
  }

  public toJSON(): string {
    return this.toString();
  }
}
