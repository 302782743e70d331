/**
 * Crockford Base32 codec for 128-bit values.
 *
 * 26 characters * 5 bits = 130 bits, so the leading character only carries
 * the top 3 bits of the value and can never be above '7'.
 */

export const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

// 128位值编码后的固定长度
export const ENCODED_LENGTH = 26;

const BITS_PER_CHAR = 5n;
const CHAR_MASK = 31n;
const MAX_LEADING_VALUE = 7;
const VALUE_MASK = (1n << 128n) - 1n;

export type DecodeErrorKind = 'InvalidLength' | 'InvalidChar';

export class DecodeError extends Error {
  constructor(public readonly kind: DecodeErrorKind, message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export type EncodeErrorKind = 'BufferTooSmall';

export class EncodeError extends Error {
  constructor(public readonly kind: EncodeErrorKind, message: string) {
    super(message);
    this.name = 'EncodeError';
  }
}

// 字符 -> 数值查找表，大小写均可
const LOOKUP: ReadonlyMap<string, number> = new Map(
  Array.from(ALPHABET).flatMap((char, index): Array<[string, number]> => [
    [char, index],
    [char.toLowerCase(), index],
  ])
);

/**
 * Encode a 128-bit value as a 26 character Crockford Base32 string.
 * Bits above the 128th are ignored.
 */
export function encode(value: bigint): string {
  let remaining = value & VALUE_MASK;
  const chars: string[] = new Array(ENCODED_LENGTH);
  for (let i = ENCODED_LENGTH - 1; i >= 0; i--) {
    chars[i] = ALPHABET.charAt(Number(remaining & CHAR_MASK));
    remaining >>= BITS_PER_CHAR;
  }
  return chars.join('');
}

/**
 * Write the encoded form of `value` as ASCII bytes into `buffer` at `offset`.
 * @returns the slice of `buffer` that was written
 */
export function encodeInto(value: bigint, buffer: Uint8Array, offset: number = 0): Uint8Array {
  if (offset < 0 || buffer.length - offset < ENCODED_LENGTH) {
    throw new EncodeError(
      'BufferTooSmall',
      `Buffer needs ${ENCODED_LENGTH} bytes from offset ${offset}, has ${Math.max(buffer.length - offset, 0)}`
    );
  }
  const text = encode(value);
  for (let i = 0; i < ENCODED_LENGTH; i++) {
    buffer[offset + i] = text.charCodeAt(i);
  }
  return buffer.subarray(offset, offset + ENCODED_LENGTH);
}

/**
 * Decode a 26 character Crockford Base32 string into a 128-bit value.
 * @throws {DecodeError} when the length is wrong or a character is not in the alphabet
 */
export function decode(text: string): bigint {
  if (text.length !== ENCODED_LENGTH) {
    throw new DecodeError(
      'InvalidLength',
      `Expected ${ENCODED_LENGTH} characters, got ${text.length}`
    );
  }

  let value = 0n;
  for (let i = 0; i < ENCODED_LENGTH; i++) {
    const char = text.charAt(i);
    const digit = LOOKUP.get(char);
    if (digit === undefined) {
      throw new DecodeError('InvalidChar', `Invalid character '${char}' at position ${i}`);
    }
    // 首字符超过'7'会溢出128位
    if (i === 0 && digit > MAX_LEADING_VALUE) {
      throw new DecodeError('InvalidChar', `Leading character '${char}' overflows 128 bits`);
    }
    value = (value << BITS_PER_CHAR) | BigInt(digit);
  }
  return value;
}
