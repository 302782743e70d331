export const BYTE_LENGTH = 16;

/**
 * Big-endian bytes -> unsigned integer. Byte 0 is the most significant.
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Unsigned integer -> big-endian bytes of the given length; higher bits are dropped.
 */
export function bigIntToBytes(value: bigint, length: number = BYTE_LENGTH): Uint8Array {
  const bytes = new Uint8Array(length);
  let remaining = value;
  for (let i = length - 1; i >= 0; i--) {
    bytes[i] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
  return bytes;
}
