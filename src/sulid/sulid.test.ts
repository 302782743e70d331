import { describe, expect, it } from 'vitest';

import { DecodeError, EncodeError, PreconditionError } from './errors';
import { Sulid } from './sulid';

const MAX_RANDOM = (1n << 70n) - 1n;

describe('Sulid', () => {
  describe('fromParts', () => {
    it('encodes all-zero parts as the nil string', () => {
      const sulid = Sulid.fromParts({ version: 'v1', timestampMs: 0, random: 0n, dataCenterId: 0, machineId: 0 });

      expect(sulid.toString()).toBe('00000000000000000000000000');
      expect(sulid.isNil()).toBe(true);
    });

    it('packs v1 fields at their offsets', () => {
      const sulid = Sulid.fromParts({
        version: 'v1',
        timestampMs: 1704067200000,
        random: 255n,
        dataCenterId: 17,
        machineId: 9,
      });

      expect(sulid.toBigInt()).toBe((1704067200000n << 80n) | (255n << 10n) | (17n << 5n) | 9n);
      expect(sulid.toString()).toBe('01HK153X000000000000007ZH9');
      expect(sulid.timestampMs).toBe(1704067200000);
      expect(sulid.random).toBe(255n);
      expect(sulid.dataCenterId).toBe(17);
      expect(sulid.machineId).toBe(9);
      expect(sulid.workerId).toBe(553);
      expect(sulid.toDate().toISOString()).toBe('2024-01-01T00:00:00.000Z');
    });

    it('packs the v2 worker ID over the v1 identity bits', () => {
      const sulid = Sulid.fromParts({ version: 'v2', timestampMs: 5, random: 7n, workerId: 1023 });

      expect(sulid.toBigInt()).toBe((5n << 80n) | (7n << 10n) | 1023n);
      expect(sulid.workerId).toBe(1023);
      expect(sulid.dataCenterId).toBe(31);
      expect(sulid.machineId).toBe(31);
    });

    it('discards overflow bits by default', () => {
      const base = { version: 'v1', timestampMs: 1, random: 1n, machineId: 1 } as const;

      expect(Sulid.fromParts({ ...base, dataCenterId: 32 }).equals(Sulid.fromParts({ ...base, dataCenterId: 0 }))).toBe(true);
      expect(Sulid.fromParts({ ...base, dataCenterId: 1, machineId: 33 }).machineId).toBe(1);
      expect(Sulid.fromParts({ ...base, dataCenterId: 1, random: (1n << 70n) | 3n }).random).toBe(3n);
      expect(Sulid.fromParts({ ...base, dataCenterId: 1, timestampMs: (1n << 48n) + 5n }).timestampMs).toBe(5);
      expect(Sulid.fromParts({ version: 'v2', timestampMs: 1, random: 1n, workerId: 1024 + 7 }).workerId).toBe(7);
    });

    it('rejects overflowing fields in strict mode', () => {
      const strict = { strict: true };
      const base = { version: 'v1', timestampMs: 1, random: 1n, dataCenterId: 1, machineId: 1 } as const;

      expect(() => Sulid.fromParts({ ...base, dataCenterId: 32 }, strict)).toThrow(PreconditionError);
      expect(() => Sulid.fromParts({ ...base, dataCenterId: 32 }, strict)).toThrow(
        'dataCenterId must be between 0 and 31 (5 bits), got 32'
      );
      expect(() => Sulid.fromParts({ ...base, machineId: 32 }, strict)).toThrow(PreconditionError);
      expect(() => Sulid.fromParts({ ...base, random: 1n << 70n }, strict)).toThrow(PreconditionError);
      expect(() => Sulid.fromParts({ ...base, timestampMs: 1n << 48n }, strict)).toThrow(PreconditionError);
      expect(() => Sulid.fromParts({ version: 'v2', timestampMs: 1, random: 1n, workerId: 1024 }, strict)).toThrow(
        'workerId must be between 0 and 1023 (10 bits), got 1024'
      );
    });

    it('accepts in-range fields in strict mode', () => {
      const sulid = Sulid.fromParts(
        { version: 'v1', timestampMs: (1n << 48n) - 1n, random: MAX_RANDOM, dataCenterId: 31, machineId: 31 },
        { strict: true }
      );

      expect(sulid.toString()).toBe('7ZZZZZZZZZZZZZZZZZZZZZZZZZ');
    });

    it('clamps timestamps before the epoch to zero', () => {
      const base = { version: 'v1', random: 1n, dataCenterId: 1, machineId: 1 } as const;

      expect(Sulid.fromParts({ ...base, timestampMs: -100 }).timestampMs).toBe(0);
      expect(Sulid.fromParts({ ...base, timestampMs: -100n }, { strict: true }).timestampMs).toBe(0);
    });

    it('truncates fractional milliseconds', () => {
      const sulid = Sulid.fromParts({ version: 'v2', timestampMs: 1.9, random: 0n, workerId: 0 });
      expect(sulid.timestampMs).toBe(1);
    });

    it('rejects values with no unsigned bit pattern', () => {
      expect(() => Sulid.fromParts({ version: 'v2', timestampMs: NaN, random: 0n, workerId: 0 })).toThrow(
        'timestampMs must be a finite number, got NaN'
      );
      expect(() => Sulid.fromParts({ version: 'v2', timestampMs: 0, random: -1n, workerId: 0 })).toThrow(
        'random must not be negative, got -1'
      );
      expect(() => Sulid.fromParts({ version: 'v1', timestampMs: 0, random: 0n, dataCenterId: 1.5, machineId: 0 })).toThrow(
        'dataCenterId must be an integer, got 1.5'
      );
    });

    it('masks whole numbers beyond the safe integer range', () => {
      const parts = { version: 'v1', timestampMs: 0, random: 0n, dataCenterId: 2 ** 53 + 2, machineId: 0 } as const;

      expect(Sulid.fromParts(parts).dataCenterId).toBe(2);
      expect(() => Sulid.fromParts(parts, { strict: true })).toThrow(
        'dataCenterId must be between 0 and 31 (5 bits), got 9007199254740994'
      );
    });

    it('exposes field widths that fill 128 bits', () => {
      expect([Sulid.TIME_BITS, Sulid.RANDOM_BITS, Sulid.DATA_CENTER_BITS, Sulid.MACHINE_BITS]).toEqual([48, 70, 5, 5]);
      expect(Sulid.WORKER_BITS).toBe(Sulid.DATA_CENTER_BITS + Sulid.MACHINE_BITS);
      expect(Sulid.TIME_BITS + Sulid.RANDOM_BITS + Sulid.WORKER_BITS).toBe(Sulid.BYTE_LENGTH * 8);
    });
  });

  describe('text', () => {
    it('encodes a raw integer', () => {
      const sulid = Sulid.fromBigInt(0x41414141414141414141414141414141n);

      expect(sulid.toString()).toBe('21850M2GA1850M2GA1850M2GA1');
      expect(Sulid.fromString('21850M2GA1850M2GA1850M2GA1').toBigInt()).toBe(0x41414141414141414141414141414141n);
    });

    it('round-trips a canonical string', () => {
      const text = '01D39ZY06FGSCTVN4T2V9PKHFZ';
      expect(Sulid.fromString(text).toString()).toBe(text);
    });

    it('normalizes lowercase input to the canonical form', () => {
      const sulid = Sulid.fromString('01d39zy06fgsctvn4t2v9pkhfz');

      expect(sulid.toString()).toBe('01D39ZY06FGSCTVN4T2V9PKHFZ');
      expect(sulid.equals(Sulid.fromString('01D39ZY06FGSCTVN4T2V9PKHFZ'))).toBe(true);
    });

    it('throws a typed DecodeError', () => {
      expect(() => Sulid.fromString('01D39ZY06FGSCTVN4T2V9PKHF')).toThrow(DecodeError);
      expect(() => Sulid.fromString('01D39ZY06FGSCTVN4T2V9PKHFU')).toThrow(DecodeError);
    });

    it('reports decode failures from safeParse', () => {
      const result = Sulid.safeParse('bad');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('InvalidLength');
      }
    });

    it('returns the value from safeParse', () => {
      const result = Sulid.safeParse('01D39ZY06FGSCTVN4T2V9PKHFZ');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.toString()).toBe('01D39ZY06FGSCTVN4T2V9PKHFZ');
      }
    });

    it('writes into a caller-provided buffer', () => {
      const buffer = new Uint8Array(Sulid.ENCODED_LENGTH);
      Sulid.fromString('01D39ZY06FGSCTVN4T2V9PKHFZ').encodeInto(buffer);

      expect(Buffer.from(buffer).toString('ascii')).toBe('01D39ZY06FGSCTVN4T2V9PKHFZ');
      expect(() => Sulid.nil().encodeInto(new Uint8Array(10))).toThrow(EncodeError);
    });

    it('serializes to JSON as its string', () => {
      const sulid = Sulid.fromString('01D39ZY06FGSCTVN4T2V9PKHFZ');
      expect(JSON.stringify({ id: sulid })).toBe('{"id":"01D39ZY06FGSCTVN4T2V9PKHFZ"}');
    });
  });

  describe('increment', () => {
    it('carries into the next random character', () => {
      const next = Sulid.fromString('01BX5ZZKBKAZZZZZZZZZZZZZZZ').increment();
      expect(next?.toString()).toBe('01BX5ZZKBKB0000000000000ZZ');
    });

    it('returns undefined once the random field is exhausted', () => {
      const first = Sulid.fromString('01BX5ZZKBKZZZZZZZZZZZZZXZX').increment();
      expect(first?.toString()).toBe('01BX5ZZKBKZZZZZZZZZZZZZYZX');

      const second = first?.increment();
      expect(second?.toString()).toBe('01BX5ZZKBKZZZZZZZZZZZZZZZX');
      expect(second?.increment()).toBeUndefined();
    });

    it('returns undefined for the maximum value', () => {
      expect(Sulid.fromBigInt((1n << 128n) - 1n).increment()).toBeUndefined();
    });

    it('leaves timestamp and identity bits untouched', () => {
      const sulid = Sulid.fromParts({
        version: 'v1',
        timestampMs: 42,
        random: (1n << 40n) - 1n,
        dataCenterId: 3,
        machineId: 4,
      });

      const once = sulid.increment();
      const twice = once?.increment();

      expect(once?.toParts('v1')).toEqual({
        version: 'v1',
        timestampMs: 42,
        random: 1n << 40n,
        dataCenterId: 3,
        machineId: 4,
      });
      expect(twice?.random).toBe((1n << 40n) + 1n);
      expect(twice?.timestampMs).toBe(42);
      expect(twice?.workerId).toBe(sulid.workerId);
      expect(sulid.random).toBe((1n << 40n) - 1n);
    });

    it('does not wrap a saturated random field into the identity bits', () => {
      const sulid = Sulid.fromParts({ version: 'v1', timestampMs: 7, random: MAX_RANDOM, dataCenterId: 0, machineId: 0 });
      expect(sulid.increment()).toBeUndefined();
    });
  });

  describe('conversions', () => {
    const text = '01FKMG6GAG0PJANMWFN84TNXCD';

    it('round-trips through integer, parts and bytes', () => {
      const sulid = Sulid.fromString(text);

      expect(Sulid.fromBigInt(sulid.toBigInt()).equals(sulid)).toBe(true);
      expect(Sulid.fromParts(sulid.toParts('v1')).equals(sulid)).toBe(true);
      expect(Sulid.fromParts(sulid.toParts('v2')).equals(sulid)).toBe(true);
      expect(Sulid.fromBytes(sulid.toBytes()).equals(sulid)).toBe(true);
    });

    it('reads the parts of a known identifier', () => {
      const sulid = Sulid.fromString(text);

      expect(sulid.toParts('v1')).toEqual({
        version: 'v1',
        timestampMs: 1635996877136,
        random: 26024812287698823869n,
        dataCenterId: 12,
        machineId: 13,
      });
      expect(sulid.toParts('v2')).toEqual({
        version: 'v2',
        timestampMs: 1635996877136,
        random: 26024812287698823869n,
        workerId: 397,
      });
    });

    it('maps bytes big-endian', () => {
      const bytes = new Uint8Array(16).fill(0xff);

      expect(Sulid.fromBytes(bytes).toString()).toBe('7ZZZZZZZZZZZZZZZZZZZZZZZZZ');
      expect(Sulid.fromString('7ZZZZZZZZZZZZZZZZZZZZZZZZZ').toBytes()).toEqual(bytes);

      const one = Sulid.fromBigInt(1n).toBytes();
      expect(one[15]).toBe(1);
      expect(one[0]).toBe(0);
    });

    it('rejects byte arrays that are not 16 bytes', () => {
      expect(() => Sulid.fromBytes(new Uint8Array(15))).toThrow('Expected 16 bytes, got 15');
    });

    it('reduces raw integers modulo 2^128', () => {
      expect(Sulid.fromBigInt(-1n).toString()).toBe('7ZZZZZZZZZZZZZZZZZZZZZZZZZ');
      expect(Sulid.fromBigInt(1n << 128n).isNil()).toBe(true);
    });
  });

  describe('ordering', () => {
    const early = Sulid.fromParts({ version: 'v1', timestampMs: 1000, random: MAX_RANDOM, dataCenterId: 31, machineId: 31 });
    const late = Sulid.fromParts({ version: 'v1', timestampMs: 1001, random: 0n, dataCenterId: 0, machineId: 0 });

    it('orders by timestamp before any suffix', () => {
      expect(early.compareTo(late)).toBe(-1);
      expect(late.compareTo(early)).toBe(1);
      expect(early.compareTo(Sulid.fromBigInt(early.toBigInt()))).toBe(0);
    });

    it('orders the text form the same way', () => {
      expect(early.toString()).toBe('00000000Z8ZZZZZZZZZZZZZZZZ');
      expect(late.toString()).toBe('00000000Z90000000000000000');
      expect(early.toString() < late.toString()).toBe(true);
    });

    it('sorts with Sulid.compare', () => {
      const sorted = [late, early, Sulid.nil()].sort(Sulid.compare);
      expect(sorted.map(String)).toEqual([
        '00000000000000000000000000',
        '00000000Z8ZZZZZZZZZZZZZZZZ',
        '00000000Z90000000000000000',
      ]);
    });
  });

  describe('nil', () => {
    it('is all zero bits', () => {
      expect(Sulid.nil().toBigInt()).toBe(0n);
      expect(Sulid.nil().isNil()).toBe(true);
      expect(Sulid.fromBigInt(1n).isNil()).toBe(false);
    });
  });
});
