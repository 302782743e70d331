/**
 * SULID 位布局 (128 bits, high -> low)
 *
 * v1: | 48-bit timestamp | 70-bit random | 5-bit data center ID | 5-bit machine ID |
 * v2: | 48-bit timestamp | 70-bit random | 10-bit worker ID |
 *
 * The worker ID of v2 occupies exactly the bits of the v1 data center and
 * machine IDs, so `workerId === (dataCenterId << 5) | machineId`.
 */

export type SulidVersion = 'v1' | 'v2';

export const SULID_VERSIONS: readonly SulidVersion[] = ['v1', 'v2'];

export const isSulidVersion = (value: string): value is SulidVersion =>
  SULID_VERSIONS.some((version) => version === value);

export const bitmask = (bits: bigint): bigint => (1n << bits) - 1n;

export const TIME_BITS = 48n; // 时间戳所占位数
export const RANDOM_BITS = 70n; // 随机数所占位数
export const DATA_CENTER_BITS = 5n; // 数据中心ID所占位数
export const MACHINE_BITS = 5n; // 机器ID所占位数
export const WORKER_BITS = DATA_CENTER_BITS + MACHINE_BITS; // 工作节点ID所占位数：10

export const RANDOM_SHIFT = WORKER_BITS; // 随机数左移位数：10
export const TIMESTAMP_SHIFT = RANDOM_BITS + WORKER_BITS; // 时间戳左移位数：80
export const DATA_CENTER_SHIFT = MACHINE_BITS; // 数据中心ID左移位数：5

export const TIMESTAMP_MASK = bitmask(TIME_BITS);
export const RANDOM_MASK = bitmask(RANDOM_BITS);
export const DATA_CENTER_MASK = bitmask(DATA_CENTER_BITS);
export const MACHINE_MASK = bitmask(MACHINE_BITS);
export const WORKER_MASK = bitmask(WORKER_BITS);

export const MAX_DATA_CENTER_ID = Number(DATA_CENTER_MASK); // 31
export const MAX_MACHINE_ID = Number(MACHINE_MASK); // 31
export const MAX_WORKER_ID = Number(WORKER_MASK); // 1023

export interface SulidV1Parts {
  version: 'v1';
  /** Milliseconds since the Unix epoch. */
  timestampMs: number | bigint;
  random: bigint;
  dataCenterId: number;
  machineId: number;
}

export interface SulidV2Parts {
  version: 'v2';
  /** Milliseconds since the Unix epoch. */
  timestampMs: number | bigint;
  random: bigint;
  workerId: number;
}

export type SulidParts = SulidV1Parts | SulidV2Parts;

/** Parts as read back from an identifier; the timestamp always fits a number. */
export type DecodedParts<V extends SulidVersion> = Extract<SulidParts, { version: V }> & {
  timestampMs: number;
};

export type WorkerIdentity =
  | { version: 'v1'; dataCenterId: number; machineId: number }
  | { version: 'v2'; workerId: number };
