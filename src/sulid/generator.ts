import type { Logger } from 'winston';
import { type BaseGeneratorOptions, BaseSulidGenerator } from './coreGenerator';
import { PreconditionError } from './errors';
import { RANDOM_BITS, RANDOM_MASK, TIMESTAMP_MASK, type WorkerIdentity } from './layout';
import { type RandomScope, type RandomSource, resolveRandomSource } from './random';
import { Sulid } from './sulid';

/** Milliseconds since the Unix epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface SulidGeneratorOptions extends BaseGeneratorOptions {
  /** Randomness source; takes precedence over `randomScope`. */
  random?: RandomSource;
  /** Which default source to use when `random` is not given. Defaults to `shared`. */
  randomScope?: RandomScope;
  clock?: Clock;
  /** Receives a debug entry when the generator is created. */
  logger?: Logger;
}

/**
 * SULID 生成器
 *
 * Builds identifiers from the current time, 70 random bits and a fixed worker
 * identity (v1: data center ID + machine ID, v2: worker ID).
 *
 * The generator keeps no record of issued IDs: two IDs from the same
 * millisecond differ only by their random field. Callers that need a strictly
 * increasing sequence should use {@link Sulid.increment}.
 *
 * @example
 * ```ts
 * const generator = SulidGenerator.v1(1, 1);
 * const id = generator.generate().toString();
 * ```
 */
export class SulidGenerator extends BaseSulidGenerator {
  private readonly source: RandomSource;
  private readonly clock: Clock;

  /**
   * @throws {PreconditionError} when an identity field is outside its range
   */
  constructor(identity: WorkerIdentity, options: SulidGeneratorOptions = {}) {
    super(identity, options);
    this.source = options.random ?? resolveRandomSource(options.randomScope ?? 'shared');
    this.clock = options.clock ?? systemClock;
    options.logger?.debug('SULID generator created', { identity: this.identity, strict: this.strict });
  }

  /**
   * @param dataCenterId 数据中心ID (0-31)
   * @param machineId 机器ID (0-31)
   */
  public static v1(dataCenterId: number, machineId: number, options?: SulidGeneratorOptions): SulidGenerator {
    return new SulidGenerator({ version: 'v1', dataCenterId, machineId }, options);
  }

  /**
   * @param workerId 工作节点ID (0-1023)
   */
  public static v2(workerId: number, options?: SulidGeneratorOptions): SulidGenerator {
    return new SulidGenerator({ version: 'v2', workerId }, options);
  }

  /**
   * Generate an identifier for the current time.
   */
  public generate(): Sulid {
    return this.generateAt(this.clock());
  }

  /**
   * Generate an identifier for a given time, e.g. when backdating migrated
   * records. Times before the epoch are clamped to the epoch and the
   * timestamp is truncated to 48 bits.
   *
   * @param source overrides the generator's randomness source for this call
   */
  public generateAt(timestamp: Date | number, source: RandomSource = this.source): Sulid {
    const ms = timestamp instanceof Date ? timestamp.getTime() : timestamp;
    if (!Number.isFinite(ms)) {
      throw new PreconditionError(`Invalid timestamp: ${timestamp}`);
    }
    const timeBits = BigInt(Math.max(0, Math.floor(ms))) & TIMESTAMP_MASK;
    const randomBits = source.nextBigInt(Number(RANDOM_BITS)) & RANDOM_MASK;
    return this.build(timeBits, randomBits);
  }
}
