import { PreconditionError } from './errors';
import {
  MAX_DATA_CENTER_ID,
  MAX_MACHINE_ID,
  MAX_WORKER_ID,
  type SulidVersion,
  type WorkerIdentity,
} from './layout';
import { Sulid } from './sulid';

export interface BaseGeneratorOptions {
  /** Reject out-of-range fields instead of masking them. Defaults to `false`. */
  strict?: boolean;
}

const checkRange = (label: string, value: number, max: number): void => {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new PreconditionError(`${label} must be between 0 and ${max}, got ${value}`);
  }
};

/**
 * Shared by both capability profiles: a fixed, validated worker identity and
 * the packing of a timestamp and random value for that identity.
 */
export abstract class BaseSulidGenerator {
  public readonly identity: Readonly<WorkerIdentity>;
  public readonly strict: boolean;

  /**
   * @throws {PreconditionError} when an identity field is outside its range
   */
  constructor(identity: WorkerIdentity, options: BaseGeneratorOptions = {}) {
    if (identity.version === 'v1') {
      checkRange('Data center ID', identity.dataCenterId, MAX_DATA_CENTER_ID);
      checkRange('Machine ID', identity.machineId, MAX_MACHINE_ID);
    } else {
      checkRange('Worker ID', identity.workerId, MAX_WORKER_ID);
    }
    this.identity = Object.freeze({ ...identity });
    this.strict = options.strict ?? false;
  }

  get version(): SulidVersion {
    return this.identity.version;
  }

  protected build(timestampMs: number | bigint, random: bigint): Sulid {
    const identity = this.identity;
    const options = { strict: this.strict };
    if (identity.version === 'v1') {
      return Sulid.fromParts(
        {
          version: 'v1',
          timestampMs,
          random,
          dataCenterId: identity.dataCenterId,
          machineId: identity.machineId,
        },
        options
      );
    }
    return Sulid.fromParts({ version: 'v2', timestampMs, random, workerId: identity.workerId }, options);
  }
}

/**
 * Generator for environments without a clock or entropy of their own: the
 * caller passes the timestamp and the random value on every call.
 *
 * @example
 * ```ts
 * const generator = CoreSulidGenerator.v1(1, 1);
 * const id = generator.generate(Date.now(), 42n);
 * ```
 */
export class CoreSulidGenerator extends BaseSulidGenerator {
  public static v1(dataCenterId: number, machineId: number, options?: BaseGeneratorOptions): CoreSulidGenerator {
    return new CoreSulidGenerator({ version: 'v1', dataCenterId, machineId }, options);
  }

  public static v2(workerId: number, options?: BaseGeneratorOptions): CoreSulidGenerator {
    return new CoreSulidGenerator({ version: 'v2', workerId }, options);
  }

  public generate(timestampMs: number | bigint, random: bigint): Sulid {
    return this.build(timestampMs, random);
  }
}
