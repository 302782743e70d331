import config, { type AppConfig } from '../config/config';
import logger from '../utils/logger';
import { SulidGenerator } from '../sulid/generator';
import type { WorkerIdentity, SulidVersion } from '../sulid/layout';
import { Sulid } from '../sulid/sulid';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export interface SulidDescription {
  sulid: string;
  version: SulidVersion;
  timestampMs: number;
  datetime: string;
  random: string; // 十进制字符串，超出 Number 精度
  dataCenterId: number;
  machineId: number;
  workerId: number;
  hex: string;
}

export interface GeneratorInfo {
  version: SulidVersion;
  identity: Readonly<WorkerIdentity>;
  strict: boolean;
  randomScope: string;
}

/**
 * Build the generator described by the configuration.
 */
export const createGenerator = (sulidConfig: AppConfig['sulid']): SulidGenerator => {
  const options = { strict: sulidConfig.strict, randomScope: sulidConfig.randomScope, logger };
  return sulidConfig.version === 'v1'
    ? SulidGenerator.v1(sulidConfig.dataCenterId, sulidConfig.machineId, options)
    : SulidGenerator.v2(sulidConfig.workerId, options);
};

export class SulidService {
  private readonly generator: SulidGenerator;
  private readonly maxBatchSize: number;
  private readonly appConfig: AppConfig;

  constructor(appConfig: AppConfig = config, generator?: SulidGenerator) {
    this.appConfig = appConfig;
    this.generator = generator ?? createGenerator(appConfig.sulid);
    this.maxBatchSize = appConfig.maxBatchSize;
  }

  public generate(count: number = 1): string[] {
    if (!Number.isInteger(count) || count < 1 || count > this.maxBatchSize) {
      throw new ValidationError(`count must be an integer between 1 and ${this.maxBatchSize}`);
    }

    const sulids: string[] = [];
    for (let i = 0; i < count; i++) {
      sulids.push(this.generator.generate().toString());
    }
    logger.debug('Generated SULIDs', { count });
    return sulids;
  }

  /**
   * Decode a SULID and break it into its fields. Both layouts are reported,
   * `version` names the one this service generates.
   * @throws {DecodeError}
   */
  public describe(text: string): SulidDescription {
    const sulid = Sulid.fromString(text);
    return {
      sulid: sulid.toString(),
      version: this.generator.version,
      timestampMs: sulid.timestampMs,
      datetime: sulid.toDate().toISOString(),
      random: sulid.random.toString(),
      dataCenterId: sulid.dataCenterId,
      machineId: sulid.machineId,
      workerId: sulid.workerId,
      hex: sulid.toBigInt().toString(16).padStart(32, '0'),
    };
  }

  /**
   * @returns the successor of `text`, or `null` once its random field is exhausted
   * @throws {DecodeError}
   */
  public next(text: string): string | null {
    const next = Sulid.fromString(text).increment();
    return next ? next.toString() : null;
  }

  public generatorInfo(): GeneratorInfo {
    return {
      version: this.generator.version,
      identity: this.generator.identity,
      strict: this.generator.strict,
      randomScope: this.appConfig.sulid.randomScope,
    };
  }
}
