/**
 * Core profile: the identifier type and a generator fed by the caller.
 * Nothing here reads the clock, draws entropy, logs or loads configuration.
 */
export { Sulid } from './sulid';
export type { FromPartsOptions, ParseResult } from './sulid';
export { BaseSulidGenerator, CoreSulidGenerator } from './coreGenerator';
export type { BaseGeneratorOptions } from './coreGenerator';
export { DecodeError, EncodeError, PreconditionError } from './errors';
export type { DecodeErrorKind, EncodeErrorKind } from './errors';
export {
  MAX_DATA_CENTER_ID,
  MAX_MACHINE_ID,
  MAX_WORKER_ID,
  SULID_VERSIONS,
  isSulidVersion,
} from './layout';
export type {
  DecodedParts,
  SulidParts,
  SulidV1Parts,
  SulidV2Parts,
  SulidVersion,
  WorkerIdentity,
} from './layout';
