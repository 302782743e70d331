/**
 * Full profile: the core profile plus the system clock, crypto-backed
 * randomness and the self-sufficient {@link SulidGenerator}.
 */
export * from './core';
export { SulidGenerator, systemClock } from './generator';
export type { Clock, SulidGeneratorOptions } from './generator';
export { CryptoRandomSource, RANDOM_SCOPES, isRandomScope, resolveRandomSource, sharedRandomSource } from './random';
export type { RandomScope, RandomSource } from './random';
