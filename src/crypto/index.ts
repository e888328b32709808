export * from './core';
export * from './derivation';
export { aggregateSignatures, verifyAggregate, type PublicKeyMessagePair } from './aggregate';
export { keyGen, deriveChildSkHardened, hkdfModR, MIN_SEED_LENGTH } from './eip2333';
