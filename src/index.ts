export {
  CacheError,
  OptionValidationError,
  InvalidArgumentError,
  BackingStoreUnavailableError,
  CacheTimeoutError,
  EncryptionError,
} from "./errors";
export { TaggedCache, type CacheResult, type OperationOptions } from "./tagged-cache";
export { validateOptions, optionsFromEnv, type CacheOptions, type ResolvedCacheOptions } from "./options";
export { MemoryStore, type BackingStore, type MemoryStoreOptions } from "./stores";
export { RedisStore, createRedisStore, type RedisClient, type RedisStoreOptions } from "./redis-store";
export { PayloadCodec, deriveKey, encrypt, decrypt } from "./codec";
export { HitMissCounters, type HitMiss } from "./stats";
export { KeyedMutex, type Hold } from "./mutex";
export { cacheKey, listKey, itemKey, KEY_SEPARATOR } from "./keys";
export {
  MutationInvalidator,
  type MutationEvent,
  type MutationKind,
  type EntityRef,
  type InvalidationRule,
  type InvalidationRules,
} from "./invalidation";
export { warmCache, type WarmSource, type WarmOptions, type WarmReport } from "./warm";
export { keyReport, type KeyReport, type EntityKeyReport } from "./report";

// default export for people who just want the cache
export { TaggedCache as default } from "./tagged-cache";
