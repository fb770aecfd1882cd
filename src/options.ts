import pino from "pino";
import { OptionValidationError } from "./errors";
import { MemoryStore, type BackingStore } from "./stores";

/* =========================================================================================
 * Options
 * =======================================================================================*/

/** Runtime options for the cache. */
export type CacheOptions = {
  /** Default TTL in seconds when `set` is called without one. Must be > 0. Default: 300. */
  stdTTL?: number;
  /** Periodic index sweep in seconds (>=30 or 0 to disable). Default: 600. */
  checkperiod?: number;
  /** Separator between a key's namespace and the rest of it. Default: "_". */
  namespaceSeparator?: string;
  /** Upper bound in ms for each backing-store call; 0 disables. Default: 2000. */
  operationTimeout?: number;
  /** AES-256-GCM encryption of payloads before they reach the store. Default: false. */
  encryption?: boolean;
  /** Secret for encryption (required if encryption=true). */
  secretKey?: string;
  /** Where payloads live. Default: a fresh `MemoryStore`. */
  store?: BackingStore;
  logger?: pino.Logger;
  /** Clock source for expiry bookkeeping; defaults to `Date.now`. */
  clock?: () => number;
};

export type ResolvedCacheOptions = {
  stdTTL: number;
  checkperiod: number;
  namespaceSeparator: string;
  operationTimeout: number;
  encryption: boolean;
  secretKey: string;
  store: BackingStore;
  logger: pino.Logger;
  clock: () => number;
};

/** Validate & normalize user options, producing a fully-populated options object. */
export function validateOptions(opts: CacheOptions = {}): ResolvedCacheOptions {
  if (opts.stdTTL !== undefined && (!Number.isFinite(opts.stdTTL) || opts.stdTTL <= 0)) {
    throw new OptionValidationError(`"stdTTL" must be a positive number of seconds (got ${opts.stdTTL})`);
  }
  if (opts.checkperiod !== undefined) {
    if (!Number.isInteger(opts.checkperiod) || opts.checkperiod < 0) {
      throw new OptionValidationError(`"checkperiod" must be 0 or a positive integer (got ${opts.checkperiod})`);
    }
    if (opts.checkperiod > 0 && opts.checkperiod < 30) {
      throw new OptionValidationError(`"checkperiod" must be at least 30 seconds when enabled (got ${opts.checkperiod})`);
    }
  }
  if (opts.namespaceSeparator !== undefined && opts.namespaceSeparator.length === 0) {
    throw new OptionValidationError(`"namespaceSeparator" must be a non-empty string`);
  }
  if (
    opts.operationTimeout !== undefined &&
    (!Number.isFinite(opts.operationTimeout) || opts.operationTimeout < 0)
  ) {
    throw new OptionValidationError(
      `"operationTimeout" must be a non-negative number of milliseconds (got ${opts.operationTimeout})`
    );
  }
  if (opts.encryption) {
    const sec = opts.secretKey ?? "";
    if (sec.length < 8) {
      throw new OptionValidationError(`"secretKey" must be a string of length >= 8 when "encryption" is true`);
    }
  }

  const clock = opts.clock ?? (() => Date.now());
  return {
    stdTTL: opts.stdTTL ?? 300,
    checkperiod: opts.checkperiod ?? 600,
    namespaceSeparator: opts.namespaceSeparator ?? "_",
    operationTimeout: opts.operationTimeout ?? 2000,
    encryption: opts.encryption ?? false,
    secretKey: opts.secretKey ?? "",
    store: opts.store ?? new MemoryStore({ clock }),
    logger: opts.logger ?? pino({ name: "tagged-cache", level: "info" }),
    clock,
  };
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new OptionValidationError(`Environment variable ${name} must be numeric (got "${raw}")`);
  }
  return value;
}

/**
 * Options from environment variables:
 * `CACHE_TTL`, `CACHE_CHECK_PERIOD`, `CACHE_OPERATION_TIMEOUT_MS`, `CACHE_SECRET_KEY`.
 * Setting `CACHE_SECRET_KEY` turns encryption on.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): CacheOptions {
  const opts: CacheOptions = {};
  const stdTTL = readNumber(env, "CACHE_TTL");
  if (stdTTL !== undefined) opts.stdTTL = stdTTL;
  const checkperiod = readNumber(env, "CACHE_CHECK_PERIOD");
  if (checkperiod !== undefined) opts.checkperiod = checkperiod;
  const operationTimeout = readNumber(env, "CACHE_OPERATION_TIMEOUT_MS");
  if (operationTimeout !== undefined) opts.operationTimeout = operationTimeout;
  const secretKey = env.CACHE_SECRET_KEY;
  if (secretKey) {
    opts.encryption = true;
    opts.secretKey = secretKey;
  }
  return opts;
}
