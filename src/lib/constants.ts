/**
 * Application Constants
 *
 * Centralized configuration values and magic numbers.
 */

/**
 * Redis connection health check interval
 * Only ping if this duration has elapsed since last successful operation
 */
export const PING_INTERVAL_MS = 30000; // 30 seconds

/**
 * Longest raw key accepted by the decode endpoint
 */
export const MAX_KEY_LENGTH = 4096;

/**
 * Longest single identifier segment (hostname, workload ID, ...)
 */
export const MAX_SEGMENT_LENGTH = 253;

/**
 * Decoding is a pure function of the key, so responses can be cached long
 */
export const DECODE_CACHE_SECONDS = 3600;
