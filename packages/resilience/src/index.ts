export { TtlCache } from './cache/ttl-cache.js';
export { calculateExponentialBackoff, delay } from './backoff/backoff.js';
