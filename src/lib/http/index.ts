export { TokenBucketRateLimiter } from "./rate-limiter.js";
export type { RateLimiterConfig } from "./rate-limiter.js";
