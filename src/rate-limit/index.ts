export {
  RateLimiter,
  DEFAULT_MAX_REQUESTS,
  DEFAULT_WINDOW_SECONDS,
  type RateLimiterOptions,
  type RateWindow
} from './limiter.js';
