export { ProviderRateLimiterAdapter } from './provider-rate-limiter.adapter';
