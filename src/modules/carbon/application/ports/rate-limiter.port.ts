export interface ProviderRateLimiterPort {
  /** Resolves once the caller may start its provider call. */
  acquireSlot(): Promise<void>;
}
