export const COMPLETION_PROVIDER_PORT = Symbol('COMPLETION_PROVIDER_PORT');
export const PROVIDER_RATE_LIMITER_PORT = Symbol('PROVIDER_RATE_LIMITER_PORT');
export const RESULT_CACHE_PORT = Symbol('RESULT_CACHE_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
export const CLOCK_PORT = Symbol('CLOCK_PORT');
export const EMISSION_FACTOR_TABLE = Symbol('EMISSION_FACTOR_TABLE');
