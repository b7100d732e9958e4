export { ProviderHttpError, ProviderNetworkError, ProviderResponseParseError } from './provider.errors';
export {
  classifyProviderFailure,
  isRetryableHttpStatus,
  isRetryableProviderFailure,
  unwrapProviderFailure,
  type ProviderFailureReason,
} from './provider-failure';
