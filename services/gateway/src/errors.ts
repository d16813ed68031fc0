import { ProviderTransportError, XmlDecodeError } from '@wxgate/adapters';
import { ApiError, ERRORS } from '@wxgate/domain';
import { toApiError } from '@wxgate/http';

/** Gateway-level mapping: adapter failures first, then the shared domain mapping. */
export function toGatewayError(error: unknown): ApiError {
  if (error instanceof ProviderTransportError) {
    return new ApiError(ERRORS.PROVIDER_UNAVAILABLE, error.message, { operation: error.operation });
  }
  if (error instanceof XmlDecodeError) {
    return new ApiError(ERRORS.INVALID_PAYLOAD, error.message);
  }
  return toApiError(error);
}

/** Status code Fastify attached to its own errors (bad JSON, unsupported media type, …). */
export function frameworkStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return undefined;
  }
  const status = error.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}
