import {
  ApiError,
  AuthorizationRequiredError,
  ERRORS,
  ProviderProtocolError,
  RemoteProviderError,
  SignatureMismatchError,
  SubscriptionRequiredError,
  UnknownGroupError,
  ValidationError
} from '@wxgate/domain';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

export function errorEnvelope(request: FastifyRequest, code: string, message: string, details?: unknown): { error: Record<string, unknown> } {
  const error: Record<string, unknown> = {
    code,
    message,
    requestId: request.id
  };

  if (details !== undefined) {
    error.details = details;
  }

  return { error };
}

export function deny(params: {
  request: FastifyRequest;
  reply: FastifyReply;
  code: string;
  message: string;
  status?: number;
  details?: unknown;
}): FastifyReply {
  return params.reply.status(params.status ?? 400).send(errorEnvelope(params.request, params.code, params.message, params.details));
}

/** Maps domain and validation errors onto the registry; anything unrecognized is an internal error. */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof ValidationError) {
    return new ApiError(ERRORS.MISSING_REQUIRED_FIELD, error.message, { field: error.field });
  }
  if (error instanceof z.ZodError) {
    return new ApiError(ERRORS.INVALID_PAYLOAD, error.issues[0]?.message ?? ERRORS.INVALID_PAYLOAD.message, error.issues);
  }
  if (error instanceof AuthorizationRequiredError) {
    return new ApiError(ERRORS.UNAUTHORIZED, error.message);
  }
  if (error instanceof SubscriptionRequiredError) {
    return new ApiError(ERRORS.SUBSCRIPTION_REQUIRED, error.message);
  }
  if (error instanceof UnknownGroupError) {
    return new ApiError(ERRORS.UNKNOWN_GROUP, error.message);
  }
  if (error instanceof RemoteProviderError) {
    return new ApiError(ERRORS.PROVIDER_ERROR, error.message, {
      operation: error.operation,
      providerCode: error.providerCode,
      providerMessage: error.providerMessage
    });
  }
  if (error instanceof ProviderProtocolError) {
    return new ApiError(ERRORS.PROVIDER_PROTOCOL_ERROR, error.message, { operation: error.operation });
  }
  if (error instanceof SignatureMismatchError) {
    return new ApiError(ERRORS.NOTIFICATION_SIGNATURE_INVALID, error.message);
  }
  return new ApiError(ERRORS.INTERNAL_ERROR);
}

export function replyWithError(request: FastifyRequest, reply: FastifyReply, error: ApiError): FastifyReply {
  return deny({
    request,
    reply,
    code: error.code,
    message: error.message,
    status: error.status,
    details: error.details
  });
}
