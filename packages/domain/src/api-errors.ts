/**
 * HTTP error registry for the gateway.
 *
 * Each entry pairs a stable error code with its default status and message,
 * so route handlers render the same envelope for the same failure.
 */

export interface ApiErrorDefinition {
  code: string;
  status: number;
  message: string;
}

/** Structured API error that can be thrown from any route handler. */
export class ApiError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(def: ApiErrorDefinition, message?: string, details?: unknown) {
    super(message ?? def.message);
    this.name = 'ApiError';
    this.code = def.code;
    this.status = def.status;
    this.details = details;
  }
}

export const ERRORS = {
  // ── Session ──
  UNAUTHORIZED: { code: 'UNAUTHORIZED', status: 401, message: 'Authorization required.' },
  NOT_FOUND: { code: 'NOT_FOUND', status: 404, message: 'Route not found.' },

  // ── Validation ──
  INVALID_PAYLOAD: { code: 'INVALID_PAYLOAD', status: 400, message: 'Invalid request payload.' },
  MISSING_REQUIRED_FIELD: { code: 'MISSING_REQUIRED_FIELD', status: 400, message: 'A required field is missing.' },
  PAYMENTS_DISABLED: { code: 'PAYMENTS_DISABLED', status: 404, message: 'No merchant account is configured.' },

  // ── Users & groups ──
  SUBSCRIPTION_REQUIRED: { code: 'SUBSCRIPTION_REQUIRED', status: 409, message: 'The user does not follow the account.' },
  UNKNOWN_GROUP: { code: 'UNKNOWN_GROUP', status: 404, message: 'Group not found.' },

  // ── Provider ──
  PROVIDER_ERROR: { code: 'PROVIDER_ERROR', status: 502, message: 'The provider rejected the request.' },
  PROVIDER_PROTOCOL_ERROR: { code: 'PROVIDER_PROTOCOL_ERROR', status: 502, message: 'The provider returned an incomplete response.' },
  PROVIDER_UNAVAILABLE: { code: 'PROVIDER_UNAVAILABLE', status: 503, message: 'The provider could not be reached.' },

  // ── Push ──
  PUSH_SIGNATURE_INVALID: { code: 'PUSH_SIGNATURE_INVALID', status: 401, message: 'Invalid push signature.' },
  NOTIFICATION_SIGNATURE_INVALID: { code: 'NOTIFICATION_SIGNATURE_INVALID', status: 401, message: 'Invalid notification signature.' },

  // ── Internal ──
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500, message: 'An unexpected internal error occurred.' }
} as const satisfies Record<string, ApiErrorDefinition>;
