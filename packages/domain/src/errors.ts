/**
 * Error kinds raised by the session, signing and payment layers.
 *
 * Validation and precondition errors are thrown before any network I/O.
 * Provider errors carry the provider's own code and message unchanged.
 * Refresh failures are absorbed by the auth flow and turned into a redirect.
 */

export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly field: string,
    message = `Missing required parameter "${field}".`
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class AuthorizationRequiredError extends Error {
  readonly code = 'AUTHORIZATION_REQUIRED';

  constructor(message = 'No usable session; the user must authorize again.') {
    super(message);
    this.name = 'AuthorizationRequiredError';
  }
}

export class RemoteProviderError extends Error {
  readonly code = 'REMOTE_PROVIDER_ERROR';

  constructor(
    readonly operation: string,
    readonly providerCode: string,
    readonly providerMessage: string
  ) {
    super(`Provider rejected ${operation}: ${providerCode} ${providerMessage}`.trim());
    this.name = 'RemoteProviderError';
  }
}

/** The provider answered, but without fields the protocol guarantees. */
export class ProviderProtocolError extends Error {
  readonly code = 'PROVIDER_PROTOCOL_ERROR';

  constructor(
    readonly operation: string,
    readonly missingField: string
  ) {
    super(`Provider response for ${operation} is missing "${missingField}".`);
    this.name = 'ProviderProtocolError';
  }
}

export class SubscriptionRequiredError extends Error {
  readonly code = 'SUBSCRIPTION_REQUIRED';

  constructor(readonly identityId: string) {
    super(`User ${identityId} does not follow the account.`);
    this.name = 'SubscriptionRequiredError';
  }
}

export class UnknownGroupError extends Error {
  readonly code = 'UNKNOWN_GROUP';

  constructor(readonly group: number | string) {
    super(`Group ${typeof group === 'number' ? `#${group}` : `"${group}"`} does not exist.`);
    this.name = 'UnknownGroupError';
  }
}

export class ProfileNotLoadedError extends Error {
  readonly code = 'PROFILE_NOT_LOADED';

  constructor() {
    super('Extended profile fields are not loaded; call upgrade() first.');
    this.name = 'ProfileNotLoadedError';
  }
}

export class SignatureMismatchError extends Error {
  readonly code = 'SIGNATURE_MISMATCH';

  constructor(message = 'Signature does not match the payload.') {
    super(message);
    this.name = 'SignatureMismatchError';
  }
}
