export { ApiError, ERRORS, type ApiErrorDefinition } from './api-errors.js';
export {
  AuthorizationRequiredError,
  ProfileNotLoadedError,
  ProviderProtocolError,
  RemoteProviderError,
  SignatureMismatchError,
  SubscriptionRequiredError,
  UnknownGroupError,
  ValidationError
} from './errors.js';
export { classifyPush, type PushFields } from './push.js';
