export {
  authenticatedUser,
  createAuthPreHandler,
  currentUrlOf,
  type AuthPreHandler,
  type AuthPreHandlerOptions
} from './pre-handler.js';
export { AuthFlow, stripAuthParams, type AuthFlowOptions } from './service.js';
export type { AuthenticatedUser, AuthenticateInput, AuthOutcome } from './types.js';
