import type { SessionStore } from '@wxgate/session';
import type { UserView } from '../users/index.js';

export interface AuthenticateInput {
  /** Authorization code from the provider's redirect, if present. */
  code?: string;
  /** Absolute URL of the current request; the user returns here after consent. */
  currentUrl: string;
  session: SessionStore;
}

export interface AuthenticatedUser {
  identityId: string;
  user: UserView;
}

export type AuthOutcome = ({ kind: 'authenticated' } & AuthenticatedUser) | { kind: 'redirect'; location: string };
