import { BackendName } from './auth.types';

/**
 * Server-issued, time-bounded proof that a user authenticated.
 * Timestamps are epoch milliseconds.
 */
export interface Session {
  id: string;
  createdAt: number;
  expiresAt: number;
  backend: BackendName;
  displayName: string;
}

/**
 * Session fields as presented back by the client (cookies).
 * Nothing here is trusted until matched against a persisted record.
 */
export interface ClientSession {
  id?: string;
  createdAt?: string;
  expiresAt?: string;
  backend?: string;
  displayName?: string;
}
