export type BackendName = 'ldap' | 'database';

export type AuthFailureReason = 'backend unreachable' | 'credentials rejected';

/**
 * Result of a single backend check
 */
export type BackendResult =
  | { success: true; displayName: string }
  | { success: false; reason: AuthFailureReason };

/**
 * A credential backend (directory service or relational store)
 */
export interface CredentialBackend {
  readonly name: BackendName;
  verify(username: string, secret: string): Promise<BackendResult>;
}

/**
 * One attempt against one backend. The secret is never kept.
 */
export interface CredentialAttempt {
  username: string;
  backend: BackendName;
  success: boolean;
  reason?: AuthFailureReason;
  displayName?: string;
}

export interface AuthOutcome {
  success: boolean;
  backend?: BackendName;
  displayName?: string;
  attempts: CredentialAttempt[];
  // Combined display text when every backend failed
  reason?: string;
}
