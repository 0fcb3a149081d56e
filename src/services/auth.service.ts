import { AuthOutcome, CredentialAttempt, CredentialBackend } from '../types/auth.types';
import { InputError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';

/**
 * Checks credentials against the primary backend and, whenever that does
 * not succeed for any reason, against the secondary one. Users provisioned
 * in only one of the two stores can still log in; a bad password is tried
 * twice.
 */
export class AuthService {
  private readonly primary: CredentialBackend;
  private readonly secondary: CredentialBackend;

  constructor(primary: CredentialBackend, secondary: CredentialBackend) {
    this.primary = primary;
    this.secondary = secondary;
  }

  async authenticate(username: string, secret: string): Promise<AuthOutcome> {
    const user = username.trim();
    if (!user || !secret) {
      throw new InputError('Username and password are both required to log in');
    }

    const attempts: CredentialAttempt[] = [];

    for (const backend of [this.primary, this.secondary]) {
      const result = await backend.verify(user, secret);

      if (result.success) {
        attempts.push({
          username: user,
          backend: backend.name,
          success: true,
          displayName: result.displayName,
        });
        logger.info('User authenticated', { username: user, backend: backend.name });
        return {
          success: true,
          backend: backend.name,
          displayName: result.displayName,
          attempts,
        };
      }

      attempts.push({
        username: user,
        backend: backend.name,
        success: false,
        reason: result.reason,
      });
    }

    const reason = attempts.map((a) => `${a.backend}: ${a.reason}`).join('; ');
    logger.warn('Authentication failed', { username: user, reason });

    return { success: false, attempts, reason };
  }
}
