import bcrypt from 'bcryptjs';
import { QueryResultRow } from 'pg';
import { BackendResult, CredentialBackend } from '../types/auth.types';
import { logger } from '../utils/logger';

/**
 * Anything that runs parameterized SQL (the Database wrapper or a pg Pool)
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

export interface UserRow {
  username: string;
  fullName: string | null;
  passwordHash: string;
}

function toUserRow(row: QueryResultRow | undefined): UserRow | null {
  if (!row || typeof row.username !== 'string' || typeof row.passwordHash !== 'string') {
    return null;
  }

  return {
    username: row.username,
    fullName: typeof row.fullName === 'string' ? row.fullName : null,
    passwordHash: row.passwordHash,
  };
}

/**
 * Secondary credential backend: gateway_users table with bcrypt hashes
 */
export class UserService implements CredentialBackend {
  readonly name = 'database' as const;
  private db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  /**
   * Find user by username
   */
  async findByUsername(username: string): Promise<UserRow | null> {
    const query = `
      SELECT username, full_name as "fullName", password_hash as "passwordHash"
      FROM gateway_users
      WHERE username = $1
    `;

    const result = await this.db.query(query, [username]);
    return toUserRow(result.rows[0]);
  }

  /**
   * Verify a username/password pair. Lookup failures mean the store
   * could not be reached; a missing user or bad hash is a rejection.
   */
  async verify(username: string, secret: string): Promise<BackendResult> {
    let user: UserRow | null;
    try {
      user = await this.findByUsername(username);
    } catch (error) {
      logger.warn('Credential database unreachable', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: false, reason: 'backend unreachable' };
    }

    if (!user || !(await bcrypt.compare(secret, user.passwordHash))) {
      return { success: false, reason: 'credentials rejected' };
    }

    return { success: true, displayName: user.fullName || user.username };
  }
}
