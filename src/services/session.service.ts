import crypto from 'crypto';
import path from 'path';
import { BackendName } from '../types/auth.types';
import { ClientSession, Session } from '../types/session.types';
import { atomicWriteJson, safeReadJson } from '../utils/storage.utils';
import { logger } from '../utils/logger';

const SESSION_ID_PATTERN = /^[0-9a-f]{64}$/;

export interface SessionStoreOptions {
  dir: string;
  ttlMs: number;
  clock?: () => number;
}

function isBackendName(value: unknown): value is BackendName {
  return value === 'ldap' || value === 'database';
}

/**
 * Narrow a parsed record file back into a Session
 */
function toSession(value: unknown): Session | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const record: Record<string, unknown> = { ...value };
  const { id, createdAt, expiresAt, backend, displayName } = record;

  if (
    typeof id !== 'string' ||
    typeof createdAt !== 'number' ||
    typeof expiresAt !== 'number' ||
    !isBackendName(backend) ||
    typeof displayName !== 'string'
  ) {
    return null;
  }

  return { id, createdAt, expiresAt, backend, displayName };
}

/**
 * File-backed session store. One JSON record per session, named from the
 * session id. Expired records stay on disk but never validate.
 */
export class SessionStore {
  private readonly dir: string;
  private readonly ttlMs: number;
  private readonly clock: () => number;

  constructor(options: SessionStoreOptions) {
    this.dir = options.dir;
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Issue a new session. The id is a SHA-256 digest of a high-resolution
   * timestamp and a random salt; uniqueness is probabilistic.
   */
  create(backend: BackendName, displayName: string): Session {
    const now = this.clock();
    const id = crypto
      .createHash('sha256')
      .update(`${now}:${process.hrtime.bigint()}:${crypto.randomBytes(16).toString('hex')}`)
      .digest('hex');

    return {
      id,
      createdAt: now,
      expiresAt: now + this.ttlMs,
      backend,
      displayName,
    };
  }

  /**
   * Write the session record. Returns false when the write failed, in
   * which case the session only lives as long as the client's cookie.
   */
  async persist(session: Session): Promise<boolean> {
    try {
      await atomicWriteJson(this.recordPath(session.id), session);
      return true;
    } catch (error) {
      logger.error('Failed to persist session record', {
        sessionId: `${session.id.substring(0, 8)}...`,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async load(id: string | undefined): Promise<Session | null> {
    if (!id || !SESSION_ID_PATTERN.test(id)) {
      return null;
    }

    try {
      const session = toSession(await safeReadJson(this.recordPath(id)));
      return session && session.id === id ? session : null;
    } catch (error) {
      logger.warn('Unreadable session record', {
        sessionId: `${id.substring(0, 8)}...`,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * The persisted session behind a client-presented id, if it is still live
   */
  async resolve(client: ClientSession): Promise<Session | null> {
    const session = await this.load(client.id);
    if (!session) {
      return null;
    }

    if (this.clock() >= session.expiresAt) {
      logger.debug('Session expired', { sessionId: `${session.id.substring(0, 8)}...` });
      return null;
    }

    return session;
  }

  async validate(client: ClientSession): Promise<boolean> {
    return (await this.resolve(client)) !== null;
  }

  /**
   * Log out: move the expiry into the past and keep the record
   */
  async invalidate(session: Session): Promise<Session> {
    const invalidated: Session = { ...session, expiresAt: this.clock() - 1 };
    await this.persist(invalidated);
    logger.info('Session invalidated', { displayName: session.displayName });
    return invalidated;
  }

  private recordPath(id: string): string {
    return path.join(this.dir, `session_${id}.json`);
  }
}
