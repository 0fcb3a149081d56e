import bcrypt from 'bcryptjs';
import { Database } from '../src/config/database';
import { loadConfig } from '../src/config/config';
import { Queryable } from '../src/services/user.service';
import { logger } from '../src/utils/logger';

const BCRYPT_ROUNDS = 10;

export interface NewGatewayUser {
  username: string;
  password: string;
  fullName?: string;
}

/**
 * Insert or update a user of the secondary credential store
 */
export async function upsertUser(
  db: Queryable,
  user: NewGatewayUser,
  rounds: number = BCRYPT_ROUNDS
): Promise<void> {
  const username = user.username.trim();
  if (!username || !user.password) {
    throw new Error('Username and password are both required');
  }

  const passwordHash = await bcrypt.hash(user.password, rounds);
  const sql = `
    INSERT INTO gateway_users (username, full_name, password_hash)
    VALUES ($1, $2, $3)
    ON CONFLICT (username) DO UPDATE
    SET full_name = EXCLUDED.full_name,
        password_hash = EXCLUDED.password_hash
  `;

  await db.query(sql, [username, user.fullName ?? null, passwordHash]);
  logger.info(`Provisioned user: ${username}`);
}

// Usage: add-user <username> <password> [full name]
async function main(argv: string[]): Promise<void> {
  const [username = '', password = '', ...name] = argv;
  const db = new Database(loadConfig().database);
  try {
    await upsertUser(db, {
      username,
      password,
      fullName: name.length > 0 ? name.join(' ') : undefined,
    });
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    logger.error('Failed to provision user:', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
