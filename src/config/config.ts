import dotenv from 'dotenv';
import { AppConfig } from '../types/config.types';

// Load environment variables
dotenv.config();

type Env = Record<string, string | undefined>;

function intOf(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Build application configuration from environment variables
 * with sensible defaults
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';

  return {
    port: intOf(env.PORT, 3000),
    nodeEnv,

    database: {
      connectionString: env.DATABASE_URL,
      host: env.DATABASE_HOST || env.DB_HOST || 'localhost',
      port: intOf(env.DATABASE_PORT || env.DB_PORT, 5432),
      database: env.DATABASE_NAME || env.DB_NAME || 'qfile_gateway',
      user: env.DATABASE_USER || env.DB_USER || 'postgres',
      password: env.DATABASE_PASSWORD || env.DB_PASSWORD || '',
      ssl: env.DATABASE_SSL === 'true',
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: intOf(env.DATABASE_TIMEOUT_MS, 5000),
    },

    session: {
      dir: env.SESSION_DIR || './data/sessions',
      ttlMs: intOf(env.SESSION_TTL_HOURS, 3) * 60 * 60 * 1000,
      cookieSecure: env.COOKIE_SECURE === 'true',
    },

    ldap: {
      url: env.LDAP_URL || 'ldap://localhost:389',
      userDnTemplate:
        env.LDAP_USER_DN_TEMPLATE || 'uid={username},ou=people,dc=example,dc=org',
      displayNameAttribute: env.LDAP_DISPLAY_NAME_ATTRIBUTE || 'cn',
      timeoutMs: intOf(env.LDAP_TIMEOUT_MS, 10000),
    },

    mail: {
      enabled: env.MAIL_ENABLED === 'true',
      host: env.SMTP_HOST || 'localhost',
      port: intOf(env.SMTP_PORT, 25),
      from: env.MAIL_FROM || 'qfile-gateway@localhost',
      to: env.MAIL_TO || 'queue@localhost',
    },

    upload: {
      root: env.UPLOAD_ROOT || './data/uploads',
      maxBytes: intOf(env.MAX_UPLOAD_BYTES, 20 * 1024 * 1024),
      maxFiles: intOf(env.MAX_UPLOAD_FILES, 5),
    },

    sheet: {
      exportUrl:
        env.SHEET_EXPORT_URL ||
        'https://docs.google.com/spreadsheets/d/{id}/export?format=xlsx',
    },

    logging: {
      level: env.LOG_LEVEL || 'info',
      file: env.LOG_FILE === undefined ? './logs/app.log' : env.LOG_FILE,
      silent: nodeEnv === 'test',
    },
  };
}

/**
 * Warn about settings that only make sense with real values
 */
export function validateConfig(env: Env = process.env): string[] {
  const required = ['LDAP_URL', 'DATABASE_HOST', 'DATABASE_NAME', 'UPLOAD_ROOT'];

  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    console.warn(`Warning: Missing environment variables: ${missing.join(', ')}`);
    console.warn('Using default values. Set these in .env file for production.');
  }

  return missing;
}
