/**
 * Configuration types for the queue file gateway.
 * Built once by loadConfig() and passed explicitly to the application.
 */

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export interface SessionConfig {
  dir: string;
  ttlMs: number;
  cookieSecure: boolean;
}

export interface LdapConfig {
  url: string;
  userDnTemplate: string;
  displayNameAttribute: string;
  timeoutMs: number;
}

export interface MailConfig {
  enabled: boolean;
  host: string;
  port: number;
  from: string;
  to: string;
}

export interface UploadConfig {
  root: string;
  maxBytes: number;
  maxFiles: number;
}

export interface SheetConfig {
  exportUrl: string;
}

export interface LoggingConfig {
  level: string;
  file: string;
  silent: boolean;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  database: DatabaseConfig;
  session: SessionConfig;
  ldap: LdapConfig;
  mail: MailConfig;
  upload: UploadConfig;
  sheet: SheetConfig;
  logging: LoggingConfig;
}
