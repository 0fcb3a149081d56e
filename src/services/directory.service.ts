import { Client, Entry, InvalidCredentialsError, SearchOptions } from 'ldapts';
import { BackendResult, CredentialBackend } from '../types/auth.types';
import { LdapConfig } from '../types/config.types';
import { logger } from '../utils/logger';

/**
 * The slice of an LDAP client the directory backend needs
 */
export interface DirectoryClient {
  bind(dn: string, password: string): Promise<void>;
  search(baseDN: string, options?: SearchOptions): Promise<{ searchEntries: Entry[] }>;
  unbind(): Promise<void>;
}

export type DirectoryClientFactory = () => DirectoryClient;

/**
 * Escape a value for use inside a distinguished name (RFC 4514)
 */
export function escapeDnValue(value: string): string {
  return value
    .replace(/[\\,+"<>;=]/g, (ch) => `\\${ch}`)
    .replace(/^[ #]/, (ch) => `\\${ch}`)
    .replace(/ $/, '\\ ');
}

function attributeText(entry: Entry | undefined, attribute: string): string | null {
  if (!entry) {
    return null;
  }

  const raw = entry[attribute];
  const first = Array.isArray(raw) ? raw[0] : raw;
  if (first === undefined) {
    return null;
  }

  const text = Buffer.isBuffer(first) ? first.toString('utf8') : first;
  return text.trim() || null;
}

/**
 * Primary credential backend: simple bind as the user, then read the
 * display-name attribute from the user's own entry
 */
export class DirectoryService implements CredentialBackend {
  readonly name = 'ldap' as const;
  private readonly options: LdapConfig;
  private readonly clientFactory: DirectoryClientFactory;

  constructor(options: LdapConfig, clientFactory?: DirectoryClientFactory) {
    this.options = options;
    this.clientFactory =
      clientFactory ??
      (() =>
        new Client({
          url: options.url,
          timeout: options.timeoutMs,
          connectTimeout: options.timeoutMs,
        }));
  }

  userDn(username: string): string {
    return this.options.userDnTemplate.replace('{username}', escapeDnValue(username));
  }

  async verify(username: string, secret: string): Promise<BackendResult> {
    const client = this.clientFactory();
    const dn = this.userDn(username);

    try {
      await client.bind(dn, secret);
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        return { success: false, reason: 'credentials rejected' };
      }
      logger.warn('Directory service unreachable', {
        url: this.options.url,
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: false, reason: 'backend unreachable' };
    }

    try {
      const attribute = this.options.displayNameAttribute;
      const { searchEntries } = await client.search(dn, {
        scope: 'base',
        attributes: [attribute],
      });
      return {
        success: true,
        displayName: attributeText(searchEntries[0], attribute) ?? username,
      };
    } catch (error) {
      // Bind already proved the credentials; only the display name is lost
      logger.warn('Directory attribute search failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: true, displayName: username };
    } finally {
      await client.unbind().catch((error: unknown) => {
        logger.debug('Directory unbind failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }
}
