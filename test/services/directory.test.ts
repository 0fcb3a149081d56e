import { Entry, InvalidCredentialsError } from 'ldapts';
import {
  DirectoryClient,
  DirectoryService,
  escapeDnValue,
} from '../../src/services/directory.service';
import { LdapConfig } from '../../src/types/config.types';

const options: LdapConfig = {
  url: 'ldap://directory.test:389',
  userDnTemplate: 'uid={username},ou=people,dc=example,dc=org',
  displayNameAttribute: 'cn',
  timeoutMs: 1000,
};

class FakeClient implements DirectoryClient {
  bound: string[] = [];
  searched: string[] = [];
  unbound = 0;

  constructor(
    private readonly bindError: Error | null,
    private readonly entries: Entry[] | Error
  ) {}

  async bind(dn: string): Promise<void> {
    this.bound.push(dn);
    if (this.bindError) {
      throw this.bindError;
    }
  }

  async search(baseDN: string): Promise<{ searchEntries: Entry[] }> {
    this.searched.push(baseDN);
    if (this.entries instanceof Error) {
      throw this.entries;
    }
    return { searchEntries: this.entries };
  }

  async unbind(): Promise<void> {
    this.unbound += 1;
  }
}

describe('escapeDnValue', () => {
  it('escapes DN special characters', () => {
    expect(escapeDnValue('a,b+c')).toBe('a\\,b\\+c');
    expect(escapeDnValue('#lead')).toBe('\\#lead');
    expect(escapeDnValue('trail ')).toBe('trail\\ ');
  });
});

describe('DirectoryService', () => {
  const dn = 'uid=tester,ou=people,dc=example,dc=org';

  it('binds as the user and reads the display name', async () => {
    const client = new FakeClient(null, [{ dn, cn: ['Test User'] }]);
    const service = new DirectoryService(options, () => client);

    await expect(service.verify('tester', 'test-secret')).resolves.toEqual({
      success: true,
      displayName: 'Test User',
    });
    expect(client.bound).toEqual([dn]);
    expect(client.searched).toEqual([dn]);
    expect(client.unbound).toBe(1);
  });

  it('falls back to the username when the entry has no display name', async () => {
    const client = new FakeClient(null, [{ dn }]);
    const service = new DirectoryService(options, () => client);

    await expect(service.verify('tester', 'test-secret')).resolves.toEqual({
      success: true,
      displayName: 'tester',
    });
  });

  it('still succeeds when the attribute search fails after a good bind', async () => {
    const client = new FakeClient(null, new Error('size limit exceeded'));
    const service = new DirectoryService(options, () => client);

    await expect(service.verify('tester', 'test-secret')).resolves.toEqual({
      success: true,
      displayName: 'tester',
    });
    expect(client.unbound).toBe(1);
  });

  it('reports rejected credentials', async () => {
    const client = new FakeClient(new InvalidCredentialsError('bad password'), []);
    const service = new DirectoryService(options, () => client);

    await expect(service.verify('tester', 'wrong-secret')).resolves.toEqual({
      success: false,
      reason: 'credentials rejected',
    });
    expect(client.searched).toEqual([]);
  });

  it('reports any other bind failure as unreachable', async () => {
    const client = new FakeClient(new Error('connect ECONNREFUSED'), []);
    const service = new DirectoryService(options, () => client);

    await expect(service.verify('tester', 'test-secret')).resolves.toEqual({
      success: false,
      reason: 'backend unreachable',
    });
  });

  it('escapes the username into the bind DN', () => {
    const service = new DirectoryService(options, () => new FakeClient(null, []));
    expect(service.userDn('smith,admin')).toBe('uid=smith\\,admin,ou=people,dc=example,dc=org');
  });
});
