import bcrypt from 'bcryptjs';
import { QueryResultRow } from 'pg';
import { Queryable, UserService } from '../../src/services/user.service';

class FakeDb implements Queryable {
  readonly queries: Array<{ text: string; params?: unknown[] }> = [];

  constructor(private readonly rows: QueryResultRow[] | Error) {}

  async query(text: string, params?: unknown[]): Promise<{ rows: QueryResultRow[] }> {
    this.queries.push({ text, params });
    if (this.rows instanceof Error) {
      throw this.rows;
    }
    return { rows: this.rows };
  }
}

describe('UserService', () => {
  const passwordHash = bcrypt.hashSync('test-secret', 4);

  it('accepts a matching password and reports the full name', async () => {
    const db = new FakeDb([{ username: 'tester', fullName: 'Test User', passwordHash }]);

    await expect(new UserService(db).verify('tester', 'test-secret')).resolves.toEqual({
      success: true,
      displayName: 'Test User',
    });
    expect(db.queries[0].params).toEqual(['tester']);
  });

  it('uses the username when no full name is stored', async () => {
    const db = new FakeDb([{ username: 'tester', fullName: null, passwordHash }]);

    await expect(new UserService(db).verify('tester', 'test-secret')).resolves.toEqual({
      success: true,
      displayName: 'tester',
    });
  });

  it('rejects a wrong password', async () => {
    const db = new FakeDb([{ username: 'tester', fullName: 'Test User', passwordHash }]);

    await expect(new UserService(db).verify('tester', 'wrong-secret')).resolves.toEqual({
      success: false,
      reason: 'credentials rejected',
    });
  });

  it('rejects an unknown user', async () => {
    await expect(new UserService(new FakeDb([])).verify('nobody', 'test-secret')).resolves.toEqual({
      success: false,
      reason: 'credentials rejected',
    });
  });

  it('reports a failing query as unreachable', async () => {
    const db = new FakeDb(new Error('connection refused'));

    await expect(new UserService(db).verify('tester', 'test-secret')).resolves.toEqual({
      success: false,
      reason: 'backend unreachable',
    });
  });

  it('returns null from findByUsername for a malformed row', async () => {
    const db = new FakeDb([{ username: 'tester' }]);
    await expect(new UserService(db).findByUsername('tester')).resolves.toBeNull();
  });
});
