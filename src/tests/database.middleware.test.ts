import { QueryResult, QueryResultRow } from 'pg';
import { ClientSource, openSession, withStore } from '../middlewares/database.middleware';
import { SessionCarrier } from '../types/request.types';

/** Pool handing out clients that log their queries and their release */
class FakePool implements ClientSource {
  readonly log: string[] = [];

  async connect() {
    this.log.push('connect');
    return {
      query: async <R extends QueryResultRow = QueryResultRow>(text: string): Promise<QueryResult<R>> => {
        this.log.push(text.replace(/\s+/g, ' ').trim());
        return { command: '', rowCount: 0, oid: 0, rows: [], fields: [] };
      },
      release: () => {
        this.log.push('release');
      },
    };
  }
}

describe('withStore', () => {
  it('holds the client until the transaction has committed', async () => {
    const pool = new FakePool();
    const req: SessionCarrier = { withStore: openSession(pool) };

    const taken = await withStore(req, store =>
      store.transaction(tx => tx.customers.existsByEmail('a@example.com'))
    );

    expect(taken).toBe(false);
    expect(pool.log).toEqual([
      'connect',
      'BEGIN',
      'SELECT 1 FROM customers WHERE email = $1 LIMIT 1',
      'COMMIT',
      'release',
    ]);
  });

  it('releases the client after a failed transaction has rolled back', async () => {
    const pool = new FakePool();
    const req: SessionCarrier = { withStore: openSession(pool) };

    await expect(withStore(req, store => store.transaction(async () => {
      throw new Error('boom');
    }))).rejects.toThrow('boom');

    expect(pool.log).toEqual(['connect', 'BEGIN', 'ROLLBACK', 'release']);
  });

  it('checks out a client for each piece of work', async () => {
    const pool = new FakePool();
    const req: SessionCarrier = { withStore: openSession(pool) };

    await withStore(req, async () => 'first');
    await withStore(req, async () => 'second');

    expect(pool.log).toEqual(['connect', 'release', 'connect', 'release']);
  });

  it('fails without an attached session', () => {
    expect(() => withStore({}, async () => 'never')).toThrow('No database session attached to the request');
  });
});
