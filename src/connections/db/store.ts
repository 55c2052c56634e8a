import { QueryResult, QueryResultRow } from 'pg';
import { CustomerRepository, PgCustomerRepository } from '../../modules/customers/customers.repository';
import { PgProductRepository, ProductRepository } from '../../modules/products/products.repository';
import { OrderRepository, PgOrderRepository } from '../../modules/orders/orders.repository';

/**
 * The part of a pg client the repositories need. A PoolClient checked out for
 * the current request satisfies it.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface CrmStore {
  readonly customers: CustomerRepository;
  readonly products: ProductRepository;
  readonly orders: OrderRepository;

  /**
   * Run `work` atomically. Nested calls open a savepoint, so an inner failure
   * undoes only the inner work.
   */
  transaction<T>(work: (store: CrmStore) => Promise<T>): Promise<T>;
}

export class PgCrmStore implements CrmStore {
  readonly customers: CustomerRepository;
  readonly products: ProductRepository;
  readonly orders: OrderRepository;

  constructor(private readonly db: Queryable, private readonly depth: number = 0) {
    this.customers = new PgCustomerRepository(db);
    this.products = new PgProductRepository(db);
    this.orders = new PgOrderRepository(db);
  }

  async transaction<T>(work: (store: CrmStore) => Promise<T>): Promise<T> {
    const savepoint = `crm_sp_${this.depth}`;
    const nested = this.depth > 0;

    await this.db.query(nested ? `SAVEPOINT ${savepoint}` : 'BEGIN');
    try {
      const result = await work(new PgCrmStore(this.db, this.depth + 1));
      await this.db.query(nested ? `RELEASE SAVEPOINT ${savepoint}` : 'COMMIT');
      return result;
    } catch (error) {
      if (nested) {
        await this.db.query(`ROLLBACK TO SAVEPOINT ${savepoint}`);
        await this.db.query(`RELEASE SAVEPOINT ${savepoint}`);
      } else {
        await this.db.query('ROLLBACK');
      }
      throw error;
    }
  }
}
