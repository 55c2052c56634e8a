import type { Queryable } from '../../connections/db/store';
import {
  CreateCustomerInput,
  Customer,
  CustomerRow,
  toCustomer,
} from '../../connections/db/models/customer.model';
import { compileFilters, toWhereClause } from '../../utils/filters';
import { Page, PageRequest, offsetOf } from '../../utils/pagination';
import { CustomerFilters, customerFilterSet } from './customers.filters';

export interface CustomerRepository {
  existsByEmail(email: string): Promise<boolean>;
  create(input: CreateCustomerInput): Promise<Customer>;
  findById(id: number): Promise<Customer | null>;
  list(filters: CustomerFilters, page: PageRequest): Promise<Page<Customer>>;
}

const CUSTOMER_COLUMNS = 'c.id, c.name, c.email, c.phone, c.created_at';

export class PgCustomerRepository implements CustomerRepository {
  constructor(private readonly db: Queryable) {}

  async existsByEmail(email: string): Promise<boolean> {
    const result = await this.db.query('SELECT 1 FROM customers WHERE email = $1 LIMIT 1', [email]);
    return result.rows.length > 0;
  }

  async create(input: CreateCustomerInput): Promise<Customer> {
    const result = await this.db.query<CustomerRow>(
      `INSERT INTO customers (name, email, phone)
       VALUES ($1, $2, $3)
       RETURNING id, name, email, phone, created_at`,
      [input.name, input.email, input.phone]
    );
    return toCustomer(result.rows[0]);
  }

  async findById(id: number): Promise<Customer | null> {
    const result = await this.db.query<CustomerRow>(
      `SELECT ${CUSTOMER_COLUMNS} FROM customers c WHERE c.id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toCustomer(result.rows[0]) : null;
  }

  async list(filters: CustomerFilters, page: PageRequest): Promise<Page<Customer>> {
    const { clauses, params } = compileFilters(customerFilterSet, filters);
    const where = toWhereClause(clauses);

    const countResult = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM customers c${where}`,
      params
    );
    const total = countResult.rows.length > 0 ? parseInt(countResult.rows[0].count, 10) : 0;

    const result = await this.db.query<CustomerRow>(
      `SELECT ${CUSTOMER_COLUMNS} FROM customers c${where}
       ORDER BY c.id
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, page.limit, offsetOf(page)]
    );

    return { items: result.rows.map(toCustomer), total };
  }
}
