import type { Queryable } from '../../connections/db/store';
import {
  CreateProductInput,
  Product,
  ProductRow,
  toProduct,
} from '../../connections/db/models/product.model';
import { compileFilters, toWhereClause } from '../../utils/filters';
import { Page, PageRequest, offsetOf } from '../../utils/pagination';
import { ProductFilters, productFilterSet } from './products.filters';

export interface ProductRepository {
  create(input: CreateProductInput): Promise<Product>;
  findById(id: number): Promise<Product | null>;
  /** Products among `ids` that exist; unknown ids are skipped */
  findByIds(ids: number[]): Promise<Product[]>;
  list(filters: ProductFilters, page: PageRequest): Promise<Page<Product>>;
}

const PRODUCT_COLUMNS = 'p.id, p.name, p.price, p.stock';

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateProductInput): Promise<Product> {
    const result = await this.db.query<ProductRow>(
      `INSERT INTO products (name, price, stock)
       VALUES ($1, $2, $3)
       RETURNING id, name, price, stock`,
      [input.name, input.price, input.stock]
    );
    return toProduct(result.rows[0]);
  }

  async findById(id: number): Promise<Product | null> {
    const result = await this.db.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products p WHERE p.id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async findByIds(ids: number[]): Promise<Product[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.db.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products p WHERE p.id = ANY($1::int[]) ORDER BY p.id`,
      [ids]
    );
    return result.rows.map(toProduct);
  }

  async list(filters: ProductFilters, page: PageRequest): Promise<Page<Product>> {
    const { clauses, params } = compileFilters(productFilterSet, filters);
    const where = toWhereClause(clauses);

    const countResult = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM products p${where}`,
      params
    );
    const total = countResult.rows.length > 0 ? parseInt(countResult.rows[0].count, 10) : 0;

    const result = await this.db.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products p${where}
       ORDER BY p.id
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, page.limit, offsetOf(page)]
    );

    return { items: result.rows.map(toProduct), total };
  }
}
