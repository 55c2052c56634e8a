import type { Queryable } from '../../connections/db/store';
import {
  Order,
  OrderProductRow,
  OrderRecord,
  OrderRow,
  OrderWithCustomerRow,
  toOrderRecord,
} from '../../connections/db/models/order.model';
import { toCustomer } from '../../connections/db/models/customer.model';
import { Product, toProduct } from '../../connections/db/models/product.model';
import { compileFilters, toWhereClause } from '../../utils/filters';
import { Page, PageRequest, offsetOf } from '../../utils/pagination';
import { OrderFilters, orderFilterSet } from './orders.filters';

export interface OrderRepository {
  create(customerId: number): Promise<OrderRecord>;
  addProducts(orderId: number, productIds: number[]): Promise<void>;
  updateTotal(orderId: number, totalAmount: number): Promise<OrderRecord>;
  findById(id: number): Promise<Order | null>;
  list(filters: OrderFilters, page: PageRequest): Promise<Page<Order>>;
}

const ORDER_COLUMNS = 'o.id, o.customer_id, o.total_amount, o.order_date';

const ORDER_WITH_CUSTOMER = `
  SELECT ${ORDER_COLUMNS},
         c.name AS customer_name,
         c.email AS customer_email,
         c.phone AS customer_phone,
         c.created_at AS customer_created_at
  FROM orders o
  JOIN customers c ON c.id = o.customer_id`;

export class PgOrderRepository implements OrderRepository {
  constructor(private readonly db: Queryable) {}

  async create(customerId: number): Promise<OrderRecord> {
    const result = await this.db.query<OrderRow>(
      `INSERT INTO orders (customer_id)
       VALUES ($1)
       RETURNING id, customer_id, total_amount, order_date`,
      [customerId]
    );
    return toOrderRecord(result.rows[0]);
  }

  async addProducts(orderId: number, productIds: number[]): Promise<void> {
    await this.db.query(
      `INSERT INTO order_products (order_id, product_id)
       SELECT $1, UNNEST($2::int[])
       ON CONFLICT DO NOTHING`,
      [orderId, productIds]
    );
  }

  async updateTotal(orderId: number, totalAmount: number): Promise<OrderRecord> {
    const result = await this.db.query<OrderRow>(
      `UPDATE orders SET total_amount = $2
       WHERE id = $1
       RETURNING id, customer_id, total_amount, order_date`,
      [orderId, totalAmount]
    );
    return toOrderRecord(result.rows[0]);
  }

  async findById(id: number): Promise<Order | null> {
    const result = await this.db.query<OrderWithCustomerRow>(
      `${ORDER_WITH_CUSTOMER} WHERE o.id = $1`,
      [id]
    );
    const orders = await this.withProducts(result.rows);
    return orders.length > 0 ? orders[0] : null;
  }

  async list(filters: OrderFilters, page: PageRequest): Promise<Page<Order>> {
    const { clauses, params } = compileFilters(orderFilterSet, filters);
    const where = toWhereClause(clauses);

    const countResult = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM orders o JOIN customers c ON c.id = o.customer_id${where}`,
      params
    );
    const total = countResult.rows.length > 0 ? parseInt(countResult.rows[0].count, 10) : 0;

    const result = await this.db.query<OrderWithCustomerRow>(
      `${ORDER_WITH_CUSTOMER}${where}
       ORDER BY o.id
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, page.limit, offsetOf(page)]
    );

    return { items: await this.withProducts(result.rows), total };
  }

  private async withProducts(rows: OrderWithCustomerRow[]): Promise<Order[]> {
    if (rows.length === 0) {
      return [];
    }

    const productsResult = await this.db.query<OrderProductRow>(
      `SELECT op.order_id, p.id, p.name, p.price, p.stock
       FROM order_products op
       JOIN products p ON p.id = op.product_id
       WHERE op.order_id = ANY($1::int[])
       ORDER BY op.order_id, p.id`,
      [rows.map(row => row.id)]
    );

    const productsByOrder = new Map<number, Product[]>();
    for (const row of productsResult.rows) {
      const products = productsByOrder.get(row.order_id) ?? [];
      products.push(toProduct(row));
      productsByOrder.set(row.order_id, products);
    }

    return rows.map(row => {
      const record = toOrderRecord(row);
      return {
        id: record.id,
        customer: toCustomer({
          id: row.customer_id,
          name: row.customer_name,
          email: row.customer_email,
          phone: row.customer_phone,
          created_at: row.customer_created_at,
        }),
        products: productsByOrder.get(row.id) ?? [],
        total_amount: record.total_amount,
        order_date: record.order_date,
      };
    });
  }
}
