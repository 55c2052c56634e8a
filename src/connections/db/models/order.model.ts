import { parseMoney } from '../../../utils/money';
import { Customer } from './customer.model';
import { Product } from './product.model';

// Order Model

export interface OrderRow {
  id: number;
  customer_id: number; // ON DELETE CASCADE
  total_amount: string; // NUMERIC(10, 2) - default: 0
  order_date: Date; // set on insert
}

/** Order joined with its customer, customer columns prefixed with customer_ */
export interface OrderWithCustomerRow extends OrderRow {
  customer_name: string;
  customer_email: string;
  customer_phone: string | null;
  customer_created_at: Date;
}

/** Row of order_products joined with products */
export interface OrderProductRow {
  order_id: number;
  id: number;
  name: string;
  price: string;
  stock: number;
}

export interface OrderRecord {
  id: number;
  customer_id: number;
  total_amount: number;
  order_date: string;
}

export interface Order {
  id: number;
  customer: Customer;
  products: Product[];
  total_amount: number; // snapshot of product prices at creation
  order_date: string;
}

export const toOrderRecord = (row: OrderRow): OrderRecord => ({
  id: row.id,
  customer_id: row.customer_id,
  total_amount: parseMoney(row.total_amount),
  order_date: row.order_date.toISOString(),
});
