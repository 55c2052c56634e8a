import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        customer_id INTEGER NOT NULL REFERENCES customers(id) ON DELETE CASCADE,
        -- Snapshot of product prices when the order was placed
        total_amount NUMERIC(10, 2) NOT NULL DEFAULT 0,
        order_date TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_customer ON orders(customer_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_order_date ON orders(order_date DESC)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_order_date');
    await client.query('DROP INDEX IF EXISTS idx_orders_customer');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
