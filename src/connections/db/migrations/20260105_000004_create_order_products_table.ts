import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_products (
        order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        PRIMARY KEY (order_id, product_id)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_order_products_product ON order_products(product_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_order_products_product');
    await client.query('DROP TABLE IF EXISTS order_products CASCADE');
  },
};
