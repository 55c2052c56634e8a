import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        price NUMERIC(10, 2) NOT NULL CHECK (price >= 0.01),
        stock INTEGER NOT NULL DEFAULT 0 CHECK (stock >= 0)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_products_price ON products(price)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_products_price');
    await client.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
