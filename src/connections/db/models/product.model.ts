import { parseMoney } from '../../../utils/money';

// Product Model

export interface ProductRow {
  id: number;
  name: string; // VARCHAR(100)
  price: string; // NUMERIC(10, 2), >= 0.01
  stock: number; // default: 0, >= 0
}

export interface Product {
  id: number;
  name: string;
  price: number;
  stock: number;
}

export interface CreateProductInput {
  name: string;
  price: number;
  stock: number;
}

export const toProduct = (row: ProductRow): Product => ({
  id: row.id,
  name: row.name,
  price: parseMoney(row.price),
  stock: row.stock,
});
