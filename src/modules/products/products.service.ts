import type { CrmStore } from '../../connections/db/store';
import { Product } from '../../connections/db/models/product.model';
import { NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { PageResult, paginationSchema } from '../../utils/pagination';
import { parseId, parseInput } from '../../utils/validation';
import { productFilterSchema } from './products.filters';
import { createProductSchema } from './products.validation';

/**
 * Create a product. Price must be positive (rounded to cents); stock
 * defaults to 0 and may not be negative.
 */
export const createProduct = async (store: CrmStore, input: unknown): Promise<Product> => {
  const data = parseInput(createProductSchema, input);
  const product = await store.products.create(data);
  logger.info('Product created', { productId: product.id });
  return product;
};

export const getProduct = async (store: CrmStore, id: unknown): Promise<Product> => {
  const productId = parseId(id);
  const product = productId === null ? null : await store.products.findById(productId);
  if (!product) {
    throw new NotFoundError('Product not found');
  }
  return product;
};

export const listProducts = async (store: CrmStore, query: unknown): Promise<PageResult<Product>> => {
  const filters = parseInput(productFilterSchema, query);
  const page = parseInput(paginationSchema, query);
  const { items, total } = await store.products.list(filters, page);
  return { items, total, page: page.page, limit: page.limit };
};
