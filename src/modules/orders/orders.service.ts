import type { CrmStore } from '../../connections/db/store';
import { Order } from '../../connections/db/models/order.model';
import { Product } from '../../connections/db/models/product.model';
import { EmptyInputError, NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { sumMoney } from '../../utils/money';
import { PageResult, paginationSchema } from '../../utils/pagination';
import { parseId, parseInput } from '../../utils/validation';
import { orderFilterSchema } from './orders.filters';
import { createOrderSchema } from './orders.validation';

/**
 * Order total: the sum of the current prices of its products. Stored once
 * when the order is created; later price changes do not touch it.
 */
export const calculateOrderTotal = (products: Pick<Product, 'price'>[]): number =>
  sumMoney(products.map(product => product.price));

const uniqueIds = (values: Array<string | number>): number[] => {
  const ids = new Set<number>();
  for (const value of values) {
    const id = parseId(value);
    if (id !== null) ids.add(id);
  }
  return [...ids];
};

/**
 * Create an order for a customer from a list of product ids. Ids that match
 * no product are dropped; the order fails only when none match.
 */
export const createOrder = async (store: CrmStore, input: unknown): Promise<Order> => {
  const data = parseInput(createOrderSchema, input);

  if (data.product_ids.length === 0) {
    throw new EmptyInputError('At least one product must be provided');
  }

  const customerId = parseId(data.customer_id);
  const customer = customerId === null ? null : await store.customers.findById(customerId);
  if (!customer) {
    throw new NotFoundError('Invalid customer ID', { customer_id: data.customer_id });
  }

  const products = await store.products.findByIds(uniqueIds(data.product_ids));
  if (products.length === 0) {
    throw new NotFoundError('Invalid product IDs', { product_ids: data.product_ids });
  }

  const order = await store.transaction(async tx => {
    const created = await tx.orders.create(customer.id);
    await tx.orders.addProducts(created.id, products.map(product => product.id));
    const totalled = await tx.orders.updateTotal(created.id, calculateOrderTotal(products));

    return {
      id: totalled.id,
      customer,
      products,
      total_amount: totalled.total_amount,
      order_date: totalled.order_date,
    };
  });

  logger.info('Order created', {
    orderId: order.id,
    customerId: customer.id,
    productCount: products.length,
    totalAmount: order.total_amount,
  });
  return order;
};

export const getOrder = async (store: CrmStore, id: unknown): Promise<Order> => {
  const orderId = parseId(id);
  const order = orderId === null ? null : await store.orders.findById(orderId);
  if (!order) {
    throw new NotFoundError('Order not found');
  }
  return order;
};

export const listOrders = async (store: CrmStore, query: unknown): Promise<PageResult<Order>> => {
  const filters = parseInput(orderFilterSchema, query);
  const page = parseInput(paginationSchema, query);
  const { items, total } = await store.orders.list(filters, page);
  return { items, total, page: page.page, limit: page.limit };
};
