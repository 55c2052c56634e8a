import { createProduct, getProduct, listProducts } from '../modules/products/products.service';
import { NotFoundError, ValidationError } from '../utils/errors';
import { InMemoryCrmStore } from './support/inMemoryStore';

describe('createProduct', () => {
  let store: InMemoryCrmStore;

  beforeEach(() => {
    store = new InMemoryCrmStore();
  });

  it('persists a product with the default stock of 0', async () => {
    const product = await createProduct(store, { name: 'Laptop', price: 999.99 });

    expect(product).toEqual({ id: 1, name: 'Laptop', price: 999.99, stock: 0 });
  });

  it('keeps an explicit stock', async () => {
    const product = await createProduct(store, { name: 'Mouse', price: 25, stock: 40 });

    expect(product.stock).toBe(40);
  });

  it.each([0, -5])('rejects the price %p', async price => {
    const attempt = createProduct(store, { name: 'Freebie', price });

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toThrow('Price must be positive');
  });

  it('accepts the smallest positive price', async () => {
    const product = await createProduct(store, { name: 'Sticker', price: 0.01 });

    expect(product.price).toBe(0.01);
  });

  it('rounds prices to cents', async () => {
    const product = await createProduct(store, { name: 'Cable', price: 19.999 });

    expect(product.price).toBe(20);
  });

  it('rejects a price that rounds down to zero', async () => {
    await expect(createProduct(store, { name: 'Dust', price: 0.004 }))
      .rejects.toThrow(new ValidationError('Price must be positive'));
  });

  it('rejects negative stock', async () => {
    await expect(createProduct(store, { name: 'Keyboard', price: 45, stock: -1 }))
      .rejects.toThrow(new ValidationError('Stock cannot be negative'));
  });

  it('rejects fractional stock', async () => {
    await expect(createProduct(store, { name: 'Keyboard', price: 45, stock: 1.5 }))
      .rejects.toThrow(new ValidationError('Stock must be an integer'));
  });

  it('rejects a price sent as text', async () => {
    await expect(createProduct(store, { name: 'Monitor', price: '199' }))
      .rejects.toThrow(new ValidationError('Price must be a number'));
  });
});

describe('getProduct', () => {
  it('returns the product or fails with NotFoundError', async () => {
    const store = new InMemoryCrmStore();
    const product = await createProduct(store, { name: 'Laptop', price: 999.99, stock: 3 });

    await expect(getProduct(store, '1')).resolves.toEqual(product);
    await expect(getProduct(store, '2')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('listProducts', () => {
  it('rejects a non-numeric price bound', async () => {
    const store = new InMemoryCrmStore();

    await expect(listProducts(store, { price__gte: 'cheap' }))
      .rejects.toThrow(new ValidationError('price__gte must be a number'));
  });

  it('rejects a page size above the maximum', async () => {
    const store = new InMemoryCrmStore();

    await expect(listProducts(store, { limit: '500' }))
      .rejects.toThrow(new ValidationError('limit must be at most 100'));
  });

  it('returns the requested page', async () => {
    const store = new InMemoryCrmStore();
    await createProduct(store, { name: 'A', price: 1 });
    await createProduct(store, { name: 'B', price: 2 });
    await createProduct(store, { name: 'C', price: 3 });

    const result = await listProducts(store, { page: '2', limit: '2' });

    expect(result.items.map(product => product.name)).toEqual(['C']);
    expect(result).toMatchObject({ total: 3, page: 2, limit: 2 });
  });
});
