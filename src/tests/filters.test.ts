import { compileFilters, escapeLike, toWhereClause } from '../utils/filters';
import { customerFilterSchema, customerFilterSet } from '../modules/customers/customers.filters';
import { productFilterSchema, productFilterSet } from '../modules/products/products.filters';
import { orderFilterSchema, orderFilterSet } from '../modules/orders/orders.filters';

describe('escapeLike', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });
});

describe('toWhereClause', () => {
  it('joins clauses with AND', () => {
    expect(toWhereClause(['a = $1', 'b = $2'])).toBe(' WHERE a = $1 AND b = $2');
  });

  it('is empty without clauses', () => {
    expect(toWhereClause([])).toBe('');
  });
});

describe('product filters', () => {
  it('compiles an inclusive price range', () => {
    const filters = productFilterSchema.parse({ price__gte: '10', price__lte: '20' });

    expect(compileFilters(productFilterSet, filters)).toEqual({
      clauses: ['p.price >= $1', 'p.price <= $2'],
      params: [10, 20],
    });
  });

  it('adds nothing for absent or blank parameters', () => {
    const filters = productFilterSchema.parse({ name: '', stock__gte: '  ' });

    expect(compileFilters(productFilterSet, filters)).toEqual({ clauses: [], params: [] });
  });

  it('matches names as case-insensitive substrings', () => {
    const filters = productFilterSchema.parse({ name: 'lap', stock__lte: '5' });

    expect(compileFilters(productFilterSet, filters)).toEqual({
      clauses: ['p.name ILIKE $1', 'p.stock <= $2'],
      params: ['%lap%', 5],
    });
  });

  it('rejects a fractional stock bound', () => {
    expect(() => productFilterSchema.parse({ stock__gte: '1.5' })).toThrow('stock__gte must be an integer');
  });
});

describe('customer filters', () => {
  it('compiles every customer predicate in declaration order', () => {
    const filters = customerFilterSchema.parse({
      name: 'ann',
      email: 'example.com',
      created_at__gte: '2026-01-01',
      created_at__lte: '2026-01-31',
      phone_pattern: '+1',
    });

    expect(compileFilters(customerFilterSet, filters)).toEqual({
      clauses: [
        'c.name ILIKE $1',
        'c.email ILIKE $2',
        'c.created_at::date >= $3::date',
        'c.created_at::date <= $4::date',
        'c.phone LIKE $5',
      ],
      params: ['%ann%', '%example.com%', '2026-01-01', '2026-01-31', '+1%'],
    });
  });

  it('continues placeholder numbering after existing parameters', () => {
    const filters = customerFilterSchema.parse({ name: '100%' });

    expect(compileFilters(customerFilterSet, filters, ['x'])).toEqual({
      clauses: ['c.name ILIKE $2'],
      params: ['x', '%100\\%%'],
    });
  });
});

describe('order filters', () => {
  it('reaches related products through EXISTS subqueries', () => {
    const filters = orderFilterSchema.parse({ product_name: 'mouse', product_id: '7' });

    expect(compileFilters(orderFilterSet, filters)).toEqual({
      clauses: [
        'EXISTS (SELECT 1 FROM order_products op JOIN products p ON p.id = op.product_id WHERE op.order_id = o.id AND p.name ILIKE $1)',
        'EXISTS (SELECT 1 FROM order_products op WHERE op.order_id = o.id AND op.product_id = $2)',
      ],
      params: ['%mouse%', 7],
    });
  });

  it('compiles total and date bounds and the customer name', () => {
    const filters = orderFilterSchema.parse({
      total_amount__gte: '100.5',
      order_date__lte: '2026-02-01',
      customer_name: 'Alice',
    });

    expect(compileFilters(orderFilterSet, filters)).toEqual({
      clauses: ['o.total_amount >= $1', 'o.order_date::date <= $2::date', 'c.name ILIKE $3'],
      params: [100.5, '2026-02-01', '%Alice%'],
    });
  });

  it.each(['2026-02-30', '2026-13-45', '2026-2-1'])('rejects the date bound %p', value => {
    expect(() => orderFilterSchema.parse({ order_date__gte: value }))
      .toThrow('order_date__gte must be a date (YYYY-MM-DD)');
  });

  it('accepts a leap day', () => {
    expect(orderFilterSchema.parse({ order_date__lte: '2028-02-29' }).order_date__lte).toBe('2028-02-29');
  });
});
