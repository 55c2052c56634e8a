import { z } from 'zod';
import { FilterSet, dateFilter, integerFilter, numberFilter, textFilter } from '../../utils/filters';

export const orderFilterSchema = z.object({
  total_amount__gte: numberFilter('total_amount__gte'),
  total_amount__lte: numberFilter('total_amount__lte'),
  order_date__gte: dateFilter('order_date__gte'),
  order_date__lte: dateFilter('order_date__lte'),
  customer_name: textFilter(),
  product_name: textFilter(),
  product_id: integerFilter('product_id'),
});

export type OrderFilters = z.infer<typeof orderFilterSchema>;

const throughOrderProducts = (condition: string) =>
  `EXISTS (SELECT 1 FROM order_products op WHERE op.order_id = o.id AND ${condition})`;

const throughProducts = (condition: string) =>
  `EXISTS (SELECT 1 FROM order_products op JOIN products p ON p.id = op.product_id WHERE op.order_id = o.id AND ${condition})`;

// Expressions assume orders aliased as o joined with customers aliased as c
export const orderFilterSet: FilterSet<keyof OrderFilters> = [
  { param: 'total_amount__gte', expression: 'o.total_amount', lookup: 'gte' },
  { param: 'total_amount__lte', expression: 'o.total_amount', lookup: 'lte' },
  { param: 'order_date__gte', expression: 'o.order_date', lookup: 'date_gte' },
  { param: 'order_date__lte', expression: 'o.order_date', lookup: 'date_lte' },
  { param: 'customer_name', expression: 'c.name', lookup: 'icontains' },
  { param: 'product_name', expression: 'p.name', lookup: 'icontains', through: throughProducts },
  { param: 'product_id', expression: 'op.product_id', lookup: 'exact', through: throughOrderProducts },
];
