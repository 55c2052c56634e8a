import { z } from 'zod';
import { FilterSet, integerFilter, numberFilter, textFilter } from '../../utils/filters';

export const productFilterSchema = z.object({
  name: textFilter(),
  price__gte: numberFilter('price__gte'),
  price__lte: numberFilter('price__lte'),
  stock__gte: integerFilter('stock__gte'),
  stock__lte: integerFilter('stock__lte'),
});

export type ProductFilters = z.infer<typeof productFilterSchema>;

export const productFilterSet: FilterSet<keyof ProductFilters> = [
  { param: 'name', expression: 'p.name', lookup: 'icontains' },
  { param: 'price__gte', expression: 'p.price', lookup: 'gte' },
  { param: 'price__lte', expression: 'p.price', lookup: 'lte' },
  { param: 'stock__gte', expression: 'p.stock', lookup: 'gte' },
  { param: 'stock__lte', expression: 'p.stock', lookup: 'lte' },
];
