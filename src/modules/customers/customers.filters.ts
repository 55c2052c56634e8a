import { z } from 'zod';
import { FilterSet, dateFilter, textFilter } from '../../utils/filters';

export const customerFilterSchema = z.object({
  name: textFilter(),
  email: textFilter(),
  created_at__gte: dateFilter('created_at__gte'),
  created_at__lte: dateFilter('created_at__lte'),
  phone_pattern: textFilter(),
});

export type CustomerFilters = z.infer<typeof customerFilterSchema>;

export const customerFilterSet: FilterSet<keyof CustomerFilters> = [
  { param: 'name', expression: 'c.name', lookup: 'icontains' },
  { param: 'email', expression: 'c.email', lookup: 'icontains' },
  { param: 'created_at__gte', expression: 'c.created_at', lookup: 'date_gte' },
  { param: 'created_at__lte', expression: 'c.created_at', lookup: 'date_lte' },
  // e.g. phone_pattern=+1 selects North American numbers
  { param: 'phone_pattern', expression: 'c.phone', lookup: 'startswith' },
];
