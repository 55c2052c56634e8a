import { z } from 'zod';
import { blankToUndefined } from './validation';

export type FilterValue = string | number;

/**
 * icontains   case-insensitive substring
 * startswith  case-sensitive prefix
 * gte / lte   inclusive bounds
 * date_gte / date_lte  inclusive bounds on the calendar date of a timestamp
 * exact       equality
 */
export type Lookup = 'icontains' | 'startswith' | 'gte' | 'lte' | 'date_gte' | 'date_lte' | 'exact';

export interface FilterField<K extends string> {
  param: K;
  expression: string;
  lookup: Lookup;
  /** Wraps the compiled condition, e.g. in an EXISTS over a related table */
  through?: (condition: string) => string;
}

export type FilterSet<K extends string> = ReadonlyArray<FilterField<K>>;

export type FilterValues<K extends string> = { [P in K]?: FilterValue };

export interface CompiledFilters {
  clauses: string[];
  params: FilterValue[];
}

/** Escape LIKE wildcards so user input matches literally */
export const escapeLike = (value: string): string => value.replace(/[\\%_]/g, match => `\\${match}`);

const compileCondition = (field: FilterField<string>, placeholder: string): string => {
  switch (field.lookup) {
    case 'icontains':
      return `${field.expression} ILIKE ${placeholder}`;
    case 'startswith':
      return `${field.expression} LIKE ${placeholder}`;
    case 'gte':
      return `${field.expression} >= ${placeholder}`;
    case 'lte':
      return `${field.expression} <= ${placeholder}`;
    case 'date_gte':
      return `${field.expression}::date >= ${placeholder}::date`;
    case 'date_lte':
      return `${field.expression}::date <= ${placeholder}::date`;
    case 'exact':
      return `${field.expression} = ${placeholder}`;
  }
};

const bindValue = (lookup: Lookup, value: FilterValue): FilterValue => {
  if (lookup === 'icontains') return `%${escapeLike(String(value))}%`;
  if (lookup === 'startswith') return `${escapeLike(String(value))}%`;
  return value;
};

/**
 * Compile the supplied filter values into AND-able SQL conditions.
 * Absent values add no condition. Placeholders continue after `params`.
 */
export const compileFilters = <K extends string>(
  filterSet: FilterSet<K>,
  values: FilterValues<K>,
  params: FilterValue[] = []
): CompiledFilters => {
  const clauses: string[] = [];
  const bound = [...params];

  for (const field of filterSet) {
    const value = values[field.param];
    if (value === undefined) continue;

    bound.push(bindValue(field.lookup, value));
    const condition = compileCondition(field, `$${bound.length}`);
    clauses.push(field.through ? field.through(condition) : condition);
  }

  return { clauses, params: bound };
};

export const toWhereClause = (clauses: string[]): string =>
  clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';

// Query-string field builders. Each one accepts a missing or blank value.

export const textFilter = () => z.preprocess(blankToUndefined, z.string().optional());

export const numberFilter = (param: string) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number({ invalid_type_error: `${param} must be a number` }).optional()
  );

export const integerFilter = (param: string) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${param} must be a number` })
      .int(`${param} must be an integer`)
      .optional()
  );

export const dateFilter = (param: string) =>
  z.preprocess(
    blankToUndefined,
    z.string().date(`${param} must be a date (YYYY-MM-DD)`).optional()
  );
