import { z } from 'zod';
import { blankToUndefined } from './validation';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
// Keeps the OFFSET within what PostgreSQL accepts
export const MAX_PAGE = 1000000;

export const paginationSchema = z.object({
  page: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int('page must be an integer')
      .min(1, 'page must be at least 1')
      .max(MAX_PAGE, `page must be at most ${MAX_PAGE}`)
      .default(1)
  ),
  limit: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int('limit must be an integer')
      .min(1, 'limit must be at least 1')
      .max(MAX_PAGE_SIZE, `limit must be at most ${MAX_PAGE_SIZE}`)
      .default(DEFAULT_PAGE_SIZE)
  ),
});

export type PageRequest = z.infer<typeof paginationSchema>;

export interface Page<T> {
  items: T[];
  total: number;
}

export interface PageResult<T> extends Page<T> {
  page: number;
  limit: number;
}

export const offsetOf = (page: PageRequest): number => (page.page - 1) * page.limit;
