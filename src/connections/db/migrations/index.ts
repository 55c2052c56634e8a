import { MigrationInfo } from './types';

import * as migration001 from './20260105_000001_create_customers_table';
import * as migration002 from './20260105_000002_create_products_table';
import * as migration003 from './20260105_000003_create_orders_table';
import * as migration004 from './20260105_000004_create_order_products_table';

export const migrations: MigrationInfo[] = [
  { name: '20260105_000001_create_customers_table', migration: migration001.migration },
  { name: '20260105_000002_create_products_table', migration: migration002.migration },
  { name: '20260105_000003_create_orders_table', migration: migration003.migration },
  { name: '20260105_000004_create_order_products_table', migration: migration004.migration },
];
