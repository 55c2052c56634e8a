import type { CrmStore } from '../../connections/db/store';
import { Customer } from '../../connections/db/models/customer.model';
import {
  AppError,
  ConflictError,
  NotFoundError,
  PG_UNIQUE_VIOLATION,
  ValidationError,
  isDatabaseError,
} from '../../utils/errors';
import { logger } from '../../utils/logging';
import { PageResult, paginationSchema } from '../../utils/pagination';
import {
  MAX_NAME_LENGTH,
  isRecord,
  isValidEmail,
  isValidPhone,
  parseId,
  parseInput,
} from '../../utils/validation';
import { customerFilterSchema } from './customers.filters';
import { customerIdentitySchema, customerPhoneSchema } from './customers.validation';

export const CUSTOMER_CREATED_MESSAGE = 'Customer created successfully!';

export interface CreateCustomerResult {
  customer: Customer;
  message: string;
}

export interface BulkCreateCustomersResult {
  customers: Customer[];
  errors: string[];
}

/**
 * Create a single customer. Checks run in the same order as for a bulk
 * record: name and email format, email uniqueness, phone format.
 */
export const createCustomer = async (store: CrmStore, input: unknown): Promise<CreateCustomerResult> => {
  const { name, email } = parseInput(customerIdentitySchema, input);

  if (await store.customers.existsByEmail(email)) {
    throw new ConflictError('Email already exists', { email });
  }

  const { phone } = parseInput(customerPhoneSchema, input);
  const customer = await store.customers.create({ name, email, phone: phone ?? null });

  logger.info('Customer created', { customerId: customer.id });
  return { customer, message: CUSTOMER_CREATED_MESSAGE };
};

const readString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
};

// Records arrive either as objects or as JSON-encoded object strings
const toRecord = (raw: unknown): Record<string, unknown> => {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      const parsed: unknown = JSON.parse(raw);
      value = parsed;
    } catch {
      throw new ValidationError('Invalid record: expected an object');
    }
  }
  if (!isRecord(value)) {
    throw new ValidationError('Invalid record: expected an object');
  }
  return value;
};

const createBulkRecord = (store: CrmStore, raw: unknown): Promise<Customer> =>
  store.transaction(async tx => {
    const record = toRecord(raw);
    const name = readString(record, 'name')?.trim();
    const email = readString(record, 'email');
    const phone = readString(record, 'phone');

    if (!name || !email) {
      throw new ValidationError('Name and email are required');
    }
    if (name.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`Name must be at most ${MAX_NAME_LENGTH} characters: ${name}`);
    }
    if (!isValidEmail(email)) {
      throw new ValidationError(`Invalid email: ${email}`);
    }
    if (await tx.customers.existsByEmail(email)) {
      throw new ConflictError(`Duplicate email: ${email}`);
    }
    if (phone && !isValidPhone(phone)) {
      throw new ValidationError(`Invalid phone number: ${phone}`);
    }

    try {
      return await tx.customers.create({ name, email, phone: phone || null });
    } catch (error) {
      // lost a race with a concurrent insert of the same email
      if (isDatabaseError(error, PG_UNIQUE_VIOLATION)) {
        throw new ConflictError(`Duplicate email: ${email}`);
      }
      throw error;
    }
  });

/**
 * Create many customers in one transaction. A record that fails validation is
 * skipped and its message collected; the remaining records still commit.
 * Each record runs in its own savepoint so a failed insert does not poison the
 * batch. Errors other than per-record validation abort the whole batch.
 */
export const bulkCreateCustomers = async (store: CrmStore, records: unknown[]): Promise<BulkCreateCustomersResult> => {
  const result = await store.transaction(async tx => {
    const customers: Customer[] = [];
    const errors: string[] = [];

    for (const record of records) {
      try {
        customers.push(await createBulkRecord(tx, record));
      } catch (error) {
        if (!(error instanceof AppError)) {
          throw error;
        }
        errors.push(error.message);
      }
    }

    return { customers, errors };
  });

  logger.info('Bulk customer import finished', {
    received: records.length,
    created: result.customers.length,
    failed: result.errors.length,
  });
  return result;
};

export const getCustomer = async (store: CrmStore, id: unknown): Promise<Customer> => {
  const customerId = parseId(id);
  const customer = customerId === null ? null : await store.customers.findById(customerId);
  if (!customer) {
    throw new NotFoundError('Customer not found');
  }
  return customer;
};

export const listCustomers = async (store: CrmStore, query: unknown): Promise<PageResult<Customer>> => {
  const filters = parseInput(customerFilterSchema, query);
  const page = parseInput(paginationSchema, query);
  const { items, total } = await store.customers.list(filters, page);
  return { items, total, page: page.page, limit: page.limit };
};
