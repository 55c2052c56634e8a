import { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Phone numbers: optional leading "+", a digit, then at least seven more digits,
 * hyphens or spaces
 */
export const PHONE_PATTERN = /^\+?\d[\d\-\s]{7,}$/;

export const MAX_NAME_LENGTH = 100;
export const MAX_EMAIL_LENGTH = 254;
export const MAX_PHONE_LENGTH = 20;

export const emailSchema = z.string().email().max(MAX_EMAIL_LENGTH);

export const isValidEmail = (value: string): boolean => emailSchema.safeParse(value).success;

export const isValidPhone = (value: string): boolean =>
  value.length <= MAX_PHONE_LENGTH && PHONE_PATTERN.test(value);

/** A request body may send "" or null for an optional field it leaves out */
export const emptyToUndefined = (value: unknown): unknown =>
  value === '' || value === null ? undefined : value;

/** Query strings send "" for a cleared field; treat it as absent */
export const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parse input against a schema, raising a ValidationError carrying the first
 * issue's message and the full issue list as details
 */
export const parseInput = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [first] = result.error.issues;
    throw new ValidationError(first ? first.message : 'Invalid input', result.error.issues);
  }
  return result.data;
};

const MAX_SERIAL_ID = 2147483647;

/**
 * Read a row id from a path parameter or request field. Anything that is not a
 * positive integer within the SERIAL range yields null.
 */
export const parseId = (value: unknown): number | null => {
  let id: number;
  if (typeof value === 'number') {
    id = value;
  } else if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    id = Number(value);
  } else {
    return null;
  }
  return Number.isInteger(id) && id > 0 && id <= MAX_SERIAL_ID ? id : null;
};
