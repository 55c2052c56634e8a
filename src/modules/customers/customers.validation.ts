import { z } from 'zod';
import {
  MAX_EMAIL_LENGTH,
  MAX_NAME_LENGTH,
  MAX_PHONE_LENGTH,
  PHONE_PATTERN,
  emptyToUndefined,
} from '../../utils/validation';

// Validation schemas for the Customers module

// Checked before the email uniqueness lookup
export const customerIdentitySchema = z.object({
  name: z
    .string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
    .trim()
    .min(1, 'Name is required')
    .max(MAX_NAME_LENGTH, `Name must be at most ${MAX_NAME_LENGTH} characters`),
  email: z
    .string({ required_error: 'Email is required', invalid_type_error: 'Invalid email format' })
    .email('Invalid email format')
    .max(MAX_EMAIL_LENGTH, 'Invalid email format'),
});

// Checked once the email is known to be free
export const customerPhoneSchema = z.object({
  phone: z.preprocess(
    emptyToUndefined,
    z
      .string({ invalid_type_error: 'Invalid phone number format' })
      .max(MAX_PHONE_LENGTH, 'Invalid phone number format')
      .regex(PHONE_PATTERN, 'Invalid phone number format')
      .optional()
  ),
});

export const bulkCreateCustomersSchema = z.object({
  input: z.array(z.unknown(), {
    required_error: 'input is required',
    invalid_type_error: 'input must be a list of customer records',
  }),
});
