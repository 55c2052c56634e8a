import { z } from 'zod';
import { roundMoney } from '../../utils/money';
import { MAX_NAME_LENGTH } from '../../utils/validation';

// NUMERIC(10, 2)
const MAX_PRICE = 99999999.99;

// Validation schemas for the Products module
export const createProductSchema = z.object({
  name: z
    .string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
    .trim()
    .min(1, 'Name is required')
    .max(MAX_NAME_LENGTH, `Name must be at most ${MAX_NAME_LENGTH} characters`),
  price: z
    .number({ required_error: 'Price is required', invalid_type_error: 'Price must be a number' })
    .positive('Price must be positive')
    .max(MAX_PRICE, `Price must be at most ${MAX_PRICE}`)
    .transform(roundMoney)
    .refine(price => price >= 0.01, 'Price must be positive'),
  stock: z
    .number({ invalid_type_error: 'Stock must be a number' })
    .int('Stock must be an integer')
    .nonnegative('Stock cannot be negative')
    .nullish()
    .transform(stock => stock ?? 0),
});
