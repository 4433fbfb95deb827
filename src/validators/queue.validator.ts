import { z } from 'zod';
import { labelSelectionSchema } from './label.validator';

/**
 * Queue validation schemas
 */

const itemIdField = z
  .number({
    required_error: 'Item ID is required',
    invalid_type_error: 'Item ID must be a number',
  })
  .int('Item ID must be an integer')
  .positive('Item ID must be positive');

const tokenField = z
  .string({
    required_error: 'Token is required',
    invalid_type_error: 'Token must be a string',
  })
  .min(1, 'Token is required')
  .max(255, 'Token must be at most 255 characters');

// Submit labels request schema
export const submitSchema = z.object({
  body: z.object({
    item_id: itemIdField,
    token: tokenField,
    labels: labelSelectionSchema,
  }),
});

// Skip request schema
export const skipSchema = z.object({
  body: z.object({
    item_id: itemIdField,
    token: tokenField,
  }),
});

// Release request schema
export const releaseSchema = skipSchema;
