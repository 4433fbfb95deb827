import { z } from 'zod';
import { itemStateSchema } from './label.validator';

/**
 * Item validation schemas
 */

// List items schema
export const listItemsSchema = z.object({
  query: z.object({
    state: itemStateSchema.optional(),
    limit: z.coerce
      .number()
      .int('Limit must be an integer')
      .positive('Limit must be positive')
      .optional(),
  }),
});

// Get item by ID schema
export const getItemSchema = z.object({
  params: z.object({
    id: z.coerce.number().int('Invalid item ID format').positive('Invalid item ID format'),
  }),
});
