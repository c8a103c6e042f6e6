import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import type { ShoppingListFlagRequest } from '@pillbox/shared';

// Postgres INTEGER and NUMERIC(10, 2) column limits.
export const MAX_INTEGER_COLUMN = 2_147_483_647;
export const MAX_PRICE = 99_999_999.99;

const positiveId = z.coerce.number().int().positive().max(MAX_INTEGER_COLUMN);

const count = z.number().int().nonnegative().max(MAX_INTEGER_COLUMN);

const calendarDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Expected YYYY-MM-DD' })
  .refine((value) => isValid(parseISO(value)), { message: 'Invalid date' });

const nullableString = z.union([z.string(), z.null()]);

export const medicationIdParamsSchema = z.object({
  id: positiveId
});

export const purchaseRecordSchema = z.object({
  price: z.number().nonnegative().max(MAX_PRICE),
  place: z.string().trim().min(1),
  purchasedAt: z.union([calendarDate, z.null()]).optional()
});

// Unknown keys, including startDate and daysRemaining, are stripped.
export const medicationCreateSchema = z.object({
  name: z.string().trim().min(1),
  dailyDose: count,
  boxSize: count,
  insuranceId: nullableString.optional(),
  onShoppingList: z.boolean().optional(),
  purchaseHistory: z.array(purchaseRecordSchema).optional()
});

export const medicationReplaceSchema = medicationCreateSchema;

export const medicationUpdateSchema = z.object({
  name: z.string().trim().min(1).optional(),
  dailyDose: count.optional(),
  boxSize: count.optional(),
  insuranceId: nullableString.optional(),
  onShoppingList: z.boolean().optional()
});

export const shoppingListFlagSchema: z.ZodType<ShoppingListFlagRequest> = z.object({
  onShoppingList: z.boolean()
});
