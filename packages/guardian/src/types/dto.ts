/**
 * Request DTOs with Zod validation schemas.
 *
 * Amount format is checked by the ledger; these schemas only shape the
 * request.
 */

import { z } from "zod";

/** A decimal string, or a JSON number converted to one. */
export const AmountSchema = z
  .union([z.string().trim().min(1), z.number().finite()])
  .transform((v) => String(v));

export const SpendCheckSchema = z.object({
  amount: AmountSchema,
});

export type SpendCheckDto = z.infer<typeof SpendCheckSchema>;

export const RecordSpendSchema = z.object({
  amount: AmountSchema,
  reference: z.string().trim().min(1).max(200).optional(),
  category: z.string().trim().min(1).max(64).optional(),
});

export type RecordSpendDto = z.infer<typeof RecordSpendSchema>;

export const TransferSchema = z.object({
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const SetModeSchema = z.object({
  mode: z.string().trim().min(1),
});

export type SetModeDto = z.infer<typeof SetModeSchema>;

export const ListTransactionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  direction: z.enum(["in", "out"]).optional(),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;
