import { z } from 'zod';

// numeric(15, 2): up to 13 integer digits.
const plainDecimal = /^[+-]?\d{1,13}(\.\d+)?$/;

const AmountSchema = z
  .union([z.number(), z.string(), z.null()])
  .transform((value, ctx) => {
    if (value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'amount is required' });
      return z.NEVER;
    }

    const text = typeof value === 'number' ? String(value) : value.trim();

    if (!plainDecimal.test(text)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `amount "${text}" is not a plain decimal number`,
      });
      return z.NEVER;
    }

    return text;
  });

/** Column constraints of the transactions table, checked before a row is staged. */
export const StagedTransactionSchema = z.object({
  amount: AmountSchema,
  merchant: z.string().max(255, 'merchant exceeds 255 characters').nullable(),
  category: z.string().max(100, 'category exceeds 100 characters').nullable(),
  externalId: z.string().max(255, 'external id exceeds 255 characters').nullable(),
  transactionHash: z.string().length(64),
});

export type StagedTransactionDTO = z.infer<typeof StagedTransactionSchema>;
