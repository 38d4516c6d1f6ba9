/**
 * Type definitions for account balance.
 */

import { z } from 'zod';

export const BalanceSchema = z
  .object({
    balance: z.number(),
    point: z.number(),
  })
  .passthrough();

export type Balance = z.infer<typeof BalanceSchema>;
