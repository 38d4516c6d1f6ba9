/**
 * Cursor fields shared by the paginated list endpoints.
 */

import { z } from 'zod';

export const PageSchema = z.object({
  startKey: z.string().nullable().optional(),
  nextKey: z.string().nullable().optional(),
  limit: z.number().optional(),
});

export type Page = z.infer<typeof PageSchema>;
