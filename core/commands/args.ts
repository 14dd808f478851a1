import { z } from 'zod';

export const positionArgs = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative(),
});

export const selectionArgs = z.object({
  anchor: positionArgs,
  cursor: positionArgs,
});

export const typeArgs = z.object({
  text: z.string(),
});
