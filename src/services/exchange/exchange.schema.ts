import z from 'zod';

export const exchangeSchema = z.object({
  name: z.string(),
});
