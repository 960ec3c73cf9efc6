import { exchangeSchema } from '@services/exchange/exchange.schema';
import z from 'zod';

export const dummyFuturesSchema = exchangeSchema.extend({
  name: z.literal('dummy-futures'),
  markPrices: z.record(z.string(), z.number().positive()).default({}),
  sandbox: z.literal(true).default(true),
});
