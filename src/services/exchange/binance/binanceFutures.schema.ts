import { exchangeSchema } from '@services/exchange/exchange.schema';
import z from 'zod';

export const binanceFuturesSchema = exchangeSchema.extend({
  name: z.literal('binance-futures'),
  apiKey: z.string().min(1),
  secret: z.string().min(1),
  sandbox: z.boolean().default(false),
});
