import type {
  configurationSchema,
  journalSchema,
  retrySchema,
  tradingSchema,
  trailingSchema,
} from '@services/configuration/configuration.schema';
import type { binanceFuturesSchema } from '@services/exchange/binance/binanceFutures.schema';
import type { dummyFuturesSchema } from '@services/exchange/dummy/dummyFuturesGateway.schema';
import type { z } from 'zod';

export type Configuration = z.infer<typeof configurationSchema>;
export type ExchangeConfig = Configuration['exchange'];
export type BinanceFuturesConfig = z.infer<typeof binanceFuturesSchema>;
export type DummyFuturesConfig = z.infer<typeof dummyFuturesSchema>;
export type TradingConfig = z.infer<typeof tradingSchema>;
export type TrailingConfig = z.infer<typeof trailingSchema>;
export type RetryConfig = z.infer<typeof retrySchema>;
export type JournalConfig = z.infer<typeof journalSchema>;
