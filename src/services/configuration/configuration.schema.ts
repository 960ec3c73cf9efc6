import { binanceFuturesSchema } from '@services/exchange/binance/binanceFutures.schema';
import { dummyFuturesSchema } from '@services/exchange/dummy/dummyFuturesGateway.schema';
import { z } from 'zod';
import {
  DEFAULT_FILL_CONFIRMATION,
  DEFAULT_JOURNAL,
  DEFAULT_PRECISION,
  DEFAULT_RETRY,
  DEFAULT_TRAILING,
  DISCLAIMER_FIELD,
} from './configuration.const';

const leverageSchema = z.number().int().min(1).max(125);

export const symbolPrecisionSchema = z.object({
  quantityStep: z.number().positive(),
  priceStep: z.number().positive(),
});

export const tradingSchema = z.object({
  marginPerTrade: z.number().positive(),
  leverage: z.record(z.string(), leverageSchema),
  defaultLeverage: leverageSchema.optional(),
  minNotional: z.number().nonnegative().default(5),
  takeProfitMultiplier: z.number().positive().default(1.5),
  stopLossMultiplier: z.number().positive().default(1),
  priceBufferRatio: z.number().min(0).max(0.1).default(0.001),
  entryOrderType: z.enum(['MARKET', 'LIMIT']).default('MARKET'),
  takeProfitOrderType: z.enum(['MARKET', 'LIMIT']).default('MARKET'),
  precision: z.record(z.string(), symbolPrecisionSchema).default({}),
  defaultPrecision: symbolPrecisionSchema.default(DEFAULT_PRECISION),
  fillConfirmation: z
    .object({
      attempts: z.number().int().min(1).default(DEFAULT_FILL_CONFIRMATION.attempts),
      interval: z.number().int().nonnegative().default(DEFAULT_FILL_CONFIRMATION.interval), // in ms
    })
    .default(DEFAULT_FILL_CONFIRMATION),
  partialFailurePolicy: z.enum(['leave', 'close']).default('leave'),
});

export const trailingSchema = z
  .object({
    enabled: z.boolean().default(DEFAULT_TRAILING.enabled),
    breakEvenActivationMultiplier: z.number().positive().default(DEFAULT_TRAILING.breakEvenActivationMultiplier),
    activationMultiplier: z.number().positive().default(DEFAULT_TRAILING.activationMultiplier),
    callbackRate: z.number().min(0.1).max(10).default(DEFAULT_TRAILING.callbackRate), // in %
    pollInterval: z.number().int().positive().default(DEFAULT_TRAILING.pollInterval), // in ms
  })
  .default(DEFAULT_TRAILING);

export const retrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(DEFAULT_RETRY.maxAttempts),
    initialDelay: z.number().int().nonnegative().default(DEFAULT_RETRY.initialDelay), // in ms
    backoffFactor: z.number().min(1).default(DEFAULT_RETRY.backoffFactor),
  })
  .default(DEFAULT_RETRY);

export const journalSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('log') }),
    z.object({ type: z.literal('csv'), path: z.string().min(1) }),
  ])
  .default(DEFAULT_JOURNAL);

export const configurationSchema = z
  .object({
    exchange: z.discriminatedUnion('name', [binanceFuturesSchema, dummyFuturesSchema]),
    trading: tradingSchema,
    trailing: trailingSchema,
    retry: retrySchema,
    journal: journalSchema,
    [DISCLAIMER_FIELD]: z.boolean().nullable().default(null),
  })
  .superRefine((data, ctx) => {
    const isUsingRealExchange = !data.exchange.sandbox;
    const isDisclaimerIgnored = !data[DISCLAIMER_FIELD];
    if (isUsingRealExchange && isDisclaimerIgnored) {
      ctx.addIssue({
        code: 'custom',
        path: [DISCLAIMER_FIELD],
        message:
          'These settings place orders on a real futures account and may lose real money. Confirm by setting the disclaimer sentence to true.',
      });
    }
  });
