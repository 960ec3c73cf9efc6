import type { ExchangeOrder, FuturesOrderType, OrderOptions, OrderSide, OrderStatus, OrderUpdate } from '@models/order.types';
import type { NewFuturesOrderParams } from 'binance';
import { isNil } from 'lodash-es';
import { z } from 'zod';
import { parseNumber } from '../exchange.utils';

export type BinanceFuturesOrder = Partial<{
  orderId: number | string;
  clientOrderId: string;
  symbol: string;
  side: string;
  type: string;
  origType: string;
  status: string;
  origQty: string | number;
  executedQty: string | number;
  price: string | number;
  avgPrice: string | number;
  stopPrice: string | number;
}>;

/** Order types for which the exchange accepts `closePosition`, in which case quantity and reduceOnly must be left out */
const CLOSE_POSITION_ORDER_TYPES: FuturesOrderType[] = ['STOP_MARKET', 'TAKE_PROFIT_MARKET'];

const ORDER_STATUSES: OrderStatus[] = ['NEW', 'PARTIALLY_FILLED', 'FILLED', 'CANCELED', 'REJECTED', 'EXPIRED'];

const orderIdSchema = z.union([z.number(), z.string()]).transform(String);

const formattedOrderTradeUpdateSchema = z.object({
  eventType: z.literal('ORDER_TRADE_UPDATE'),
  order: z.object({
    symbol: z.string(),
    orderId: orderIdSchema,
    orderType: z.string(),
    originalOrderType: z.string().optional(),
    orderStatus: z.string(),
  }),
});

const rawOrderTradeUpdateSchema = z.object({
  e: z.literal('ORDER_TRADE_UPDATE'),
  o: z.object({
    s: z.string(),
    i: orderIdSchema,
    o: z.string(),
    ot: z.string().optional(),
    X: z.string(),
  }),
});

const mapOrderStatus = (status?: string): OrderStatus => {
  if (status === 'EXPIRED_IN_MATCH') return 'EXPIRED';
  return ORDER_STATUSES.find(known => known === status) ?? 'NEW';
};

const mapOrderSide = (side?: string): OrderSide => (side === 'SELL' ? 'SELL' : 'BUY');

export const buildOrderParams = (
  symbol: string,
  side: OrderSide,
  type: FuturesOrderType,
  { quantity, price, stopPrice, activationPrice, callbackRate, reduceOnly, closePosition, timeInForce }: OrderOptions = {},
): NewFuturesOrderParams => {
  const isClosingWholePosition = !!closePosition && CLOSE_POSITION_ORDER_TYPES.includes(type);

  return {
    symbol,
    side,
    type,
    ...(!isClosingWholePosition && !isNil(quantity) ? { quantity } : {}),
    ...(!isNil(price) ? { price } : {}),
    ...(!isNil(stopPrice) ? { stopPrice } : {}),
    ...(!isNil(activationPrice) ? { activationPrice } : {}),
    ...(!isNil(callbackRate) ? { callbackRate } : {}),
    ...(isClosingWholePosition ? { closePosition: 'true' as const } : {}),
    ...(!isClosingWholePosition && reduceOnly ? { reduceOnly: 'true' as const } : {}),
    ...(timeInForce ? { timeInForce } : {}),
  };
};

export const buildOrderIdentifier = (id: string) => {
  const orderId = Number(id);
  if (id !== '' && Number.isSafeInteger(orderId)) return { orderId };
  return { origClientOrderId: id };
};

export const mapFuturesOrder = (data: BinanceFuturesOrder): ExchangeOrder => ({
  orderId: String(data.orderId ?? data.clientOrderId ?? ''),
  symbol: data.symbol ?? '',
  side: mapOrderSide(data.side),
  type: data.origType ?? data.type ?? '',
  status: mapOrderStatus(data.status),
  quantity: parseNumber(data.origQty),
  price: parseNumber(data.avgPrice) || parseNumber(data.price),
  stopPrice: parseNumber(data.stopPrice),
});

/** Extracts an order update from a user data stream message, formatted or raw. Other events give `undefined`. */
export const mapUserDataToOrderUpdate = (message: unknown): OrderUpdate | undefined => {
  const formatted = formattedOrderTradeUpdateSchema.safeParse(message);
  if (formatted.success) {
    const { symbol, orderId, orderType, originalOrderType, orderStatus } = formatted.data.order;
    return { symbol, orderId, orderType: originalOrderType ?? orderType, status: orderStatus };
  }

  const raw = rawOrderTradeUpdateSchema.safeParse(message);
  if (raw.success) {
    const { s, i, o, ot, X } = raw.data.o;
    return { symbol: s, orderId: i, orderType: ot ?? o, status: X };
  }

  return undefined;
};
