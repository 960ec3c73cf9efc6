import type { ExchangeConfig } from '@models/configuration.types';
import type { OrderSide, TradeDirection } from '@models/order.types';
import { isNil } from 'lodash-es';
import { BinanceFuturesGateway } from './binance/binanceFutures';
import { DummyFuturesGateway } from './dummy/dummyFuturesGateway';
import type { ExecutionGateway } from './exchange.types';

export const createGateway = (exchangeConfig: ExchangeConfig): ExecutionGateway => {
  switch (exchangeConfig.name) {
    case 'binance-futures':
      return new BinanceFuturesGateway(exchangeConfig);
    case 'dummy-futures':
      return new DummyFuturesGateway(exchangeConfig);
  }
};

export const getOppositeSide = (side: OrderSide): OrderSide => (side === 'BUY' ? 'SELL' : 'BUY');

export const getDirection = (side: OrderSide): TradeDirection => (side === 'BUY' ? 'LONG' : 'SHORT');

export const parseNumber = (value?: string | number | null) => {
  if (isNil(value) || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};
