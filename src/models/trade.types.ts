import type { OrderSide } from './order.types';

export type TradeIntent = {
  symbol: string;
  /** Entry order side, BUY opens a long position and SELL a short one */
  side: OrderSide;
  signalPrice: number;
  atr: number;
};

export type SymbolPrecision = {
  quantityStep: number;
  priceStep: number;
};

export type ProtectiveOrderKind = 'FIXED_SL' | 'BREAK_EVEN_SL' | 'TRAILING_SL' | 'TAKE_PROFIT';

export type ProtectiveOrderRef = {
  symbol: string;
  orderId: string;
  kind: ProtectiveOrderKind;
};

export type TradeLevels = {
  quantity: number;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
};

export type ProtectiveOrderSet = TradeLevels & {
  symbol: string;
  side: OrderSide;
  entryOrderId: string;
  takeProfitOrder: ProtectiveOrderRef;
  stopLossOrder: ProtectiveOrderRef;
};

export type TradeRecord = {
  symbol: string;
  side: OrderSide;
  quantity: number;
  entryPrice: number;
  takeProfit: number;
  stopLoss: number;
  status: string;
  timestamp: EpochTimeStamp;
};
