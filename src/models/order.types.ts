export type OrderSide = 'BUY' | 'SELL';

export type TradeDirection = 'LONG' | 'SHORT';

export type FuturesOrderType = 'MARKET' | 'LIMIT' | 'STOP_MARKET' | 'TAKE_PROFIT_MARKET' | 'TRAILING_STOP_MARKET';

export type OrderStatus = 'NEW' | 'PARTIALLY_FILLED' | 'FILLED' | 'CANCELED' | 'REJECTED' | 'EXPIRED';

export type TimeInForce = 'GTC' | 'IOC' | 'FOK';

export type OrderOptions = {
  quantity?: number;
  price?: number;
  stopPrice?: number;
  activationPrice?: number;
  /** Trailing distance in percent (0.5 means 0.5%) */
  callbackRate?: number;
  reduceOnly?: boolean;
  closePosition?: boolean;
  timeInForce?: TimeInForce;
};

export type ExchangeOrder = {
  orderId: string;
  symbol: string;
  side: OrderSide;
  /** Raw exchange value, may be outside {@link FuturesOrderType} */
  type: string;
  status: OrderStatus;
  quantity?: number;
  price?: number;
  stopPrice?: number;
};

export type OrderUpdate = {
  symbol: string;
  orderId: string;
  /** Raw exchange values are passed through, unknown types and statuses included */
  orderType: string;
  status: string;
};

export type Position = {
  symbol: string;
  /** Signed: positive for long, negative for short, 0 when flat */
  quantity: number;
};
