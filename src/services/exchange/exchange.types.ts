import type {
  ExchangeOrder,
  FuturesOrderType,
  OrderOptions,
  OrderSide,
  OrderUpdate,
  Position,
} from '@models/order.types';

export type OrderUpdateListener = (update: OrderUpdate) => void;

/** Capabilities the order lifecycle needs from a futures exchange. */
export interface ExecutionGateway {
  getName(): string;
  getPosition(symbol: string): Promise<Position[]>;
  setLeverage(symbol: string, leverage: number): Promise<void>;
  createOrder(symbol: string, side: OrderSide, type: FuturesOrderType, options?: OrderOptions): Promise<ExchangeOrder>;
  getOrder(symbol: string, orderId: string): Promise<ExchangeOrder>;
  cancelOrder(symbol: string, orderId: string): Promise<ExchangeOrder>;
  getMarkPrice(symbol: string): Promise<number>;
  /** Pushes every order status change to `listener`; returns the unsubscribe function */
  subscribeOrderUpdates(listener: OrderUpdateListener): () => void;
}
