import type { DummyFuturesConfig } from '@models/configuration.types';
import type { ExchangeOrder, FuturesOrderType, OrderOptions, OrderSide, Position } from '@models/order.types';
import { debug } from '@services/logger';
import { isNil } from 'lodash-es';
import { InvalidOrder, OrderNotFound, UnknownMarkPrice } from '../exchange.error';
import type { ExecutionGateway, OrderUpdateListener } from '../exchange.types';
import type { DummyFuturesOrder } from './dummyFuturesGateway.types';

/**
 * In-memory futures venue used for sandbox runs and tests.
 * Market orders fill at the current mark price; every other order rests until {@link fillOrder} is called.
 */
export class DummyFuturesGateway implements ExecutionGateway {
  private readonly markPrices: Map<string, number>;
  private readonly positions = new Map<string, number>();
  private readonly leverages = new Map<string, number>();
  private readonly orders = new Map<string, DummyFuturesOrder>();
  private readonly listeners = new Set<OrderUpdateListener>();
  private orderSequence = 0;

  constructor({ markPrices }: DummyFuturesConfig) {
    this.markPrices = new Map(Object.entries(markPrices));
  }

  public getName() {
    return 'dummy-futures';
  }

  public async getPosition(symbol: string): Promise<Position[]> {
    const quantity = this.positions.get(symbol);
    return isNil(quantity) ? [] : [{ symbol, quantity }];
  }

  public async setLeverage(symbol: string, leverage: number) {
    if (leverage <= 0) throw new InvalidOrder(`Invalid leverage ${leverage} for ${symbol}`);
    this.leverages.set(symbol, leverage);
  }

  public getLeverage(symbol: string) {
    return this.leverages.get(symbol);
  }

  public async createOrder(symbol: string, side: OrderSide, type: FuturesOrderType, options: OrderOptions = {}) {
    const { quantity, closePosition } = options;
    if (!closePosition && (isNil(quantity) || quantity <= 0))
      throw new InvalidOrder(`Order quantity must be positive (received: ${quantity})`);

    const order: DummyFuturesOrder = {
      orderId: `${++this.orderSequence}`,
      symbol,
      side,
      type,
      status: 'NEW',
      quantity,
      price: options.price,
      stopPrice: options.stopPrice ?? options.activationPrice,
      options,
    };
    this.orders.set(order.orderId, order);

    if (type === 'MARKET') {
      order.price = this.getMarkPriceOrThrow(symbol);
      this.settle(order);
    } else {
      this.emit(order);
    }

    debug('exchange', `Dummy ${type} ${side} order ${order.orderId} on ${symbol} is ${order.status}`);
    return this.cloneOrder(order);
  }

  public async getOrder(symbol: string, orderId: string) {
    return this.cloneOrder(this.findOrder(symbol, orderId));
  }

  public async cancelOrder(symbol: string, orderId: string) {
    const order = this.findOrder(symbol, orderId);
    if (order.status !== 'NEW' && order.status !== 'PARTIALLY_FILLED')
      throw new OrderNotFound(`Order ${orderId} on ${symbol} is already ${order.status}`);
    order.status = 'CANCELED';
    this.emit(order);
    return this.cloneOrder(order);
  }

  public async getMarkPrice(symbol: string) {
    return this.getMarkPriceOrThrow(symbol);
  }

  public setMarkPrice(symbol: string, price: number) {
    this.markPrices.set(symbol, price);
  }

  /** Fills a resting order at the current mark price, as if the market had reached it. */
  public fillOrder(symbol: string, orderId: string) {
    const order = this.findOrder(symbol, orderId);
    if (order.status !== 'NEW' && order.status !== 'PARTIALLY_FILLED')
      throw new InvalidOrder(`Order ${orderId} on ${symbol} cannot be filled, it is ${order.status}`);
    order.price = this.markPrices.get(symbol) ?? order.stopPrice ?? order.price;
    this.settle(order);
    return this.cloneOrder(order);
  }

  public subscribeOrderUpdates(listener: OrderUpdateListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private settle(order: DummyFuturesOrder) {
    const current = this.positions.get(order.symbol) ?? 0;
    const { closePosition, reduceOnly } = order.options;
    const signedQuantity = (order.side === 'BUY' ? 1 : -1) * (order.quantity ?? 0);

    if (closePosition) this.positions.set(order.symbol, 0);
    else if (reduceOnly) this.positions.set(order.symbol, reducePosition(current, signedQuantity));
    else this.positions.set(order.symbol, current + signedQuantity);

    order.status = 'FILLED';
    this.emit(order);
  }

  private emit({ symbol, orderId, type, status }: ExchangeOrder) {
    for (const listener of this.listeners) listener({ symbol, orderId, orderType: type, status });
  }

  private findOrder(symbol: string, orderId: string) {
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== symbol) throw new OrderNotFound(`Unknown order ${orderId} on ${symbol}`);
    return order;
  }

  private getMarkPriceOrThrow(symbol: string) {
    const price = this.markPrices.get(symbol);
    if (isNil(price)) throw new UnknownMarkPrice(symbol);
    return price;
  }

  private cloneOrder({ options: _options, ...order }: DummyFuturesOrder): ExchangeOrder {
    return { ...order };
  }
}

const reducePosition = (current: number, signedQuantity: number) => {
  if (Math.sign(current) === Math.sign(signedQuantity) || current === 0) return current;
  const next = current + signedQuantity;
  return Math.sign(next) === Math.sign(current) ? next : 0;
};
