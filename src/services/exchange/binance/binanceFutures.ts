import { TradewardError } from '@errors/tradeward.error';
import type { BinanceFuturesConfig } from '@models/configuration.types';
import type { FuturesOrderType, OrderOptions, OrderSide } from '@models/order.types';
import { debug, error, info } from '@services/logger';
import { USDMClient, WebsocketClient } from 'binance';
import { isNil } from 'lodash-es';
import { InvalidOrder, OrderNotFound, UnknownMarkPrice } from '../exchange.error';
import type { ExecutionGateway, OrderUpdateListener } from '../exchange.types';
import { parseNumber } from '../exchange.utils';
import {
  buildOrderIdentifier,
  buildOrderParams,
  mapFuturesOrder,
  mapUserDataToOrderUpdate,
} from './binanceFutures.utils';

const ORDER_NOT_FOUND_CODES = [-2011, -2013];
const INVALID_ORDER_CODES = [-1013, -1102, -1106, -1111, -1116, -2010, -2019, -2021, -2022, -4003, -4164];

export class BinanceFuturesGateway implements ExecutionGateway {
  private client: USDMClient;
  private ws: WebsocketClient;
  private listeners = new Set<OrderUpdateListener>();

  constructor({ apiKey, secret, sandbox }: BinanceFuturesConfig) {
    this.client = new USDMClient({
      api_key: apiKey,
      api_secret: secret,
      beautifyResponses: true,
      testnet: sandbox,
    });
    this.ws = new WebsocketClient(
      { beautify: true, testnet: sandbox, api_key: apiKey, api_secret: secret },
      {
        trace: (params: unknown) => debug('exchange', params),
        info: (params: unknown) => info('exchange', params),
        error: (params: unknown) => error('exchange', params),
      },
    );
  }

  public getName() {
    return 'binance-futures';
  }

  public async getPosition(symbol: string) {
    try {
      const positions = await this.client.getPositions({ symbol });
      return positions
        .filter(position => position.symbol === symbol)
        .map(position => ({ symbol, quantity: parseNumber(position.positionAmt) ?? 0 }));
    } catch (err) {
      throw this.toError(err);
    }
  }

  public async setLeverage(symbol: string, leverage: number) {
    try {
      await this.client.setLeverage({ symbol, leverage });
    } catch (err) {
      throw this.toError(err);
    }
  }

  public async createOrder(symbol: string, side: OrderSide, type: FuturesOrderType, options?: OrderOptions) {
    try {
      const order = await this.client.submitNewOrder(buildOrderParams(symbol, side, type, options));
      return mapFuturesOrder(order);
    } catch (err) {
      throw this.transformOrderError(err);
    }
  }

  public async getOrder(symbol: string, orderId: string) {
    try {
      const order = await this.client.getOrder({ symbol, ...buildOrderIdentifier(orderId) });
      return mapFuturesOrder(order);
    } catch (err) {
      throw this.transformOrderError(err);
    }
  }

  public async cancelOrder(symbol: string, orderId: string) {
    try {
      const order = await this.client.cancelOrder({ symbol, ...buildOrderIdentifier(orderId) });
      return mapFuturesOrder(order);
    } catch (err) {
      throw this.transformOrderError(err);
    }
  }

  public async getMarkPrice(symbol: string) {
    let markPrice: number | undefined;
    try {
      const result = await this.client.getMarkPrice({ symbol });
      const payload = Array.isArray(result) ? result.find(item => item.symbol === symbol) : result;
      markPrice = parseNumber(payload?.markPrice);
    } catch (err) {
      throw this.toError(err);
    }
    if (isNil(markPrice) || markPrice <= 0) throw new UnknownMarkPrice(symbol);
    return markPrice;
  }

  public subscribeOrderUpdates(listener: OrderUpdateListener) {
    this.listeners.add(listener);
    if (this.listeners.size === 1) this.openUserDataStream();

    return () => {
      if (!this.listeners.delete(listener) || this.listeners.size > 0) return;
      try {
        this.ws.closeAll();
      } finally {
        this.ws.off('formattedUserDataMessage', this.handleUserDataMessage);
      }
    };
  }

  private openUserDataStream() {
    this.ws.on('formattedUserDataMessage', this.handleUserDataMessage);
    Promise.resolve(this.ws.subscribeUsdFuturesUserDataStream()).catch((err: unknown) =>
      error('exchange', `Failed to open futures user data stream: ${this.toError(err).message}`),
    );
  }

  private handleUserDataMessage = (message: unknown) => {
    const update = mapUserDataToOrderUpdate(message);
    if (!update) return;
    debug('exchange', `Order ${update.orderId} on ${update.symbol}: ${update.orderType} ${update.status}`);
    for (const listener of this.listeners) listener(update);
  };

  private transformOrderError(err: unknown): Error {
    if (this.isBinanceError(err) && !isNil(err.code)) {
      if (ORDER_NOT_FOUND_CODES.includes(err.code)) return new OrderNotFound(err.message ?? 'Order not found');
      if (INVALID_ORDER_CODES.includes(err.code)) return new InvalidOrder(err.message ?? 'Invalid order');
    }
    return this.toError(err);
  }

  private toError(err: unknown): Error {
    if (err instanceof Error) return err;
    if (this.isBinanceError(err))
      return new TradewardError('exchange', err.message ?? `Binance error ${err.code ?? 'without code'}`);
    return new TradewardError('exchange', String(err));
  }

  private isBinanceError(err: unknown): err is { code?: number; message?: string } {
    return (
      typeof err === 'object' &&
      err !== null &&
      'code' in err &&
      typeof err.code === 'number' &&
      (!('message' in err) || typeof err.message === 'string')
    );
  }
}
