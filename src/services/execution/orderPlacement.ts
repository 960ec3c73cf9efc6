import { FILLED_ORDER_STATUS } from '@constants/order.const';
import type { OrderSide } from '@models/order.types';
import type { ProtectiveOrderRef, ProtectiveOrderSet, TradeIntent, TradeLevels } from '@models/trade.types';
import { getOppositeSide } from '@services/exchange/exchange.utils';
import { debug, error, info, warning } from '@services/logger';
import { KeyedMutex } from '@utils/async/keyedMutex';
import { wait } from '@utils/process/process.utils';
import { toErrorMessage } from '@utils/string/string.utils';
import type { OrderPlacementDependencies, PlacementRejection, PlacementResult } from './orderPlacement.types';
import { computeTradeLevels, getSymbolLeverage, getSymbolPrecision } from './orderPlacement.utils';

type PlacementProgress = {
  entryFilled: boolean;
  takeProfitOrderId?: string;
};

/**
 * Turns a trade intent into a filled entry protected by a take-profit and a stop-loss.
 * Never throws: a failure is logged and reported as a rejection reason, exchange failures are journaled too.
 */
export class OrderPlacementPipeline {
  private readonly symbolLocks = new KeyedMutex<string>();

  constructor(private readonly deps: OrderPlacementDependencies) {}

  public async placeTrade(symbol: string, side: OrderSide, referencePrice: number, atr: number): Promise<boolean> {
    const result = await this.openTrade({ symbol, side, signalPrice: referencePrice, atr });
    return result.placed;
  }

  public async openTrade(intent: TradeIntent): Promise<PlacementResult> {
    const { symbol, side } = intent;
    const { trading } = this.deps;

    const leverage = getSymbolLeverage(trading, symbol);
    if (!leverage) return this.reject('UNKNOWN_LEVERAGE', `No leverage configured for ${symbol}`);

    const computation = computeTradeLevels(intent, leverage, trading, getSymbolPrecision(trading, symbol));
    if (!computation.valid)
      return this.reject(
        computation.reason,
        `Cannot size ${side} trade on ${symbol} (price: ${intent.signalPrice}, atr: ${intent.atr})`,
      );

    const { levels } = computation;
    info(
      'placement',
      `Placing ${side} trade on ${symbol}: qty=${levels.quantity} entry=${levels.entryPrice} SL=${levels.stopLoss} TP=${levels.takeProfit}`,
    );

    return this.symbolLocks.runExclusive(symbol, () => this.submit(intent, leverage, levels));
  }

  private async submit(intent: TradeIntent, leverage: number, levels: TradeLevels): Promise<PlacementResult> {
    const { symbol, side, atr } = intent;
    const { gateway, executor, takeProfits, protection, trailing } = this.deps;
    const progress: PlacementProgress = { entryFilled: false };

    try {
      const positions = await gateway.getPosition(symbol);
      const openPosition = positions.find(position => position.quantity !== 0);
      if (openPosition)
        return this.reject('POSITION_EXISTS', `Existing position ${openPosition.quantity} on ${symbol}`);

      await executor.execute(() => gateway.setLeverage(symbol, leverage), `set leverage on ${symbol}`);
      const entryOrderId = await this.submitEntry(symbol, side, levels);

      if (!(await this.waitForFill(symbol, entryOrderId)))
        return this.reject('ENTRY_NOT_FILLED', `Entry order ${entryOrderId} on ${symbol} not filled, left live`);
      progress.entryFilled = true;

      const takeProfitOrder = await this.submitTakeProfit(symbol, side, levels);
      progress.takeProfitOrderId = takeProfitOrder.orderId;
      takeProfits.register(symbol, takeProfitOrder.orderId);

      const stopLossOrder = await this.submitStopLoss(symbol, side, levels);

      if (trailing.enabled && protection)
        protection.start({
          symbol,
          side,
          quantity: levels.quantity,
          entryPrice: levels.entryPrice,
          atr,
          stopLossOrderId: stopLossOrder.orderId,
        });

      this.record(intent, levels, FILLED_ORDER_STATUS);
      const orders: ProtectiveOrderSet = { ...levels, symbol, side, entryOrderId, takeProfitOrder, stopLossOrder };
      return { placed: true, orders };
    } catch (err) {
      const message = toErrorMessage(err);
      error('placement', `Trade failed for ${symbol}: ${message}`);
      this.record(intent, levels, `ERROR: ${message}`);
      if (progress.entryFilled) await this.handlePartialFailure(symbol, side, levels, progress);
      return { placed: false, reason: 'EXCHANGE_ERROR' };
    }
  }

  private async submitEntry(symbol: string, side: OrderSide, { quantity, entryPrice }: TradeLevels) {
    const { gateway, executor, trading } = this.deps;
    const order = await executor.execute(
      () =>
        trading.entryOrderType === 'MARKET'
          ? gateway.createOrder(symbol, side, 'MARKET', { quantity })
          : gateway.createOrder(symbol, side, 'LIMIT', { quantity, price: entryPrice, timeInForce: 'GTC' }),
      `entry order on ${symbol}`,
    );
    debug('placement', `Entry order ${order.orderId} on ${symbol} submitted (${order.status})`);
    return order.orderId;
  }

  private async waitForFill(symbol: string, orderId: string) {
    const { gateway, trading } = this.deps;
    const { attempts, interval } = trading.fillConfirmation;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const order = await gateway.getOrder(symbol, orderId);
      if (order.status === FILLED_ORDER_STATUS) return true;
      if (attempt < attempts) await wait(interval);
    }
    return false;
  }

  private async submitTakeProfit(
    symbol: string,
    side: OrderSide,
    { quantity, takeProfit }: TradeLevels,
  ): Promise<ProtectiveOrderRef> {
    const { gateway, executor, trading } = this.deps;
    const exitSide = getOppositeSide(side);
    const order = await executor.execute(
      () =>
        trading.takeProfitOrderType === 'MARKET'
          ? gateway.createOrder(symbol, exitSide, 'TAKE_PROFIT_MARKET', {
              stopPrice: takeProfit,
              reduceOnly: true,
              closePosition: true,
            })
          : gateway.createOrder(symbol, exitSide, 'LIMIT', {
              price: takeProfit,
              quantity,
              reduceOnly: true,
              timeInForce: 'GTC',
            }),
      `take-profit order on ${symbol}`,
    );
    return { symbol, orderId: order.orderId, kind: 'TAKE_PROFIT' };
  }

  private async submitStopLoss(symbol: string, side: OrderSide, { stopLoss }: TradeLevels): Promise<ProtectiveOrderRef> {
    const { gateway, executor } = this.deps;
    const order = await executor.execute(
      () =>
        gateway.createOrder(symbol, getOppositeSide(side), 'STOP_MARKET', {
          stopPrice: stopLoss,
          reduceOnly: true,
          closePosition: true,
          timeInForce: 'GTC',
        }),
      `stop-loss order on ${symbol}`,
    );
    return { symbol, orderId: order.orderId, kind: 'FIXED_SL' };
  }

  private async handlePartialFailure(
    symbol: string,
    side: OrderSide,
    { quantity }: TradeLevels,
    { takeProfitOrderId }: PlacementProgress,
  ) {
    const { gateway, executor, takeProfits, trading } = this.deps;
    if (trading.partialFailurePolicy === 'leave') {
      warning('placement', `Position on ${symbol} may be left without full protection`);
      return;
    }

    try {
      if (takeProfitOrderId) {
        takeProfits.release(symbol, takeProfitOrderId);
        await executor.execute(() => gateway.cancelOrder(symbol, takeProfitOrderId), `take-profit cancel on ${symbol}`);
      }
      await executor.execute(
        () => gateway.createOrder(symbol, getOppositeSide(side), 'MARKET', { quantity, reduceOnly: true }),
        `position close on ${symbol}`,
      );
      warning('placement', `Closed position on ${symbol} after a protective order failed`);
    } catch (err) {
      error('placement', `Failed to close unprotected position on ${symbol}: ${toErrorMessage(err)}`);
    }
  }

  private record({ symbol, side }: TradeIntent, { quantity, entryPrice, takeProfit, stopLoss }: TradeLevels, status: string) {
    this.deps.journal
      .recordTrade({ symbol, side, quantity, entryPrice, takeProfit, stopLoss, status, timestamp: Date.now() })
      .catch((err: unknown) => error('journal', `Failed to record trade on ${symbol}: ${toErrorMessage(err)}`));
  }

  private reject(reason: PlacementRejection, message: string): PlacementResult {
    warning('placement', `${reason}: ${message}`);
    return { placed: false, reason };
  }
}
