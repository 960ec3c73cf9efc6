import { PROTECTION_STATE_CHANGED_EVENT } from '@constants/event.const';
import type { OrderSide } from '@models/order.types';
import { getDirection, getOppositeSide } from '@services/exchange/exchange.utils';
import type { ExecutionGateway } from '@services/exchange/exchange.types';
import { debug, error, info, warning } from '@services/logger';
import { roundToStep } from '@utils/math/round.utils';
import { waitOrAbort } from '@utils/process/process.utils';
import { toErrorMessage } from '@utils/string/string.utils';
import { EventEmitter } from 'node:events';
import type {
  ProtectionSeed,
  ProtectionSettings,
  ProtectionState,
  ProtectionStateChange,
  TrailingContext,
} from './protectiveOrderMachine.types';

const FINAL_STATES: ProtectionState[] = ['TERMINATED_OK', 'TERMINATED_ERROR', 'STOPPED'];

export const isFinalState = (state: ProtectionState) => FINAL_STATES.includes(state);

export const createTrailingContext = (
  { symbol, side, quantity, entryPrice, atr, stopLossOrderId }: ProtectionSeed,
  { breakEvenActivationMultiplier, activationMultiplier, precision }: ProtectionSettings,
): TrailingContext => {
  const isLong = getDirection(side) === 'LONG';
  const direction = isLong ? 1 : -1;
  return {
    symbol,
    side,
    quantity,
    entryPrice,
    atr,
    breakEvenActivationPrice: entryPrice + direction * atr * breakEvenActivationMultiplier,
    trailingActivationPrice: roundToStep(
      entryPrice + direction * atr * activationMultiplier,
      precision.priceStep,
      isLong ? 'up' : 'down',
    ),
    currentStop: { symbol, orderId: stopLossOrderId, kind: 'FIXED_SL' },
    breakEvenReached: false,
  };
};

const hasReached = (side: OrderSide, price: number, threshold: number) =>
  getDirection(side) === 'LONG' ? price >= threshold : price <= threshold;

/**
 * Watches the mark price of one open trade and upgrades its protection:
 * fixed stop-loss, then a stop at the entry price, then an exchange-managed trailing stop.
 * Emits {@link PROTECTION_STATE_CHANGED_EVENT} on every transition.
 */
export class ProtectiveOrderMachine extends EventEmitter {
  private state: ProtectionState = 'ARMED';
  private readonly context: TrailingContext;
  private readonly abortController = new AbortController();
  private monitoring?: Promise<ProtectionState>;

  constructor(
    private readonly gateway: ExecutionGateway,
    seed: ProtectionSeed,
    private readonly settings: ProtectionSettings,
  ) {
    super();
    this.context = createTrailingContext(seed, settings);
  }

  /** Starts polling on the first call; every call returns the same completion promise. */
  public run(): Promise<ProtectionState> {
    this.monitoring ??= this.monitor();
    return this.monitoring;
  }

  public stop() {
    this.abortController.abort();
  }

  public getState() {
    return this.state;
  }

  public getContext(): Readonly<TrailingContext> {
    return { ...this.context, currentStop: { ...this.context.currentStop } };
  }

  private async monitor() {
    const { symbol, breakEvenActivationPrice, trailingActivationPrice } = this.context;
    const { signal } = this.abortController;
    info(
      'protection',
      `Watching ${symbol}: break-even at ${breakEvenActivationPrice}, trailing from ${trailingActivationPrice}`,
    );

    while (!isFinalState(this.state)) {
      if (signal.aborted) break;
      const markPrice = await this.readMarkPrice();
      if (signal.aborted) break;
      if (markPrice !== undefined) await this.evaluate(markPrice);
      if (isFinalState(this.state)) break;
      if (!(await waitOrAbort(this.settings.pollInterval, signal))) break;
    }

    if (!isFinalState(this.state)) {
      this.transition('STOPPED');
      info('protection', `Stopped watching ${symbol}`);
    }
    return this.state;
  }

  private async readMarkPrice() {
    try {
      return await this.gateway.getMarkPrice(this.context.symbol);
    } catch (err) {
      warning('protection', `[${this.context.symbol}] Error fetching mark price: ${toErrorMessage(err)}`);
      return undefined;
    }
  }

  private async evaluate(markPrice: number) {
    const { side, breakEvenActivationPrice, trailingActivationPrice } = this.context;
    if (hasReached(side, markPrice, trailingActivationPrice)) {
      await this.switchToTrailingStop(markPrice);
    } else if (this.state === 'ARMED' && hasReached(side, markPrice, breakEvenActivationPrice)) {
      await this.moveStopToBreakEven(markPrice);
    }
  }

  private async moveStopToBreakEven(markPrice: number) {
    const { symbol, side, entryPrice } = this.context;
    debug('protection', `[${symbol}] Mark price ${markPrice} reached break-even activation`);
    try {
      await this.cancelCurrentStop();
      const order = await this.gateway.createOrder(symbol, getOppositeSide(side), 'STOP_MARKET', {
        stopPrice: entryPrice,
        reduceOnly: true,
        closePosition: true,
        timeInForce: 'GTC',
      });
      this.context.currentStop = { symbol, orderId: order.orderId, kind: 'BREAK_EVEN_SL' };
      this.context.breakEvenReached = true;
      info('protection', `[${symbol}] Moved stop-loss to break-even at ${entryPrice}`);
      this.transition('BREAK_EVEN');
    } catch (err) {
      this.fail('break-even stop', err);
    }
  }

  private async switchToTrailingStop(markPrice: number) {
    const { symbol, side, quantity, trailingActivationPrice } = this.context;
    debug('protection', `[${symbol}] Mark price ${markPrice} reached trailing activation`);
    try {
      await this.cancelCurrentStop();
      const order = await this.gateway.createOrder(symbol, getOppositeSide(side), 'TRAILING_STOP_MARKET', {
        activationPrice: trailingActivationPrice,
        callbackRate: this.settings.callbackRate,
        quantity,
        reduceOnly: true,
        closePosition: true,
        timeInForce: 'GTC',
      });
      this.context.currentStop = { symbol, orderId: order.orderId, kind: 'TRAILING_SL' };
      info('protection', `[${symbol}] Placed trailing stop from ${trailingActivationPrice} (${this.settings.callbackRate}%)`);
      this.transition('TERMINATED_OK');
    } catch (err) {
      this.fail('trailing stop', err);
    }
  }

  private async cancelCurrentStop() {
    const { symbol, currentStop } = this.context;
    await this.gateway.cancelOrder(symbol, currentStop.orderId);
    debug('protection', `[${symbol}] Cancelled ${currentStop.kind} order ${currentStop.orderId}`);
  }

  private fail(step: string, err: unknown) {
    error(
      'protection',
      `[${this.context.symbol}] Failed to set ${step}, position may be unprotected: ${toErrorMessage(err)}`,
    );
    this.transition('TERMINATED_ERROR');
  }

  private transition(to: ProtectionState) {
    const change: ProtectionStateChange = {
      symbol: this.context.symbol,
      from: this.state,
      to,
      stopOrderId: this.context.currentStop.orderId,
    };
    this.state = to;
    this.emit(PROTECTION_STATE_CHANGED_EVENT, change);
  }
}
