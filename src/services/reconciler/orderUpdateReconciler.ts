import { FILLED_ORDER_STATUS, TRAILING_STOP_ORDER_TYPE } from '@constants/order.const';
import type { OrderUpdate } from '@models/order.types';
import type { ExecutionGateway } from '@services/exchange/exchange.types';
import { debug, error, info } from '@services/logger';
import { toErrorMessage } from '@utils/string/string.utils';
import type { TakeProfitRegistry } from './takeProfitRegistry';

/**
 * Cancels the take-profit left behind once a trailing stop closed the position.
 * Updates are handled one at a time, in arrival order.
 */
export class OrderUpdateReconciler {
  private unsubscribe?: () => void;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly gateway: ExecutionGateway,
    private readonly takeProfits: TakeProfitRegistry,
  ) {}

  public start() {
    if (this.unsubscribe) return;
    this.unsubscribe = this.gateway.subscribeOrderUpdates(update => this.enqueue(update));
    info('reconciler', `Listening to order updates from ${this.gateway.getName()}`);
  }

  public stop() {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  public isRunning() {
    return !!this.unsubscribe;
  }

  /** Queues `update`; the returned promise settles once it has been handled */
  public handleOrderUpdate(update: OrderUpdate) {
    this.enqueue(update);
    return this.queue;
  }

  /** Settles once every queued update has been handled */
  public idle() {
    return this.queue;
  }

  private enqueue(update: OrderUpdate) {
    this.queue = this.queue.then(() => this.reconcile(update));
  }

  private async reconcile({ symbol, orderId, orderType, status }: OrderUpdate) {
    if (orderType !== TRAILING_STOP_ORDER_TYPE || status !== FILLED_ORDER_STATUS) return;

    const takeProfitOrderId = this.takeProfits.take(symbol);
    if (!takeProfitOrderId) {
      debug('reconciler', `Trailing stop ${orderId} filled on ${symbol}, no take-profit to cancel`);
      return;
    }

    try {
      await this.gateway.cancelOrder(symbol, takeProfitOrderId);
      info('reconciler', `Cancelled take-profit ${takeProfitOrderId} on ${symbol} after trailing stop ${orderId} filled`);
    } catch (err) {
      error('reconciler', `Failed to cancel take-profit ${takeProfitOrderId} on ${symbol}: ${toErrorMessage(err)}`);
    }
  }
}
