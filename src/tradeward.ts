import { FILLED_ORDER_STATUS } from '@constants/order.const';
import { PROTECTION_STATE_CHANGED_EVENT } from '@constants/event.const';
import type { OrderSide, OrderUpdate } from '@models/order.types';
import type { TradeIntent } from '@models/trade.types';
import { Configuration } from '@services/configuration/configuration';
import type { ExecutionGateway } from '@services/exchange/exchange.types';
import { createGateway } from '@services/exchange/exchange.utils';
import { OrderPlacementPipeline } from '@services/execution/orderPlacement';
import { getSymbolPrecision } from '@services/execution/orderPlacement.utils';
import { RetryingExecutor } from '@services/execution/retryingExecutor';
import { createTradeJournal } from '@services/journal/tradeJournal';
import type { TradeRecorder } from '@services/journal/tradeJournal.types';
import { debug, error, info } from '@services/logger';
import { ProtectionSupervisor } from '@services/protection/protectionSupervisor';
import type { ProtectionStateChange } from '@services/protection/protectiveOrderMachine.types';
import { OrderUpdateReconciler } from '@services/reconciler/orderUpdateReconciler';
import { TakeProfitRegistry } from '@services/reconciler/takeProfitRegistry';
import { toErrorMessage } from '@utils/string/string.utils';
import { EventEmitter } from 'node:events';

export type TradeDeskConfiguration = Pick<
  Configuration,
  'getExchange' | 'getTrading' | 'getTrailing' | 'getRetry' | 'getJournal'
>;

export type TradeDeskOverrides = {
  gateway?: ExecutionGateway;
  journal?: TradeRecorder;
};

/**
 * Wires the order lifecycle together: placement, per-trade protection and take-profit reconciliation.
 * Re-emits the protection state changes of every trade.
 */
export class TradeDesk extends EventEmitter {
  private readonly gateway: ExecutionGateway;
  private readonly takeProfits = new TakeProfitRegistry();
  private readonly supervisor: ProtectionSupervisor;
  private readonly reconciler: OrderUpdateReconciler;
  private readonly pipeline: OrderPlacementPipeline;
  private unsubscribe?: () => void;

  constructor(configuration: TradeDeskConfiguration, { gateway, journal }: TradeDeskOverrides = {}) {
    super();
    this.gateway = gateway ?? createGateway(configuration.getExchange());
    const trading = configuration.getTrading();
    const { enabled, breakEvenActivationMultiplier, activationMultiplier, callbackRate, pollInterval } =
      configuration.getTrailing();

    this.supervisor = new ProtectionSupervisor(
      this.gateway,
      symbol => ({
        breakEvenActivationMultiplier,
        activationMultiplier,
        callbackRate,
        pollInterval,
        precision: getSymbolPrecision(trading, symbol),
      }),
      machine =>
        machine.on(PROTECTION_STATE_CHANGED_EVENT, (change: ProtectionStateChange) =>
          this.emit(PROTECTION_STATE_CHANGED_EVENT, change),
        ),
    );
    this.reconciler = new OrderUpdateReconciler(this.gateway, this.takeProfits);
    this.pipeline = new OrderPlacementPipeline({
      gateway: this.gateway,
      executor: new RetryingExecutor(configuration.getRetry()),
      takeProfits: this.takeProfits,
      journal: journal ?? createTradeJournal(configuration.getJournal()),
      protection: this.supervisor,
      trading,
      trailing: { enabled },
    });
  }

  public start() {
    if (this.unsubscribe) return;
    this.reconciler.start();
    this.unsubscribe = this.gateway.subscribeOrderUpdates(update => this.onOrderUpdate(update));
    info('desk', `Trade desk started on ${this.gateway.getName()}`);
  }

  public placeTrade(symbol: string, side: OrderSide, referencePrice: number, atr: number) {
    return this.pipeline.placeTrade(symbol, side, referencePrice, atr);
  }

  public openTrade(intent: TradeIntent) {
    return this.pipeline.openTrade(intent);
  }

  public getProtectionState(symbol: string) {
    return this.supervisor.get(symbol)?.getState();
  }

  public getTrackedTakeProfit(symbol: string) {
    return this.takeProfits.get(symbol);
  }

  public async shutdown() {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.reconciler.stop();
    await this.supervisor.stopAll();
    await this.reconciler.idle();
    info('desk', 'Trade desk stopped');
  }

  /** A filled take-profit or stop-loss closed the position: its protection has nothing left to watch */
  private onOrderUpdate({ symbol, orderId, status }: OrderUpdate) {
    if (status !== FILLED_ORDER_STATUS) return;
    const isTakeProfit = this.takeProfits.get(symbol) === orderId;
    const isCurrentStop = this.supervisor.get(symbol)?.getContext().currentStop.orderId === orderId;
    if (!isTakeProfit && !isCurrentStop) return;

    if (isTakeProfit) this.takeProfits.release(symbol, orderId);
    this.supervisor.stop(symbol).then(
      state => {
        if (state) debug('desk', `Protection of ${symbol} ended (${state}) after order ${orderId} filled`);
      },
      (err: unknown) => error('desk', `Failed to stop protection of ${symbol}: ${toErrorMessage(err)}`),
    );
  }
}

export const createTradeDesk = (
  configuration: TradeDeskConfiguration = new Configuration(),
  overrides?: TradeDeskOverrides,
) => new TradeDesk(configuration, overrides);
