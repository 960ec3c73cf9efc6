export { PROTECTION_STATE_CHANGED_EVENT } from '@constants/event.const';
export { TradewardError } from '@errors/tradeward.error';
export type { Configuration as ConfigurationModel } from '@models/configuration.types';
export type * from '@models/order.types';
export type * from '@models/trade.types';
export { Configuration } from '@services/configuration/configuration';
export { BinanceFuturesGateway } from '@services/exchange/binance/binanceFutures';
export { DummyFuturesGateway } from '@services/exchange/dummy/dummyFuturesGateway';
export { InvalidOrder, OrderNotFound, UnknownMarkPrice } from '@services/exchange/exchange.error';
export type { ExecutionGateway, OrderUpdateListener } from '@services/exchange/exchange.types';
export { createGateway } from '@services/exchange/exchange.utils';
export { OrderPlacementPipeline } from '@services/execution/orderPlacement';
export type { PlacementRejection, PlacementResult } from '@services/execution/orderPlacement.types';
export { computeTradeLevels } from '@services/execution/orderPlacement.utils';
export { RetryingExecutor, type RetryPolicy } from '@services/execution/retryingExecutor';
export { CsvTradeJournal, LogTradeJournal, createTradeJournal } from '@services/journal/tradeJournal';
export type { TradeRecorder } from '@services/journal/tradeJournal.types';
export { ProtectionSupervisor } from '@services/protection/protectionSupervisor';
export { ProtectiveOrderMachine } from '@services/protection/protectiveOrderMachine';
export type {
  ProtectionSeed,
  ProtectionSettings,
  ProtectionState,
  ProtectionStateChange,
  TrailingContext,
} from '@services/protection/protectiveOrderMachine.types';
export { OrderUpdateReconciler } from '@services/reconciler/orderUpdateReconciler';
export { TakeProfitRegistry } from '@services/reconciler/takeProfitRegistry';
export { TradeDesk, createTradeDesk } from './tradeward';
export type { TradeDeskConfiguration, TradeDeskOverrides } from './tradeward';
