import type { TradingConfig, TrailingConfig } from '@models/configuration.types';
import type { ProtectiveOrderSet, TradeLevels } from '@models/trade.types';
import type { ExecutionGateway } from '@services/exchange/exchange.types';
import type { TradeRecorder } from '@services/journal/tradeJournal.types';
import type { ProtectionStarter } from '@services/protection/protectiveOrderMachine.types';
import type { TakeProfitRegistry } from '@services/reconciler/takeProfitRegistry';
import type { RetryingExecutor } from './retryingExecutor';

export type PlacementRejection =
  | 'UNKNOWN_LEVERAGE'
  | 'BELOW_MIN_NOTIONAL'
  | 'DEGENERATE_LEVELS'
  | 'POSITION_EXISTS'
  | 'ENTRY_NOT_FILLED'
  | 'EXCHANGE_ERROR';

export type PlacementResult = { placed: true; orders: ProtectiveOrderSet } | { placed: false; reason: PlacementRejection };

export type LevelsComputation =
  | { valid: true; levels: TradeLevels }
  | { valid: false; reason: Extract<PlacementRejection, 'BELOW_MIN_NOTIONAL' | 'DEGENERATE_LEVELS'> };

export type OrderPlacementDependencies = {
  gateway: ExecutionGateway;
  executor: RetryingExecutor;
  takeProfits: TakeProfitRegistry;
  journal: TradeRecorder;
  /** Receives the fixed stop-loss when trailing is enabled */
  protection?: ProtectionStarter;
  trading: TradingConfig;
  trailing: Pick<TrailingConfig, 'enabled'>;
};
