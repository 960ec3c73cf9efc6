import type { TradeRecord } from '@models/trade.types';

export interface TradeRecorder {
  /** Never rejects: a journal failure must not reach the trading path */
  recordTrade(record: TradeRecord): Promise<void>;
}
