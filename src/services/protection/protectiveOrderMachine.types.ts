import type { OrderSide } from '@models/order.types';
import type { ProtectiveOrderRef, SymbolPrecision } from '@models/trade.types';

export type ProtectionState = 'ARMED' | 'BREAK_EVEN' | 'TERMINATED_OK' | 'TERMINATED_ERROR' | 'STOPPED';

/** What the placement pipeline hands over once the fixed stop-loss is live */
export type ProtectionSeed = {
  symbol: string;
  /** Side of the entry order */
  side: OrderSide;
  quantity: number;
  entryPrice: number;
  atr: number;
  stopLossOrderId: string;
};

export type TrailingContext = {
  symbol: string;
  side: OrderSide;
  quantity: number;
  entryPrice: number;
  atr: number;
  breakEvenActivationPrice: number;
  trailingActivationPrice: number;
  /** Live stop-loss: the fixed one, then the break-even stop, then the trailing stop */
  currentStop: ProtectiveOrderRef;
  breakEvenReached: boolean;
};

export type ProtectionSettings = {
  breakEvenActivationMultiplier: number;
  activationMultiplier: number;
  /** Trailing distance in percent */
  callbackRate: number;
  pollInterval: number;
  precision: SymbolPrecision;
};

export type ProtectionStateChange = {
  symbol: string;
  from: ProtectionState;
  to: ProtectionState;
  stopOrderId?: string;
};

export interface ProtectionStarter {
  start(seed: ProtectionSeed): void;
}
