import type { TradingConfig } from '@models/configuration.types';
import type { SymbolPrecision, TradeIntent } from '@models/trade.types';
import { getDirection } from '@services/exchange/exchange.utils';
import { roundToStep } from '@utils/math/round.utils';
import type { LevelsComputation } from './orderPlacement.types';

export const getSymbolPrecision = ({ precision, defaultPrecision }: TradingConfig, symbol: string): SymbolPrecision =>
  precision[symbol] ?? defaultPrecision;

export const getSymbolLeverage = ({ leverage, defaultLeverage }: TradingConfig, symbol: string) =>
  leverage[symbol] ?? defaultLeverage;

/**
 * Sizes the position and derives entry, stop-loss and take-profit prices from the ATR.
 * Prices are rounded down to the tick, then pushed at least `priceBufferRatio × entry` away from the entry.
 * A non-positive or non-finite price and a negative or non-finite ATR give degenerate levels.
 */
export const computeTradeLevels = (
  { side, signalPrice, atr }: TradeIntent,
  leverage: number,
  trading: TradingConfig,
  { quantityStep, priceStep }: SymbolPrecision,
): LevelsComputation => {
  if (!Number.isFinite(signalPrice) || signalPrice <= 0 || !Number.isFinite(atr) || atr < 0)
    return { valid: false, reason: 'DEGENERATE_LEVELS' };

  const notional = trading.marginPerTrade * leverage;
  const rawQuantity = notional / signalPrice;
  if (rawQuantity * signalPrice < trading.minNotional) return { valid: false, reason: 'BELOW_MIN_NOTIONAL' };

  const isLong = getDirection(side) === 'LONG';
  const direction = isLong ? 1 : -1;

  const quantity = roundToStep(rawQuantity, quantityStep);
  const entryPrice = roundToStep(signalPrice, priceStep);
  let stopLoss = roundToStep(signalPrice - direction * trading.stopLossMultiplier * atr, priceStep);
  let takeProfit = roundToStep(signalPrice + direction * trading.takeProfitMultiplier * atr, priceStep);

  const buffer = trading.priceBufferRatio * entryPrice;
  if (isLong) {
    if (stopLoss > entryPrice - buffer) stopLoss = roundToStep(entryPrice - buffer, priceStep, 'down');
    if (takeProfit < entryPrice + buffer) takeProfit = roundToStep(entryPrice + buffer, priceStep, 'up');
  } else {
    if (stopLoss < entryPrice + buffer) stopLoss = roundToStep(entryPrice + buffer, priceStep, 'up');
    if (takeProfit > entryPrice - buffer) takeProfit = roundToStep(entryPrice - buffer, priceStep, 'down');
  }

  const isOnWrongSide = isLong
    ? stopLoss >= entryPrice || takeProfit <= entryPrice
    : stopLoss <= entryPrice || takeProfit >= entryPrice;
  if (quantity <= 0 || Math.min(entryPrice, stopLoss, takeProfit) <= 0 || isOnWrongSide)
    return { valid: false, reason: 'DEGENERATE_LEVELS' };

  return { valid: true, levels: { quantity, entryPrice, stopLoss, takeProfit } };
};
