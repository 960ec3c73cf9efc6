import { debug } from '@services/logger';

/**
 * Take-profit order tracked per symbol, written by the placement pipeline and consumed by the reconciler.
 * One entry per symbol: the duplicate-position guard keeps a single open trade per symbol.
 */
export class TakeProfitRegistry {
  private readonly orders = new Map<string, string>();

  public register(symbol: string, orderId: string) {
    const previous = this.orders.get(symbol);
    if (previous && previous !== orderId)
      debug('reconciler', `Replacing tracked take-profit ${previous} of ${symbol} with ${orderId}`);
    this.orders.set(symbol, orderId);
  }

  public get(symbol: string) {
    return this.orders.get(symbol);
  }

  /** Removes and returns the take-profit tracked for `symbol` */
  public take(symbol: string) {
    const orderId = this.orders.get(symbol);
    this.orders.delete(symbol);
    return orderId;
  }

  /** Removes the entry only while it still points at `orderId` */
  public release(symbol: string, orderId: string) {
    if (this.orders.get(symbol) !== orderId) return false;
    return this.orders.delete(symbol);
  }

  public get size() {
    return this.orders.size;
  }
}
