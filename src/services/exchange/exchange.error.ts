import { TradewardError } from '@errors/tradeward.error';

export class InvalidOrder extends TradewardError {
  constructor(message: string) {
    super('exchange', message);
    this.name = 'InvalidOrder';
  }
}

export class OrderNotFound extends TradewardError {
  constructor(message: string) {
    super('exchange', message);
    this.name = 'OrderNotFound';
  }
}

export class UnknownMarkPrice extends TradewardError {
  constructor(symbol: string) {
    super('exchange', `No mark price available for ${symbol}`);
    this.name = 'UnknownMarkPrice';
  }
}
