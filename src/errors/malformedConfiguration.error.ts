import { TradewardError } from './tradeward.error';

export class MalformedConfigurationError extends TradewardError {
  constructor(details: string) {
    super('configuration', `Malformed configuration file:\n${details}`);
    this.name = 'MalformedConfigurationError';
  }
}
