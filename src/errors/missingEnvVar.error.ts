import { TradewardError } from './tradeward.error';

export class MissingEnvVarError extends TradewardError {
  constructor(variable: string) {
    super('configuration', `Missing ${variable} environment variable`);
    this.name = 'MissingEnvVarError';
  }
}
