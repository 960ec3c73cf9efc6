import type { ExchangeOrder, OrderOptions } from '@models/order.types';

export type DummyFuturesOrder = ExchangeOrder & { options: OrderOptions };
