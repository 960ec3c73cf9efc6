import type { FuturesOrderType, OrderStatus } from '@models/order.types';

export const TRAILING_STOP_ORDER_TYPE: FuturesOrderType = 'TRAILING_STOP_MARKET';

export const FILLED_ORDER_STATUS: OrderStatus = 'FILLED';
