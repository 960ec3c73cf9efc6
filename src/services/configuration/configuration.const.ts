import { secondsToMilliseconds } from 'date-fns';

export const CONFIG_FILE_PATH_ENV = 'TRADEWARD_CONFIG_FILE_PATH';

export const DISCLAIMER_FIELD = 'I understand that Tradeward places real orders with my own funds' as const;

export const DEFAULT_PRECISION = { quantityStep: 0.001, priceStep: 0.01 };

export const DEFAULT_FILL_CONFIRMATION = { attempts: 5, interval: secondsToMilliseconds(1) };

export const DEFAULT_TRAILING = {
  enabled: true,
  breakEvenActivationMultiplier: 0.5,
  activationMultiplier: 1,
  callbackRate: 0.5,
  pollInterval: secondsToMilliseconds(2),
};

export const DEFAULT_RETRY = { maxAttempts: 3, initialDelay: secondsToMilliseconds(1), backoffFactor: 2 };

export const DEFAULT_JOURNAL = { type: 'log' as const };
