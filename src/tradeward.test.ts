import { PROTECTION_STATE_CHANGED_EVENT } from '@constants/event.const';
import { DummyFuturesGateway } from '@services/exchange/dummy/dummyFuturesGateway';
import type { TradeRecorder } from '@services/journal/tradeJournal.types';
import type { ProtectionStateChange } from '@services/protection/protectiveOrderMachine.types';
import { wait, waitOrAbort } from '@utils/process/process.utils';
import { readFileSync } from 'node:fs';
import type { Mock } from 'vitest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTradeDesk, type TradeDesk } from './tradeward';

vi.mock('node:fs', () => ({ readFileSync: vi.fn() }));
vi.mock('binance', () => ({ USDMClient: vi.fn(), WebsocketClient: vi.fn() }));
vi.mock('@services/logger', () => ({ debug: vi.fn(), info: vi.fn(), warning: vi.fn(), error: vi.fn() }));
vi.mock('@utils/process/process.utils', () => ({ wait: vi.fn(), waitOrAbort: vi.fn() }));

const CONFIGURATION = JSON.stringify({
  exchange: { name: 'dummy-futures' },
  trading: {
    marginPerTrade: 200,
    leverage: { ETHUSDT: 5 },
    minNotional: 5,
    precision: { ETHUSDT: { quantityStep: 0.001, priceStep: 0.01 } },
  },
  trailing: { breakEvenActivationMultiplier: 0.5, activationMultiplier: 1 },
});

describe('TradeDesk', () => {
  let gateway: DummyFuturesGateway;
  let journal: { recordTrade: Mock<TradeRecorder['recordTrade']> };
  let desk: TradeDesk;
  let changes: ProtectionStateChange[];

  beforeEach(() => {
    vi.mocked(readFileSync).mockReturnValue(CONFIGURATION);
    vi.mocked(wait).mockResolvedValue(undefined);
    vi.mocked(waitOrAbort).mockImplementation(
      async (_delay, signal) =>
        new Promise<boolean>(resolve => {
          if (signal?.aborted) return resolve(false);
          signal?.addEventListener('abort', () => resolve(false), { once: true });
        }),
    );
    process.env.TRADEWARD_CONFIG_FILE_PATH = './tradeward.json';

    gateway = new DummyFuturesGateway({ name: 'dummy-futures', markPrices: { ETHUSDT: 3000 }, sandbox: true });
    journal = { recordTrade: vi.fn<TradeRecorder['recordTrade']>().mockResolvedValue(undefined) };
    desk = createTradeDesk(undefined, { gateway, journal });
    changes = [];
    desk.on(PROTECTION_STATE_CHANGED_EVENT, (change: ProtectionStateChange) => changes.push(change));
    desk.start();
  });

  afterEach(async () => {
    await desk.shutdown();
  });

  it('reads its configuration from the configured file', () => {
    expect(readFileSync).toHaveBeenCalledWith('./tradeward.json', 'utf8');
  });

  it('places a protected trade and watches it', async () => {
    await expect(desk.placeTrade('ETHUSDT', 'SELL', 3000, 50)).resolves.toBe(true);

    expect(desk.getTrackedTakeProfit('ETHUSDT')).toBe('2');
    expect(desk.getProtectionState('ETHUSDT')).toBe('ARMED');
    await expect(gateway.getPosition('ETHUSDT')).resolves.toEqual([{ symbol: 'ETHUSDT', quantity: -0.333 }]);
    expect(journal.recordTrade).toHaveBeenCalledWith(expect.objectContaining({ symbol: 'ETHUSDT', status: 'FILLED' }));
  });

  it('stops watching a trade closed by its take-profit', async () => {
    await desk.placeTrade('ETHUSDT', 'SELL', 3000, 50);

    gateway.setMarkPrice('ETHUSDT', 2925);
    gateway.fillOrder('ETHUSDT', '2');

    await vi.waitFor(() =>
      expect(changes).toEqual([{ symbol: 'ETHUSDT', from: 'ARMED', to: 'STOPPED', stopOrderId: '3' }]),
    );
    expect(desk.getProtectionState('ETHUSDT')).toBeUndefined();
    expect(desk.getTrackedTakeProfit('ETHUSDT')).toBeUndefined();
  });

  it('stops watching a trade closed by its stop-loss', async () => {
    await desk.placeTrade('ETHUSDT', 'SELL', 3000, 50);

    gateway.setMarkPrice('ETHUSDT', 3050);
    gateway.fillOrder('ETHUSDT', '3');

    await vi.waitFor(() => expect(changes.map(change => change.to)).toEqual(['STOPPED']));
    expect(desk.getProtectionState('ETHUSDT')).toBeUndefined();
  });

  it('switches to a trailing stop and cancels the take-profit once it fills', async () => {
    gateway.setMarkPrice('ETHUSDT', 2940);

    await desk.placeTrade('ETHUSDT', 'SELL', 3000, 50);
    await vi.waitFor(() => expect(changes.map(change => change.to)).toEqual(['TERMINATED_OK']));

    await expect(gateway.getOrder('ETHUSDT', '3')).resolves.toMatchObject({ status: 'CANCELED' });
    await expect(gateway.getOrder('ETHUSDT', '4')).resolves.toMatchObject({
      type: 'TRAILING_STOP_MARKET',
      status: 'NEW',
      stopPrice: 2950,
    });

    gateway.fillOrder('ETHUSDT', '4');

    await vi.waitFor(() => expect(gateway.getOrder('ETHUSDT', '2')).resolves.toMatchObject({ status: 'CANCELED' }));
    expect(desk.getTrackedTakeProfit('ETHUSDT')).toBeUndefined();
    await expect(gateway.getPosition('ETHUSDT')).resolves.toEqual([{ symbol: 'ETHUSDT', quantity: 0 }]);
  });

  it('stops every watched trade on shutdown', async () => {
    await desk.placeTrade('ETHUSDT', 'SELL', 3000, 50);

    await desk.shutdown();

    expect(changes).toEqual([{ symbol: 'ETHUSDT', from: 'ARMED', to: 'STOPPED', stopOrderId: '3' }]);
    expect(desk.getProtectionState('ETHUSDT')).toBeUndefined();
  });
});
