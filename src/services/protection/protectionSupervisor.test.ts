import { DummyFuturesGateway } from '@services/exchange/dummy/dummyFuturesGateway';
import { waitOrAbort } from '@utils/process/process.utils';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ProtectionSupervisor } from './protectionSupervisor';
import type { ProtectionSeed, ProtectionSettings } from './protectiveOrderMachine.types';

vi.mock('@services/logger', () => ({ debug: vi.fn(), info: vi.fn(), warning: vi.fn(), error: vi.fn() }));
vi.mock('@utils/process/process.utils', () => ({ waitOrAbort: vi.fn() }));

const SETTINGS: ProtectionSettings = {
  breakEvenActivationMultiplier: 0.5,
  activationMultiplier: 1,
  callbackRate: 0.5,
  pollInterval: 2000,
  precision: { quantityStep: 0.001, priceStep: 0.01 },
};

const seed = (symbol: string, stopLossOrderId: string): ProtectionSeed => ({
  symbol,
  side: 'BUY',
  quantity: 1,
  entryPrice: 100,
  atr: 10,
  stopLossOrderId,
});

/** Resolves `true` when the poll delay elapses, `false` as soon as the signal aborts */
const pendingUntilAborted = async (_delay: number, signal?: AbortSignal) =>
  new Promise<boolean>(resolve => {
    if (signal?.aborted) return resolve(false);
    signal?.addEventListener('abort', () => resolve(false), { once: true });
  });

describe('ProtectionSupervisor', () => {
  let gateway: DummyFuturesGateway;
  let supervisor: ProtectionSupervisor;
  const resolveSettings = vi.fn();

  beforeEach(() => {
    gateway = new DummyFuturesGateway({
      name: 'dummy-futures',
      markPrices: { BTCUSDT: 101, ETHUSDT: 101 },
      sandbox: true,
    });
    resolveSettings.mockReturnValue(SETTINGS);
    vi.mocked(waitOrAbort).mockImplementation(pendingUntilAborted);
    supervisor = new ProtectionSupervisor(gateway, resolveSettings);
  });

  it('runs one machine per symbol with the settings of that symbol', () => {
    supervisor.start(seed('BTCUSDT', '1'));
    supervisor.start(seed('ETHUSDT', '2'));

    expect(supervisor.size).toBe(2);
    expect(resolveSettings.mock.calls).toEqual([['BTCUSDT'], ['ETHUSDT']]);
    expect(supervisor.get('BTCUSDT')?.getContext().currentStop).toEqual({ symbol: 'BTCUSDT', orderId: '1', kind: 'FIXED_SL' });
  });

  it('stops the previous machine of a symbol before starting a new one', async () => {
    const first = supervisor.start(seed('BTCUSDT', '1'));
    const second = supervisor.start(seed('BTCUSDT', '2'));

    await vi.waitFor(() => expect(first.getState()).toBe('STOPPED'));
    expect(supervisor.get('BTCUSDT')).toBe(second);
    expect(supervisor.size).toBe(1);
  });

  it('stops a symbol and reports the final state', async () => {
    supervisor.start(seed('BTCUSDT', '1'));

    await expect(supervisor.stop('BTCUSDT')).resolves.toBe('STOPPED');
    expect(supervisor.get('BTCUSDT')).toBeUndefined();
  });

  it('resolves undefined when stopping a symbol without protection', async () => {
    await expect(supervisor.stop('DOGEUSDT')).resolves.toBeUndefined();
  });

  it('stops every machine', async () => {
    supervisor.start(seed('BTCUSDT', '1'));
    supervisor.start(seed('ETHUSDT', '2'));

    await expect(supervisor.stopAll()).resolves.toEqual(['STOPPED', 'STOPPED']);
    expect(supervisor.size).toBe(0);
  });

  it('forgets machines that finish on their own', async () => {
    const stop = await gateway.createOrder('BTCUSDT', 'SELL', 'STOP_MARKET', { stopPrice: 90, closePosition: true });
    gateway.setMarkPrice('BTCUSDT', 112);

    const machine = supervisor.start(seed('BTCUSDT', stop.orderId));

    await vi.waitFor(() => expect(supervisor.size).toBe(0));
    expect(machine.getState()).toBe('TERMINATED_OK');
  });

  it('hands every new machine to the creation hook', () => {
    const onMachineCreated = vi.fn();
    supervisor = new ProtectionSupervisor(gateway, resolveSettings, onMachineCreated);

    const machine = supervisor.start(seed('BTCUSDT', '1'));

    expect(onMachineCreated).toHaveBeenCalledExactlyOnceWith(machine);
  });
});
