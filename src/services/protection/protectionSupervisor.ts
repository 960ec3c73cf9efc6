import type { ExecutionGateway } from '@services/exchange/exchange.types';
import { debug, error } from '@services/logger';
import { toErrorMessage } from '@utils/string/string.utils';
import { ProtectiveOrderMachine } from './protectiveOrderMachine';
import type { ProtectionSeed, ProtectionSettings, ProtectionStarter, ProtectionState } from './protectiveOrderMachine.types';

export type ProtectionSettingsResolver = (symbol: string) => ProtectionSettings;

type ProtectionHandle = {
  machine: ProtectiveOrderMachine;
  done: Promise<ProtectionState>;
};

/** Owns the running protective-order machine of every symbol with an open trade. */
export class ProtectionSupervisor implements ProtectionStarter {
  private readonly handles = new Map<string, ProtectionHandle>();

  constructor(
    private readonly gateway: ExecutionGateway,
    private readonly resolveSettings: ProtectionSettingsResolver,
    private readonly onMachineCreated?: (machine: ProtectiveOrderMachine) => void,
  ) {}

  public start(seed: ProtectionSeed) {
    const { symbol } = seed;
    if (this.handles.has(symbol)) {
      debug('supervisor', `Replacing protection already running on ${symbol}`);
      this.stop(symbol);
    }

    const machine = new ProtectiveOrderMachine(this.gateway, seed, this.resolveSettings(symbol));
    this.onMachineCreated?.(machine);
    const done = machine
      .run()
      .catch((err: unknown): ProtectionState => {
        error('supervisor', `Protection of ${symbol} crashed: ${toErrorMessage(err)}`);
        return 'TERMINATED_ERROR';
      })
      .finally(() => {
        if (this.handles.get(symbol)?.machine === machine) this.handles.delete(symbol);
      });

    this.handles.set(symbol, { machine, done });
    return machine;
  }

  /** Aborts the machine of `symbol`; resolves with its final state, or undefined when none was running */
  public stop(symbol: string): Promise<ProtectionState | undefined> {
    const handle = this.handles.get(symbol);
    if (!handle) return Promise.resolve(undefined);
    this.handles.delete(symbol);
    handle.machine.stop();
    return handle.done;
  }

  public async stopAll() {
    const symbols = [...this.handles.keys()];
    return Promise.all(symbols.map(symbol => this.stop(symbol)));
  }

  public get(symbol: string) {
    return this.handles.get(symbol)?.machine;
  }

  public get size() {
    return this.handles.size;
  }
}
