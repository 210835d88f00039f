import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { NoDeviceFoundError } from '@/domain/errors';
import { RC_NO_DEVICE, RC_OK } from '@/domain/exitCodes';
import { deviceLabel, type DaemonArgs, type DeviceIdentifiers } from '@/domain/session/types';
import type { CastDeviceHandle, CastTransportPort } from '@/ports/CastDevicePort';
import type { MprisAdapter, MprisServerFactory, MprisServerPort } from '@/ports/MprisPort';
import { registerStatusListener } from '@/application/discovery/statusListener';

export interface DiscoveryDependencies {
  transport: CastTransportPort;
  createAdapter: (device: CastDeviceHandle) => MprisAdapter;
  createServer: MprisServerFactory;
  sleep: (ms: number) => Promise<void>;
  log?: ComponentLogger;
}

export type BoundSession = {
  device: CastDeviceHandle;
  adapter: MprisAdapter;
  server: MprisServerPort;
  unsubscribe: () => void;
};

/**
 * Finds a device, binds a wrapper and an MPRIS server to it, and keeps
 * trying while the device is absent.
 */
type ServeOutcome = { kind: 'closed' } | { kind: 'lost'; reason: string | null };

export class DiscoveryLoop {
  private readonly log: ComponentLogger;
  private session: BoundSession | null = null;
  private stopping = false;

  constructor(private readonly deps: DiscoveryDependencies) {
    this.log = deps.log ?? createLogger('Discovery');
  }

  public get current(): BoundSession | null {
    return this.session;
  }

  /**
   * Host beats uuid beats name. Without any identifier the first device an
   * unscoped search turns up is used.
   */
  public async findDevice(ids: DeviceIdentifiers, retryWait: number | null): Promise<CastDeviceHandle | null> {
    const { transport } = this.deps;
    let device: CastDeviceHandle | null = null;

    if (ids.host) {
      device = await transport.findByHost(ids.host, retryWait);
    }
    if (ids.uuid && !device) {
      device = await transport.findByUuid(ids.uuid, retryWait);
    }
    if (ids.name && !device) {
      device = await transport.findByName(ids.name, retryWait);
    }
    if (!ids.host && !ids.uuid && !ids.name) {
      device = await transport.findAny(retryWait);
    }
    return device;
  }

  public async createAdapterAndServer(
    ids: DeviceIdentifiers,
    retryWait: number | null,
  ): Promise<MprisServerPort | null> {
    const device = await this.findDevice(ids, retryWait);
    if (!device) {
      return null;
    }

    const adapter = this.deps.createAdapter(device);
    const server = this.deps.createServer(adapter.name, adapter);
    server.publish();
    const unsubscribe = registerStatusListener(device, server, adapter);

    this.session = { device, adapter, server, unsubscribe };
    this.log.info('device bound', { device: adapter.name, host: device.host });
    return server;
  }

  /**
   * `wait === null` means a single attempt. Otherwise sleeps `wait` seconds
   * after each miss and tries again until a device turns up.
   */
  public async retryUntilFound(
    ids: DeviceIdentifiers,
    wait: number | null,
    retryWait: number | null,
  ): Promise<MprisServerPort | null> {
    for (;;) {
      const server = await this.createAdapterAndServer(ids, retryWait);
      if (server || wait === null || this.stopping) {
        return server;
      }
      this.log.info(`${deviceLabel(ids)} not found, waiting ${wait}s before retrying`);
      await this.deps.sleep(wait * 1000);
      if (this.stopping) {
        return null;
      }
    }
  }

  /**
   * Runs the session to completion. A device whose connection drops is
   * unbound and searched for again with a fresh adapter and server. Throws
   * {@link NoDeviceFoundError} when retrying is disabled and nothing was
   * found.
   */
  public async runServer(args: DaemonArgs): Promise<void> {
    while (!this.stopping) {
      const server = await this.retryUntilFound(args, args.wait, args.retryWait);

      if (!server) {
        if (this.stopping) {
          return;
        }
        throw new NoDeviceFoundError(deviceLabel(args));
      }
      if (args.icon) {
        server.adapter.setIcon(true);
        server.refresh();
      }

      const outcome = await this.serve(server);
      if (outcome.kind === 'closed') {
        return;
      }
      this.log.warn(`${deviceLabel(args)} connection lost, searching again`, { reason: outcome.reason });
      await this.release();
    }
  }

  /**
   * {@link runServer} with the not-found case mapped to its exit code.
   */
  public async runSafe(args: DaemonArgs): Promise<number> {
    try {
      await this.runServer(args);
      return RC_OK;
    } catch (error) {
      if (error instanceof NoDeviceFoundError) {
        this.log.warn(error.message);
        return RC_NO_DEVICE;
      }
      throw error;
    }
  }

  public async stop(): Promise<void> {
    this.stopping = true;
    await this.release();
  }

  /**
   * Settles when the server closes or the bound device drops, whichever
   * comes first.
   */
  private async serve(server: MprisServerPort): Promise<ServeOutcome> {
    const device = this.session?.device;
    if (!device) {
      await server.loop();
      return { kind: 'closed' };
    }
    let unsubscribe: () => void = () => undefined;
    const lost = new Promise<ServeOutcome>((resolve) => {
      unsubscribe = device.onDisconnect((reason) => resolve({ kind: 'lost', reason }));
    });
    const closed = server.loop().then((): ServeOutcome => ({ kind: 'closed' }));
    try {
      return await Promise.race([closed, lost]);
    } finally {
      unsubscribe();
    }
  }

  private async release(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }
    session.unsubscribe();
    await session.server.close();
    await session.device.disconnect();
  }
}
