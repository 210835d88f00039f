import { setTimeout as delay } from 'node:timers/promises';
import type { AppConfig } from '@/config';
import type { CastTransportPort } from '@/ports/CastDevicePort';
import type { ClockPort } from '@/ports/ClockPort';
import type { DesktopEntryPort } from '@/ports/DesktopEntryPort';
import type { MdnsPort } from '@/ports/MdnsPort';
import type { MprisServerFactory } from '@/ports/MprisPort';
import type { ProcessSupervisorPort } from '@/ports/ProcessPort';
import type { SessionStorePort } from '@/ports/SessionStorePort';
import { connectCastDevice } from '@/adapters/cast/castDevice';
import { CastV2Transport } from '@/adapters/cast/castTransport';
import { DesktopEntryWriter } from '@/adapters/desktop/desktopEntry';
import { MdnsService } from '@/adapters/discovery/mdnsService';
import { MprisServer } from '@/adapters/mpris/mprisServer';
import { ProcessSupervisor } from '@/adapters/process/processSupervisor';
import { SessionStore } from '@/adapters/storage/sessionStore';
import { systemClock } from '@/infrastructure/time/systemClock';

export type RuntimePorts = {
  clock: ClockPort;
  mdns: MdnsPort;
  transport: CastTransportPort;
  desktopEntries: DesktopEntryPort;
  createServer: MprisServerFactory;
  store: SessionStorePort;
  supervisor: ProcessSupervisorPort;
  sleep: (ms: number) => Promise<void>;
};

export const sleep = (ms: number): Promise<void> => delay(ms);

/**
 * The real collaborators: mDNS, castv2 sockets, the session bus and the
 * filesystem.
 */
export function createRuntimePorts(config: AppConfig): RuntimePorts {
  const clock = systemClock;
  const mdns = new MdnsService();
  const transport = new CastV2Transport({
    mdns,
    connect: (target) => connectCastDevice(target, clock),
    sleep,
    connectTries: config.env.connectTries,
    discoveryTimeoutMs: config.env.discoveryTimeoutMs,
  });
  return {
    clock,
    mdns,
    transport,
    desktopEntries: new DesktopEntryWriter(config.env.applicationsDir, config.icons),
    createServer: (name, adapter) => new MprisServer(name, adapter),
    store: new SessionStore(config.session),
    supervisor: new ProcessSupervisor(),
    sleep,
  };
}
