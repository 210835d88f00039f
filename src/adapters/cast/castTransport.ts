import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import type { CastDeviceHandle, CastTransportPort } from '@/ports/CastDevicePort';
import type { MdnsBrowser, MdnsPort, MdnsServiceRecord } from '@/ports/MdnsPort';
import { CAST_PORT, type CastTarget } from '@/adapters/cast/castDevice';

const CAST_SERVICE_TYPE = 'googlecast';
const EUREKA_PORT = 8008;
const EUREKA_TIMEOUT_MS = 1500;

export interface CastTransportOptions {
  mdns: MdnsPort;
  connect: (target: CastTarget) => Promise<CastDeviceHandle>;
  sleep: (ms: number) => Promise<void>;
  connectTries: number;
  discoveryTimeoutMs: number;
  /** Looks up the friendly name and uuid of a host reached without mDNS. */
  probeHost?: (host: string) => Promise<Partial<CastTarget> | null>;
  log?: ComponentLogger;
}

/**
 * 32 hex digits in any dash layout compare equal.
 */
export function normalizeUuid(raw: string): string | null {
  const hex = raw.replace(/-/g, '').toLowerCase();
  if (!/^[0-9a-f]{32}$/.test(hex)) {
    return null;
  }
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

const normalizeHost = (value: string | undefined): string | undefined =>
  value ? value.replace(/\.$/, '') : undefined;

/**
 * Cast receivers advertise their friendly name in `fn` and their uuid
 * (undashed) in `id`.
 */
export function toCastTarget(service: MdnsServiceRecord): CastTarget | null {
  const addresses = service.addresses ?? [];
  const host = addresses.find((address) => address.includes('.')) ?? addresses[0] ?? normalizeHost(service.host);
  if (!host) {
    return null;
  }
  const txt = service.txt ?? {};
  const name = typeof txt.fn === 'string' && txt.fn.length > 0 ? txt.fn : service.name ?? null;
  const uuid = typeof txt.id === 'string' ? normalizeUuid(txt.id) : null;
  return {
    host,
    port: service.port > 0 ? service.port : CAST_PORT,
    name,
    uuid,
  };
}

/**
 * Reads `/setup/eureka_info` for a host given on the command line.
 */
export async function probeEurekaInfo(host: string): Promise<Partial<CastTarget> | null> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), EUREKA_TIMEOUT_MS);
  try {
    const res = await fetch(`http://${host}:${EUREKA_PORT}/setup/eureka_info?options=detail`, {
      signal: controller.signal,
    });
    if (!res.ok) return null;
    const info: unknown = await res.json();
    if (typeof info !== 'object' || info === null) return null;
    const name = 'name' in info && typeof info.name === 'string' ? info.name : null;
    const udn = 'ssdp_udn' in info && typeof info.ssdp_udn === 'string' ? normalizeUuid(info.ssdp_udn) : null;
    return { name, uuid: udn };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Finds Cast receivers over mDNS (or directly by host) and connects to the
 * first match. A sweep that finds nothing, or a device that refuses every
 * connection attempt, resolves to null.
 */
export class CastV2Transport implements CastTransportPort {
  private readonly log: ComponentLogger;

  constructor(private readonly options: CastTransportOptions) {
    this.log = options.log ?? createLogger('Discovery', 'Cast');
  }

  public async findByHost(host: string, retryWait: number | null): Promise<CastDeviceHandle | null> {
    const probe = this.options.probeHost ?? probeEurekaInfo;
    const info = await bestEffort(() => probe(host), {
      fallback: null,
      onError: 'debug',
      log: this.log,
      label: 'cast host probe failed',
      context: { host },
    });
    const target: CastTarget = {
      host,
      port: CAST_PORT,
      name: info?.name ?? null,
      uuid: info?.uuid ?? null,
    };
    return this.connectWithRetries(target, retryWait);
  }

  public async findByUuid(uuid: string, retryWait: number | null): Promise<CastDeviceHandle | null> {
    const wanted = normalizeUuid(uuid) ?? uuid.toLowerCase();
    return this.findFirst((target) => target.uuid === wanted, retryWait, { uuid });
  }

  public async findByName(name: string, retryWait: number | null): Promise<CastDeviceHandle | null> {
    return this.findFirst((target) => target.name === name, retryWait, { name });
  }

  public async findAny(retryWait: number | null): Promise<CastDeviceHandle | null> {
    return this.findFirst(() => true, retryWait, {});
  }

  /**
   * Browses until a target matches or the discovery timeout passes.
   */
  public discover(match: (target: CastTarget) => boolean): Promise<CastTarget | null> {
    return new Promise<CastTarget | null>((resolve) => {
      let settled = false;
      let browser: MdnsBrowser | null = null;
      const finish = (target: CastTarget | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        browser?.stop();
        resolve(target);
      };
      const timer = setTimeout(() => finish(null), this.options.discoveryTimeoutMs);
      browser = this.options.mdns.browse({ type: CAST_SERVICE_TYPE, protocol: 'tcp' }, (service) => {
        const target = toCastTarget(service);
        this.log.spam('cast service seen', { service: service.name ?? null, target });
        if (target && match(target)) {
          finish(target);
        }
      });
      if (settled) {
        browser.stop();
      }
    });
  }

  private async findFirst(
    match: (target: CastTarget) => boolean,
    retryWait: number | null,
    context: Record<string, unknown>,
  ): Promise<CastDeviceHandle | null> {
    const target = await this.discover(match);
    if (!target) {
      this.log.debug('no matching cast device discovered', context);
      return null;
    }
    this.log.debug('cast device discovered', { ...context, host: target.host, name: target.name });
    return this.connectWithRetries(target, retryWait);
  }

  private async connectWithRetries(target: CastTarget, retryWait: number | null): Promise<CastDeviceHandle | null> {
    const tries = retryWait === null ? 1 : this.options.connectTries;
    for (let attempt = 1; attempt <= tries; attempt += 1) {
      try {
        const device = await this.options.connect(target);
        this.log.info('connected to cast device', { host: target.host, name: target.name, attempt });
        return device;
      } catch (error) {
        this.log.debug('cast connection attempt failed', {
          host: target.host,
          attempt,
          tries,
          message: errorMessage(error),
        });
        if (attempt < tries && retryWait !== null) {
          await this.options.sleep(retryWait * 1000);
        }
      }
    }
    return null;
  }
}
