import Bonjour, { type Service } from 'bonjour-service';
import { createLogger } from '@/shared/logging/logger';
import { bestEffortSync } from '@/shared/bestEffort';
import type {
  MdnsBrowseOptions,
  MdnsBrowser,
  MdnsPort,
  MdnsServiceRecord,
} from '@/ports/MdnsPort';

const toTxt = (txt: unknown): Record<string, unknown> | undefined => {
  if (typeof txt !== 'object' || txt === null || Array.isArray(txt)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(txt));
};

export function toServiceRecord(service: Service): MdnsServiceRecord {
  return {
    name: service.name,
    host: service.host,
    fqdn: service.fqdn,
    port: service.port,
    addresses: service.addresses,
    txt: toTxt(service.txt),
    type: service.type,
    protocol: service.protocol,
  };
}

/**
 * bonjour-service backed browser. One multicast socket is shared by every
 * browse started through this instance until {@link shutdown}.
 */
export class MdnsService implements MdnsPort {
  private readonly log = createLogger('Discovery', 'Mdns');
  private bonjour: Bonjour | null = null;

  public browse(
    options: MdnsBrowseOptions,
    onService: (service: MdnsServiceRecord) => void,
  ): MdnsBrowser {
    const bonjour = this.instance();
    const browser = bonjour.find(
      { type: options.type, protocol: options.protocol ?? 'tcp' },
      (service: Service) => onService(toServiceRecord(service)),
    );
    browser.start();
    return {
      stop: () =>
        bestEffortSync(() => browser.stop(), {
          fallback: undefined,
          onError: 'debug',
          log: this.log,
          label: 'mdns browse stop failed',
          context: { type: options.type },
        }),
    };
  }

  public shutdown(): void {
    const bonjour = this.bonjour;
    this.bonjour = null;
    if (!bonjour) return;
    bestEffortSync(() => bonjour.destroy(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'mdns shutdown failed',
    });
  }

  private instance(): Bonjour {
    if (!this.bonjour) {
      this.bonjour = new Bonjour();
    }
    return this.bonjour;
  }
}
