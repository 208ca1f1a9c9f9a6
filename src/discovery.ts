import { Bonjour, type Service } from 'bonjour-service';

export const SERVICE_TYPE = 'doip';

export interface DoipTxtRecord {
  vin: string;
  firmwareVersion: string;
  state: string;
}

export function parseDoipTxt(txt: Record<string, string>): DoipTxtRecord {
  return {
    vin: txt.vin ?? '',
    firmwareVersion: txt.fw ?? 'unknown',
    state: txt.state ?? 'UNKNOWN',
  };
}

export interface DiscoveredEcuInfo {
  name: string;
  address: string;
  port: number;
  vin: string;
  firmwareVersion: string;
  state: string;
}

export class DiscoveredEcu {
  readonly name: string;
  readonly address: string;
  readonly port: number;
  readonly vin: string;
  readonly firmwareVersion: string;
  /** Lifecycle state as last advertised. */
  readonly state: string;

  constructor(info: DiscoveredEcuInfo) {
    this.name = info.name;
    this.address = info.address;
    this.port = info.port;
    this.vin = info.vin;
    this.firmwareVersion = info.firmwareVersion;
    this.state = info.state;
  }

  toString(): string {
    return `${this.name} (${this.address}:${this.port}) [${this.vin} fw ${this.firmwareVersion}, ${this.state}]`;
  }
}

export interface AdvertiseOptions {
  name: string;
  port: number;
  vin: string;
  firmwareVersion?: string;
  state?: string;
}

export interface Advertisement {
  /** Republish the TXT record with the given fields changed. */
  update(fields: { firmwareVersion?: string; state?: string }): void;
  stop(): Promise<void>;
}

/** Publish a `_doip._tcp` service so testers on the LAN can find this ECU. */
export function advertise(options: AdvertiseOptions): Advertisement {
  const bonjour = new Bonjour();
  let txt = {
    vin: options.vin,
    fw: options.firmwareVersion ?? 'unknown',
    state: options.state ?? 'UNKNOWN',
  };
  const service = bonjour.publish({
    name: options.name,
    type: SERVICE_TYPE,
    protocol: 'tcp',
    port: options.port,
    txt,
  });

  return {
    update: (fields) => {
      txt = {
        ...txt,
        fw: fields.firmwareVersion ?? txt.fw,
        state: fields.state ?? txt.state,
      };
      service.updateTxt(txt);
    },
    stop: () =>
      new Promise((resolve) => {
        bonjour.unpublishAll(() => {
          bonjour.destroy();
          resolve();
        });
      }),
  };
}

export interface ScanOptions {
  timeout?: number;
  filter?: (ecu: DiscoveredEcu) => boolean;
}

export async function scan(options: ScanOptions = {}): Promise<DiscoveredEcu[]> {
  const timeout = options.timeout ?? 5000;
  const ecus = new Map<string, DiscoveredEcu>();

  return new Promise((resolve) => {
    const bonjour = new Bonjour();

    const browser = bonjour.find({ type: SERVICE_TYPE, protocol: 'tcp' }, (service: Service) => {
      const address = service.addresses?.find(
        (a) => a.includes('.') && !a.startsWith('169.254'),
      );
      if (!address) return;

      const txt = service.txt as Record<string, string>;
      const parsed = parseDoipTxt(txt ?? {});
      const key = parsed.vin || `${address}:${service.port}`;

      if (!ecus.has(key)) {
        ecus.set(
          key,
          new DiscoveredEcu({
            name: service.name,
            address,
            port: service.port,
            vin: parsed.vin,
            firmwareVersion: parsed.firmwareVersion,
            state: parsed.state,
          }),
        );
      }
    });

    setTimeout(() => {
      browser.stop();
      bonjour.destroy();

      let result = Array.from(ecus.values());
      if (options.filter) {
        result = result.filter(options.filter);
      }
      resolve(result.sort((a, b) => a.name.localeCompare(b.name)));
    }, timeout);
  });
}
