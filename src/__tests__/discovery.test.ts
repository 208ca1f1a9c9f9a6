import { beforeEach, describe, it, expect, vi } from 'vitest';

interface FakeService {
  name: string;
  addresses: string[];
  port: number;
  txt: Record<string, string>;
}

const mocks = vi.hoisted(() => {
  const updateTxt = vi.fn();
  return {
    updateTxt,
    publish: vi.fn(() => ({ updateTxt })),
    unpublishAll: vi.fn((callback?: () => void) => callback?.()),
    destroy: vi.fn(),
    stop: vi.fn(),
    services: new Array<FakeService>(),
  };
});

vi.mock('bonjour-service', () => ({
  Bonjour: class {
    publish = mocks.publish;
    unpublishAll = mocks.unpublishAll;
    destroy = mocks.destroy;
    find(_options: unknown, onUp: (service: FakeService) => void) {
      for (const service of mocks.services) onUp(service);
      return { stop: mocks.stop };
    }
  },
}));

import { DiscoveredEcu, advertise, parseDoipTxt, scan } from '../discovery.js';

describe('Discovery', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.services = [];
  });

  it('parses DoIP TXT record fields', () => {
    expect(parseDoipTxt({ vin: 'VECU-SIM-1234567', fw: '1.2.0', state: 'APPLICATION' })).toEqual({
      vin: 'VECU-SIM-1234567',
      firmwareVersion: '1.2.0',
      state: 'APPLICATION',
    });
  });

  it('fills in missing TXT fields', () => {
    expect(parseDoipTxt({})).toEqual({ vin: '', firmwareVersion: 'unknown', state: 'UNKNOWN' });
  });

  it('creates a DiscoveredEcu from service info', () => {
    const ecu = new DiscoveredEcu({
      name: 'Bench ECU',
      address: '192.168.1.50',
      port: 13400,
      vin: 'VECU-SIM-1234567',
      firmwareVersion: '1.0.0',
      state: 'APPLICATION',
    });
    expect(ecu.toString()).toBe('Bench ECU (192.168.1.50:13400) [VECU-SIM-1234567 fw 1.0.0, APPLICATION]');
  });

  it('publishes a _doip._tcp service and unpublishes on stop', async () => {
    const ad = advertise({ name: 'vECU', port: 13400, vin: 'VECU-SIM-1234567', state: 'APPLICATION' });
    expect(mocks.publish).toHaveBeenCalledWith({
      name: 'vECU',
      type: 'doip',
      protocol: 'tcp',
      port: 13400,
      txt: { vin: 'VECU-SIM-1234567', fw: 'unknown', state: 'APPLICATION' },
    });

    ad.update({ firmwareVersion: '1.1.0' });
    expect(mocks.updateTxt).toHaveBeenCalledWith({ vin: 'VECU-SIM-1234567', fw: '1.1.0', state: 'APPLICATION' });

    await ad.stop();
    expect(mocks.unpublishAll).toHaveBeenCalledTimes(1);
    expect(mocks.destroy).toHaveBeenCalledTimes(1);
  });

  it('collects IPv4 services, skipping link-local and duplicates', async () => {
    mocks.services = [
      { name: 'Zeta', addresses: ['fe80::1', '10.0.0.9'], port: 13400, txt: { vin: 'VIN-B' } },
      { name: 'Alpha', addresses: ['10.0.0.7'], port: 13401, txt: { vin: 'VIN-A', fw: '2.0.0', state: 'UPDATE_PENDING' } },
      { name: 'Alpha again', addresses: ['10.0.0.8'], port: 13401, txt: { vin: 'VIN-A' } },
      { name: 'Link local', addresses: ['169.254.3.3'], port: 13400, txt: { vin: 'VIN-C' } },
    ];

    const ecus = await scan({ timeout: 1 });
    expect(ecus.map(String)).toEqual([
      'Alpha (10.0.0.7:13401) [VIN-A fw 2.0.0, UPDATE_PENDING]',
      'Zeta (10.0.0.9:13400) [VIN-B fw unknown, UNKNOWN]',
    ]);
    expect(mocks.stop).toHaveBeenCalledTimes(1);
    expect(mocks.destroy).toHaveBeenCalledTimes(1);
  });

  it('applies a filter', async () => {
    mocks.services = [
      { name: 'One', addresses: ['10.0.0.1'], port: 13400, txt: { vin: 'VIN-1' } },
      { name: 'Two', addresses: ['10.0.0.2'], port: 13400, txt: { vin: 'VIN-2' } },
    ];

    const ecus = await scan({ timeout: 1, filter: (ecu) => ecu.vin === 'VIN-2' });
    expect(ecus.map((e) => e.name)).toEqual(['Two']);
  });
});
