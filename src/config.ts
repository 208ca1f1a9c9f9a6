import { join, resolve } from 'node:path';

export const DEFAULT_PORT = 13400;
export const DEFAULT_VIN = 'VECU-SIM-1234567';

export interface EcuConfig {
  host: string;
  port: number;
  /** ASCII identifier answered to VehicleIdRequest. */
  vin: string;
  dataDir: string;
  nvramPath: string;
  /** The "running" firmware image checked at boot and replaced by an update. */
  imagePath: string;
  stagingPath: string;
  /** Main loop tick for APPLICATION and UPDATE_PENDING. */
  tickMs: number;
  /** Simulated peripheral init and self-test time, per step. */
  bootStepMs: number;
  strictFraming: boolean;
  maxPayloadLength?: number;
  idleTimeoutMs: number;
  nackOnIntegrityFailure: boolean;
  stagingLease: boolean;
  advertise: boolean;
}

export type ConfigOverrides = Partial<EcuConfig>;

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function boolFrom(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Build the ECU configuration: defaults, then VECU_* environment
 * variables, then explicit overrides. File paths not given explicitly are
 * placed under the data directory.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): EcuConfig {
  const dataDir = resolve(overrides.dataDir ?? env.VECU_DATA_DIR ?? '.');

  const config: EcuConfig = {
    host: env.VECU_HOST ?? '0.0.0.0',
    port: intFrom(env.VECU_PORT, 'VECU_PORT') ?? DEFAULT_PORT,
    vin: env.VECU_VIN ?? DEFAULT_VIN,
    dataDir,
    nvramPath: join(dataDir, 'nvram.dat'),
    imagePath: join(dataDir, 'firmware.bin'),
    stagingPath: join(dataDir, 'update.bin'),
    tickMs: intFrom(env.VECU_TICK_MS, 'VECU_TICK_MS') ?? 2000,
    bootStepMs: 500,
    strictFraming: boolFrom(env.VECU_STRICT_FRAMING) ?? false,
    maxPayloadLength: intFrom(env.VECU_MAX_PAYLOAD, 'VECU_MAX_PAYLOAD'),
    idleTimeoutMs: intFrom(env.VECU_IDLE_TIMEOUT_MS, 'VECU_IDLE_TIMEOUT_MS') ?? 0,
    nackOnIntegrityFailure: true,
    stagingLease: false,
    advertise: boolFrom(env.VECU_ADVERTISE) ?? false,
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }
  if (config.vin.length === 0 || !/^[\x20-\x7e]+$/.test(config.vin)) {
    throw new Error(`vin must be printable ASCII, got "${config.vin}"`);
  }
  return config;
}
