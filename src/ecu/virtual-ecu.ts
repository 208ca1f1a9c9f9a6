import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import type { EcuConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { applyUpdate } from '../firmware/apply.js';
import { verifyImage } from '../firmware/integrity.js';
import { DoipServer, type EcuServer } from '../server/server.js';
import type { VerifiedUpdate } from '../uds/dispatcher.js';
import { consoleSink, type LogSink } from '../util/log.js';
import { EcuLifecycle, EcuState } from './lifecycle.js';
import { NvramKey, NvramStore, type ConfigStore } from './nvram.js';

export type ExitReason = 'shutdown' | 'bricked' | 'update-applied';

/** What the ECU hands to the network side when building it. */
export interface ServerHooks {
  lifecycle: EcuLifecycle;
  onUpdate: (update: VerifiedUpdate) => Promise<boolean>;
  /** Version recorded in NVRAM, once it has been loaded. */
  firmwareVersion: () => string | undefined;
  log: LogSink;
}

export interface VirtualEcuOptions {
  config: EcuConfig;
  nvram?: ConfigStore;
  lifecycle?: EcuLifecycle;
  createServer?: (config: EcuConfig, hooks: ServerHooks) => EcuServer;
  log?: LogSink;
}

const BOOT_STEPS = ['Initializing peripherals...', 'Running Power-On Self-Test (POST)...'];

/**
 * The simulated ECU: owns the lifecycle, the NVRAM and the listener, and
 * runs the main control loop.
 *
 * Emits `stateChange` (forwarded from the lifecycle) and `update-applied`.
 */
export class VirtualEcu extends EventEmitter {
  readonly config: EcuConfig;
  readonly lifecycle: EcuLifecycle;
  readonly nvram: ConfigStore;
  private readonly server: EcuServer;
  private readonly sink: LogSink;
  private readonly abort = new AbortController();
  private exitReason?: ExitReason;

  constructor(options: VirtualEcuOptions) {
    super();
    this.config = options.config;
    this.sink = options.log ?? consoleSink;
    this.lifecycle = options.lifecycle ?? new EcuLifecycle(EcuState.Boot, this.sink);
    this.nvram = options.nvram ?? new NvramStore(this.config.nvramPath, this.sink);

    const hooks: ServerHooks = {
      lifecycle: this.lifecycle,
      onUpdate: (update) => this.installUpdate(update),
      firmwareVersion: () => this.nvram.get(NvramKey.FirmwareVersion),
      log: this.sink,
    };
    this.server = (options.createServer ?? createDoipServer)(this.config, hooks);
    this.server.on('update-applied', (update) => this.finish('update-applied', update));
    this.lifecycle.on('stateChange', (to: EcuState, from: EcuState) => this.emit('stateChange', to, from));
  }

  get state(): EcuState {
    return this.lifecycle.state;
  }

  /**
   * Start the listener and run the control loop until the ECU shuts down,
   * applies an update, or is bricked and then shut down.
   */
  async run(): Promise<ExitReason> {
    this.log('ECU starting up...');
    await this.server.listen();

    while (!this.exitReason) {
      switch (this.lifecycle.state) {
        case EcuState.Boot:
          await this.boot();
          break;
        case EcuState.Application:
          this.log('State: APPLICATION. Running normally.');
          await this.sleep(this.config.tickMs);
          break;
        case EcuState.UpdatePending:
          this.log('State: UPDATE_PENDING. Waiting for firmware...');
          await this.sleep(this.config.tickMs);
          break;
        case EcuState.Bricked:
          this.log('ECU is BRICKED. Halting all operations.');
          await this.halt();
          this.exitReason ??= 'bricked';
          break;
      }
    }

    await this.server.close();
    this.log(`ECU stopped (${this.exitReason}).`);
    return this.exitReason;
  }

  /** Stop the main loop. Safe to call more than once. */
  shutdown(): void {
    this.finish(this.lifecycle.bricked ? 'bricked' : 'shutdown');
  }

  /**
   * Secure boot: load NVRAM, run the simulated self tests, and check the
   * running image against the golden hash.
   */
  async boot(): Promise<EcuState> {
    this.log('--- Starting Secure Boot Sequence ---');

    if (!(await this.nvram.load())) {
      this.log('CRITICAL: NVRAM load failed.');
      this.lifecycle.transition(EcuState.Bricked);
      return this.lifecycle.state;
    }
    this.log(`Firmware Version: ${this.nvram.get(NvramKey.FirmwareVersion) ?? 'unknown'}`);

    for (const step of BOOT_STEPS) {
      this.log(step);
      await this.sleep(this.config.bootStepMs);
      if (this.exitReason) return this.lifecycle.state;
    }

    this.log('Verifying application firmware integrity...');
    const golden = this.nvram.get(NvramKey.GoldenHash);
    if (!golden) {
      this.log('CRITICAL: Golden hash not found in NVRAM. Cannot verify firmware.');
      this.lifecycle.transition(EcuState.Bricked);
      return this.lifecycle.state;
    }

    const result = await verifyImage(this.config.imagePath, golden);
    this.log(`  -> Expected Hash:   ${result.expected}`);
    this.log(`  -> Calculated Hash: ${result.actual ?? '(unreadable)'}`);
    if (result.ok) {
      this.log('Integrity check PASSED.');
      // A programming session may have been entered while booting.
      this.lifecycle.transitionFrom(EcuState.Boot, EcuState.Application);
    } else {
      this.log('!!! SECURE BOOT FAILED: FIRMWARE INTEGRITY COMPROMISED !!!');
      this.lifecycle.transition(EcuState.Bricked);
    }
    return this.lifecycle.state;
  }

  /**
   * Replace the running image with a verified staged one and make it the
   * new golden image. Returns false when the ECU keeps running as before.
   */
  async installUpdate(update: VerifiedUpdate): Promise<boolean> {
    this.log(`Applying update from ${update.stagingPath} (${update.bytesWritten} bytes)...`);
    try {
      await applyUpdate(update.stagingPath, this.config.imagePath);
    } catch (err) {
      this.log(`ERROR: failed to apply update: ${errorMessage(err)}`);
      return false;
    }

    this.nvram.set(NvramKey.GoldenHash, update.digest);
    if (!(await this.nvram.save())) {
      this.log('WARNING: new golden hash was not persisted. Next boot will fail verification.');
    }
    this.log('Update applied. Restarting into new firmware.');
    return true;
  }

  private finish(reason: ExitReason, update?: VerifiedUpdate): void {
    if (this.exitReason) return;
    this.exitReason = reason;
    if (update) this.emit('update-applied', update);
    this.abort.abort();
  }

  private async sleep(ms: number): Promise<void> {
    if (this.abort.signal.aborted) return;
    try {
      await delay(ms, undefined, { signal: this.abort.signal });
    } catch (err) {
      if (!this.abort.signal.aborted) throw err;
    }
  }

  private halt(): Promise<void> {
    const { signal } = this.abort;
    if (signal.aborted) return Promise.resolve();
    return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
  }

  private log(msg: string): void {
    this.sink(`[ECU] ${msg}`);
  }
}

/** The TCP listener described by `config`, wired to the ECU through `hooks`. */
export function createDoipServer(config: EcuConfig, hooks: ServerHooks): DoipServer {
  return new DoipServer({
    lifecycle: hooks.lifecycle,
    host: config.host,
    port: config.port,
    vin: config.vin,
    stagingPath: config.stagingPath,
    strictFraming: config.strictFraming,
    maxPayloadLength: config.maxPayloadLength,
    idleTimeoutMs: config.idleTimeoutMs,
    nackOnIntegrityFailure: config.nackOnIntegrityFailure,
    stagingLease: config.stagingLease,
    advertise: config.advertise
      ? { name: `vECU ${config.vin}`, firmwareVersion: hooks.firmwareVersion }
      : undefined,
    onUpdate: hooks.onUpdate,
    log: hooks.log,
  });
}
