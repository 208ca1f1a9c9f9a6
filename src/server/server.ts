import { EventEmitter } from 'node:events';
import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import type { ParseOptions } from '../doip/framing.js';
import type { EcuLifecycle, EcuState } from '../ecu/lifecycle.js';
import { errorMessage } from '../errors.js';
import { FirmwareTransfer, StagingLease } from '../firmware/transfer.js';
import { CommandDispatcher, type VerifiedUpdate } from '../uds/dispatcher.js';
import { consoleSink, type LogSink } from '../util/log.js';
import { advertise, type Advertisement } from '../discovery.js';
import { DoipSession } from './session.js';

/** What the main control loop needs from the network side. */
export interface EcuServer {
  listen(): Promise<void>;
  close(): Promise<void>;
  on(event: 'update-applied', listener: (update: VerifiedUpdate) => void): this;
}

export interface DoipServerOptions {
  lifecycle: EcuLifecycle;
  host: string;
  port: number;
  vin: string;
  stagingPath: string;
  strictFraming?: boolean;
  maxPayloadLength?: number;
  idleTimeoutMs?: number;
  nackOnIntegrityFailure?: boolean;
  /** Allow only one connection at a time to download into the staging image. */
  stagingLease?: boolean;
  /**
   * Publish the listener over mDNS once it is bound. The TXT record is
   * republished on every lifecycle change, reading the firmware version
   * afresh each time.
   */
  advertise?: { name: string; firmwareVersion?: () => string | undefined };
  /** Applies a verified image. Resolves true when the ECU is going down for restart. */
  onUpdate?: (update: VerifiedUpdate) => Promise<boolean>;
  log?: LogSink;
}

/**
 * TCP listener that hands each accepted connection to a new session.
 *
 * Emits `session` for every new session and `update-applied` once an
 * update has been applied, after which it stops accepting connections.
 */
export class DoipServer extends EventEmitter implements EcuServer {
  private server?: Server;
  private sessions = new Set<DoipSession>();
  private nextId = 1;
  private readonly lease?: StagingLease;
  private readonly sink: LogSink;
  private advertisement?: Advertisement;
  private readonly onStateChange = (state: EcuState): void => {
    this.advertisement?.update({
      state,
      firmwareVersion: this.options.advertise?.firmwareVersion?.(),
    });
  };

  constructor(private options: DoipServerOptions) {
    super();
    this.sink = options.log ?? consoleSink;
    if (options.stagingLease) this.lease = new StagingLease();
  }

  async listen(): Promise<void> {
    const server = createServer((socket: Socket) => this.accept(socket));
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (err) => this.log(`Server error: ${err.message}`));

    const { port } = this.address() ?? { port: this.options.port };
    this.log(`Server listening on ${this.options.host}:${port}`);

    if (this.options.advertise) {
      this.advertisement = advertise({
        name: this.options.advertise.name,
        port,
        vin: this.options.vin,
        firmwareVersion: this.options.advertise.firmwareVersion?.(),
        state: this.options.lifecycle.state,
      });
      this.options.lifecycle.on('stateChange', this.onStateChange);
    }
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Run a session over an already connected stream. The listener uses this
   * for every accepted socket.
   */
  accept(socket: Duplex): DoipSession {
    const id = this.nextId++;
    const session = new DoipSession(socket, {
      id,
      dispatcher: new CommandDispatcher({
        lifecycle: this.options.lifecycle,
        transfer: new FirmwareTransfer(this.options.stagingPath),
        vin: this.options.vin,
        nackOnIntegrityFailure: this.options.nackOnIntegrityFailure,
        lease: this.lease,
        log: (msg) => this.sink(`[SESSION #${id}] ${msg}`),
      }),
      framing: this.framing(),
      idleTimeoutMs: this.options.idleTimeoutMs,
      onUpdate: this.options.onUpdate,
      log: this.sink,
    });

    this.sessions.add(session);
    session.on('close', () => this.sessions.delete(session));
    session.on('update-applied', (update: VerifiedUpdate) => {
      this.log('Update applied. Stopping network I/O.');
      this.emit('update-applied', update);
      this.close().catch((err) => this.log(`Error while stopping: ${errorMessage(err)}`));
    });

    this.log(`Accepted connection #${id}`);
    session.start();
    this.emit('session', session);
    return session;
  }

  /** Stop accepting and drop every open session. */
  async close(): Promise<void> {
    for (const session of this.sessions) {
      session.close();
    }
    this.options.lifecycle.off('stateChange', this.onStateChange);
    await this.advertisement?.stop();
    this.advertisement = undefined;

    const server = this.server;
    this.server = undefined;
    if (!server?.listening) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    this.log('Server has stopped.');
  }

  private framing(): ParseOptions {
    return {
      strict: this.options.strictFraming,
      maxPayloadLength: this.options.maxPayloadLength,
    };
  }

  private log(msg: string): void {
    this.sink(`[DoIP] ${msg}`);
  }
}
