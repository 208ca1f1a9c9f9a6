/**
 * One tester connection.
 *
 * Bytes are buffered until whole frames are available; frames are then
 * handled strictly one at a time: dispatch, write the response, and only
 * then look at the next frame. Reading is paused while a frame is in
 * flight so a fast peer cannot pipeline requests.
 */

import { EventEmitter } from 'node:events';
import type { Duplex } from 'node:stream';
import { encodeFrame, parseFrames, type Frame, type ParseOptions } from '../doip/framing.js';
import { errorMessage } from '../errors.js';
import { Message } from '../message.js';
import type { CommandDispatcher, VerifiedUpdate } from '../uds/dispatcher.js';
import { consoleSink, type LogSink } from '../util/log.js';

export interface SessionOptions {
  id: number;
  dispatcher: CommandDispatcher;
  framing?: ParseOptions;
  /** Destroy the connection after this long without inbound bytes. 0 disables. */
  idleTimeoutMs?: number;
  /**
   * Runs after the positive ack of a verified transfer has been written.
   * Resolves true when the update was applied and the session must stop.
   */
  onUpdate?: (update: VerifiedUpdate) => Promise<boolean>;
  log?: LogSink;
}

export class DoipSession extends EventEmitter {
  readonly id: number;
  private buffer: Buffer = Buffer.alloc(0);
  private queue: Frame[] = [];
  private busy = false;
  private inFlight: Promise<void> = Promise.resolve();
  private closed = false;
  private terminal = false;
  private peerEnded = false;
  private idleTimer?: ReturnType<typeof setTimeout>;
  private readonly sink: LogSink;

  constructor(
    private socket: Duplex,
    private options: SessionOptions,
  ) {
    super();
    this.id = options.id;
    this.sink = options.log ?? consoleSink;
  }

  start(): void {
    this.socket.on('data', (data: Buffer) => this.onData(data));
    this.socket.on('end', () => this.onEnd());
    this.socket.on('error', (err) => {
      this.log(`Transport error: ${err.message}`);
      this.socket.destroy();
    });
    this.socket.on('close', () => {
      this.onClose().catch((err) => this.log(`ERROR releasing session: ${errorMessage(err)}`));
    });
    this.armIdleTimer();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Drop the connection without completing pending writes. */
  close(): void {
    this.socket.destroy();
  }

  private onData(data: Buffer): void {
    if (this.closed || this.terminal) return;
    this.armIdleTimer();
    this.buffer = Buffer.concat([this.buffer, data]);

    try {
      const { frames, remainder } = parseFrames(this.buffer, this.options.framing);
      this.buffer = remainder;
      this.queue.push(...frames);
    } catch (err) {
      this.log(`Framing error: ${errorMessage(err)}. Closing connection.`);
      this.close();
      return;
    }
    this.pump();
  }

  private onEnd(): void {
    this.peerEnded = true;
    if (!this.busy) this.close();
  }

  private pump(): void {
    if (this.busy || this.queue.length === 0) return;
    this.busy = true;
    this.socket.pause();
    this.inFlight = this.drain()
      .catch((err) => {
        this.log(`Error on write: ${errorMessage(err)}`);
        this.close();
      })
      .finally(() => {
        this.busy = false;
        if (this.closed || this.terminal) return;
        if (this.peerEnded) {
          this.close();
          return;
        }
        this.socket.resume();
      });
  }

  private async drain(): Promise<void> {
    while (!this.closed && !this.terminal) {
      const frame = this.queue.shift();
      if (!frame) return;

      this.log(`Received ${new Message(frame)}`);
      const { response, update } = await this.options.dispatcher.dispatch(frame);
      if (this.closed) return;

      if (response) {
        await this.write(encodeFrame(response.payloadType, response.payload));
        this.log(`Sent ${new Message(response)}`);
      }
      if (update && this.options.onUpdate) {
        if (await this.options.onUpdate(update)) {
          this.terminal = true;
          this.queue = [];
          this.emit('update-applied', update);
        }
      }
    }
  }

  private write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  private armIdleTimer(): void {
    const timeout = this.options.idleTimeoutMs ?? 0;
    if (timeout <= 0) return;
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = setTimeout(() => {
      this.log(`Idle for ${timeout} ms. Closing connection.`);
      this.close();
    }, timeout);
  }

  private async onClose(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.queue = [];
    this.log('Connection closed.');
    await this.inFlight;
    await this.options.dispatcher.release();
    this.emit('close');
  }

  private log(msg: string): void {
    this.sink(`[SESSION #${this.id}] ${msg}`);
  }
}
