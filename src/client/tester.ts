/**
 * Tester side of the diagnostics link.
 * Connects to an ECU over TCP (or any connected stream), sends one
 * request at a time and waits for the matching reply.
 */

import { EventEmitter } from 'node:events';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { PayloadType, encodeFrame, parseFrames, type Frame } from '../doip/framing.js';
import {
  NEGATIVE_RESPONSE,
  ROUTINE_ENTER_PROGRAMMING_SESSION,
  RoutineControlType,
  ServiceId,
  describeNegativeResponse,
  positiveResponseId,
} from '../uds/services.js';
import { sha256Hex } from '../util/crypto.js';

export interface DoipClientOptions {
  /** How long to wait for each reply. */
  timeoutMs?: number;
}

export interface FlashOptions {
  /** Bytes of image per TransferData request. */
  chunkSize?: number;
  onProgress?: (sent: number, total: number) => void;
}

export interface FlashResult {
  digest: string;
  bytesSent: number;
  blocks: number;
}

type FrameMatcher = (frame: Frame) => boolean;

const DEFAULT_CHUNK_SIZE = 4096;

export class DoipClient extends EventEmitter {
  private stream: Duplex | undefined;
  private buffer: Buffer = Buffer.alloc(0);
  private readonly timeoutMs: number;
  private pendingFrameResolvers: Array<{
    match: FrameMatcher;
    resolve: (frame: Frame) => void;
    reject: (error: Error) => void;
  }> = [];

  constructor(options: DoipClientOptions = {}) {
    super();
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  /** Wrap an already connected stream. */
  static fromStream(stream: Duplex, options: DoipClientOptions = {}): DoipClient {
    const client = new DoipClient(options);
    client.attach(stream);
    return client;
  }

  connect(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();
      socket.once('error', reject);
      socket.connect(port, host, () => {
        socket.off('error', reject);
        this.attach(socket);
        resolve();
      });
    });
  }

  get connected(): boolean {
    return this.stream !== undefined;
  }

  /** Ask for the vehicle identifier. */
  async identify(): Promise<string> {
    const frame = await this.request(
      PayloadType.VehicleIdRequest,
      Buffer.alloc(0),
      (f) => f.payloadType === PayloadType.VehicleAnnouncement,
    );
    return frame.payload.toString('ascii');
  }

  async enterProgrammingSession(): Promise<Buffer> {
    const request = Buffer.alloc(4);
    request[0] = ServiceId.RoutineControl;
    request[1] = RoutineControlType.StartRoutine;
    request.writeUInt16BE(ROUTINE_ENTER_PROGRAMMING_SESSION, 2);
    return this.diagnostic(request);
  }

  /** Announce an image of `size` bytes. The address bytes are sent as zero. */
  async requestDownload(size: number): Promise<Buffer> {
    const request = Buffer.alloc(10);
    request[0] = ServiceId.RequestDownload;
    request[1] = 0x00; // no compression or encryption
    request[2] = 0x43; // 4-byte size, 3-byte address
    request.writeUInt32BE(size, 6);
    return this.diagnostic(request);
  }

  async transferData(counter: number, chunk: Buffer): Promise<Buffer> {
    const request = Buffer.concat([Buffer.from([ServiceId.TransferData, counter & 0xff]), chunk]);
    const response = await this.diagnostic(request);
    if (response[1] !== (counter & 0xff)) {
      throw new Error(`TransferData: expected counter ${counter & 0xff}, got ${response[1]}`);
    }
    return response;
  }

  async requestTransferExit(digest: string): Promise<Buffer> {
    return this.diagnostic(Buffer.concat([Buffer.from([ServiceId.RequestTransferExit]), Buffer.from(digest, 'latin1')]));
  }

  /**
   * Run the whole update sequence for `image`: enter the programming
   * session, download it in chunks and finish with its SHA-256 digest.
   */
  async flash(image: Buffer, options: FlashOptions = {}): Promise<FlashResult> {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (chunkSize <= 0) throw new Error(`chunkSize must be positive, got ${chunkSize}`);

    const digest = sha256Hex(image);
    await this.enterProgrammingSession();
    await this.requestDownload(image.length);

    let counter = 1;
    let blocks = 0;
    for (let offset = 0; offset < image.length; offset += chunkSize) {
      const chunk = image.subarray(offset, offset + chunkSize);
      await this.transferData(counter, chunk);
      counter = (counter + 1) & 0xff;
      blocks++;
      options.onProgress?.(offset + chunk.length, image.length);
    }

    await this.requestTransferExit(digest);
    return { digest, bytesSent: image.length, blocks };
  }

  close(): void {
    this.rejectPending(new Error('Connection closed'));
    this.stream?.destroy();
    this.stream = undefined;
  }

  private attach(stream: Duplex): void {
    this.stream = stream;
    stream.on('data', (data: Buffer) => this.onData(data));
    stream.on('error', (err) => {
      this.rejectPending(err);
      this.emit('error', err);
    });
    stream.on('close', () => {
      this.stream = undefined;
      this.rejectPending(new Error('Connection closed'));
      this.emit('close');
    });
  }

  /**
   * Send a diagnostic request and wait for either its positive response
   * or a negative response naming the same service.
   */
  private async diagnostic(request: Buffer): Promise<Buffer> {
    const service = request[0];
    const frame = await this.request(PayloadType.Diagnostic, request, (f) => {
      if (f.payloadType !== PayloadType.Diagnostic || f.payload.length === 0) return false;
      if (f.payload[0] === positiveResponseId(service)) return true;
      return f.payload[0] === NEGATIVE_RESPONSE && f.payload[1] === service;
    });
    if (frame.payload[0] === NEGATIVE_RESPONSE) {
      throw new Error(describeNegativeResponse(frame.payload));
    }
    return frame.payload;
  }

  private request(type: PayloadType, payload: Buffer, match: FrameMatcher): Promise<Frame> {
    if (!this.stream) {
      return Promise.reject(new Error('Not connected'));
    }
    const reply = this.waitForFrame(match, `0x${type.toString(16).padStart(4, '0')}`);
    this.stream.write(encodeFrame(type, payload));
    return reply;
  }

  private waitForFrame(match: FrameMatcher, label: string): Promise<Frame> {
    return new Promise((resolve, reject) => {
      const entry = {
        match,
        resolve: (frame: Frame): void => {
          clearTimeout(timer);
          resolve(frame);
        },
        reject: (err: Error): void => {
          clearTimeout(timer);
          reject(err);
        },
      };

      const timer = setTimeout(() => {
        const idx = this.pendingFrameResolvers.indexOf(entry);
        if (idx >= 0) this.pendingFrameResolvers.splice(idx, 1);
        reject(new Error(`Timeout waiting for reply to ${label}`));
      }, this.timeoutMs);

      this.pendingFrameResolvers.push(entry);
    });
  }

  private onData(data: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, data]);
    const { frames, remainder } = parseFrames(this.buffer);
    this.buffer = remainder;

    for (const frame of frames) {
      const idx = this.pendingFrameResolvers.findIndex((r) => r.match(frame));
      if (idx >= 0) {
        const [resolver] = this.pendingFrameResolvers.splice(idx, 1);
        resolver.resolve(frame);
      } else {
        this.emit('frame', frame);
      }
    }
  }

  private rejectPending(err: Error): void {
    const pending = this.pendingFrameResolvers;
    this.pendingFrameResolvers = [];
    for (const entry of pending) entry.reject(err);
  }
}
