import { open, type FileHandle } from 'node:fs/promises';
import { TransferError } from '../errors.js';
import { verifyImage } from './integrity.js';

export enum TransferState {
  Idle = 'idle',
  Downloading = 'downloading',
  Finalizing = 'finalizing',
}

export type FinalizeResult =
  | { status: 'verified'; digest: string; bytesWritten: number; declaredSize: number }
  | { status: 'mismatch'; expected: string; actual: string }
  | { status: 'unreadable' };

export interface FinalizeOptions {
  /** Return to Idle after a digest mismatch. When false the transfer stays Downloading with its file closed. */
  resetOnMismatch?: boolean;
}

/**
 * Firmware download owned by a single connection.
 *
 * Idle -> Downloading (begin) -> Finalizing (finish) -> Idle.
 * The staging file handle is exclusive to this object; nothing else
 * writes through it.
 */
export class FirmwareTransfer {
  private current = TransferState.Idle;
  private handle?: FileHandle;
  private declared = 0;
  private written = 0;

  constructor(readonly stagingPath: string) {}

  get state(): TransferState {
    return this.current;
  }

  get declaredSize(): number {
    return this.declared;
  }

  get bytesWritten(): number {
    return this.written;
  }

  /** Downloading with the staging file open for writing. */
  get isOpen(): boolean {
    return this.current === TransferState.Downloading && this.handle !== undefined;
  }

  /**
   * Open a fresh staging image, truncating anything staged before.
   * A download already open on this transfer is closed and overwritten.
   */
  async begin(declaredSize: number): Promise<void> {
    // A failed open leaves the transfer Idle.
    await this.closeHandle();
    this.current = TransferState.Idle;
    const handle = await open(this.stagingPath, 'w');
    this.handle = handle;
    this.declared = declaredSize;
    this.written = 0;
    this.current = TransferState.Downloading;
  }

  async write(chunk: Buffer): Promise<number> {
    if (!this.isOpen || !this.handle) {
      throw new TransferError(`Cannot write in state ${this.current}`);
    }
    const { bytesWritten } = await this.handle.write(chunk);
    this.written += bytesWritten;
    return this.written;
  }

  /** Close the staging image and compare its digest against `expected`. */
  async finish(expected: string, options: FinalizeOptions = {}): Promise<FinalizeResult> {
    if (!this.isOpen) {
      throw new TransferError(`Cannot finish in state ${this.current}`);
    }
    this.current = TransferState.Finalizing;
    try {
      await this.closeHandle();
    } catch (err) {
      this.current = TransferState.Idle;
      throw err;
    }

    const result = await verifyImage(this.stagingPath, expected);
    if (result.actual === null) {
      this.current = TransferState.Idle;
      return { status: 'unreadable' };
    }
    if (!result.ok) {
      this.current = options.resetOnMismatch === false ? TransferState.Downloading : TransferState.Idle;
      return { status: 'mismatch', expected, actual: result.actual };
    }
    this.current = TransferState.Idle;
    return {
      status: 'verified',
      digest: result.actual,
      bytesWritten: this.written,
      declaredSize: this.declared,
    };
  }

  /** Close any open staging file and return to Idle. The file is kept. */
  async abort(): Promise<void> {
    await this.closeHandle();
    this.current = TransferState.Idle;
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }
}

/**
 * Grants one connection at a time the right to download into the shared
 * staging target.
 */
export class StagingLease {
  private owner?: object;

  acquire(owner: object): boolean {
    if (this.owner !== undefined && this.owner !== owner) return false;
    this.owner = owner;
    return true;
  }

  release(owner: object): void {
    if (this.owner === owner) this.owner = undefined;
  }

  get held(): boolean {
    return this.owner !== undefined;
  }
}
