import { readFile, writeFile } from 'node:fs/promises';
import { errorMessage } from '../errors.js';
import { sha256Hex } from '../util/crypto.js';
import { consoleSink, type LogSink } from '../util/log.js';

export const NvramKey = {
  FirmwareVersion: 'FIRMWARE_VERSION',
  SerialNumber: 'ECU_SERIAL_NUMBER',
  GoldenHash: 'FIRMWARE_HASH_GOLDEN',
} as const;

/** Key-value store consumed by the boot sequence and the update path. */
export interface ConfigStore {
  load(): Promise<boolean>;
  save(): Promise<boolean>;
  get(key: string): string | undefined;
  set(key: string, value: string): void;
}

export function defaultNvram(): Map<string, string> {
  return new Map<string, string>([
    [NvramKey.FirmwareVersion, '1.0.0'],
    [NvramKey.SerialNumber, 'VECU-2023-001'],
    // digest of an empty image
    [NvramKey.GoldenHash, sha256Hex(Buffer.alloc(0))],
  ]);
}

/** Parse newline-separated KEY=VALUE text. Lines without '=' are skipped. */
export function parseNvram(text: string): Map<string, string> {
  const data = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const idx = line.indexOf('=');
    if (idx < 0) continue;
    data.set(line.substring(0, idx), line.substring(idx + 1));
  }
  return data;
}

export function serializeNvram(data: Map<string, string>): string {
  const keys = [...data.keys()].sort();
  return keys.map((k) => `${k}=${data.get(k) ?? ''}\n`).join('');
}

/**
 * Simulated non-volatile memory backed by a plain text file.
 * A missing file is replaced by the factory defaults on load.
 */
export class NvramStore implements ConfigStore {
  private data = new Map<string, string>();

  constructor(
    readonly path: string,
    private sink: LogSink = consoleSink,
  ) {}

  async load(): Promise<boolean> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        this.log('No existing NVRAM file found. Creating default.');
        this.data = defaultNvram();
        return this.save();
      }
      this.log(`ERROR: could not read ${this.path}: ${errorMessage(err)}`);
      return false;
    }
    this.data = parseNvram(text);
    this.log(`Loaded ${this.data.size} entries from ${this.path}`);
    return true;
  }

  async save(): Promise<boolean> {
    try {
      await writeFile(this.path, serializeNvram(this.data), 'utf-8');
    } catch (err) {
      this.log(`ERROR: could not write ${this.path}: ${errorMessage(err)}`);
      return false;
    }
    this.log(`Data saved to ${this.path}`);
    return true;
  }

  get(key: string): string | undefined {
    return this.data.get(key);
  }

  set(key: string, value: string): void {
    this.data.set(key, value);
  }

  entries(): Array<[string, string]> {
    return [...this.data.entries()];
  }

  private log(msg: string): void {
    this.sink(`[NVRAM] ${msg}`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
