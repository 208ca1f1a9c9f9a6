import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { NvramKey, NvramStore, defaultNvram, parseNvram, serializeNvram } from '../nvram.js';
import { silentSink } from '../../util/log.js';

const EMPTY_DIGEST = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('NVRAM', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vecu-nvram-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses KEY=VALUE lines and splits at the first =', () => {
    const data = parseNvram('A=1\nnot a pair\nB=x=y\r\nEMPTY=\n');
    expect([...data.entries()]).toEqual([
      ['A', '1'],
      ['B', 'x=y'],
      ['EMPTY', ''],
    ]);
  });

  it('serializes with sorted keys', () => {
    const data = new Map([
      ['ZETA', '2'],
      ['ALPHA', '1'],
    ]);
    expect(serializeNvram(data)).toBe('ALPHA=1\nZETA=2\n');
  });

  it('has factory defaults', () => {
    const data = defaultNvram();
    expect(data.get(NvramKey.FirmwareVersion)).toBe('1.0.0');
    expect(data.get(NvramKey.SerialNumber)).toBe('VECU-2023-001');
    expect(data.get(NvramKey.GoldenHash)).toBe(EMPTY_DIGEST);
  });

  it('creates and saves defaults when the file is missing', async () => {
    const path = join(dir, 'nvram.dat');
    const store = new NvramStore(path, silentSink);

    expect(await store.load()).toBe(true);
    expect(store.get(NvramKey.FirmwareVersion)).toBe('1.0.0');
    expect(await readFile(path, 'utf-8')).toBe(
      `ECU_SERIAL_NUMBER=VECU-2023-001\nFIRMWARE_HASH_GOLDEN=${EMPTY_DIGEST}\nFIRMWARE_VERSION=1.0.0\n`,
    );
  });

  it('loads an existing file', async () => {
    const path = join(dir, 'nvram.dat');
    await writeFile(path, 'FIRMWARE_VERSION=2.1.0\nFIRMWARE_HASH_GOLDEN=abc\n');
    const store = new NvramStore(path, silentSink);

    expect(await store.load()).toBe(true);
    expect(store.get(NvramKey.FirmwareVersion)).toBe('2.1.0');
    expect(store.get(NvramKey.GoldenHash)).toBe('abc');
    expect(store.get(NvramKey.SerialNumber)).toBeUndefined();
  });

  it('persists changes across instances', async () => {
    const path = join(dir, 'nvram.dat');
    const first = new NvramStore(path, silentSink);
    await first.load();
    first.set(NvramKey.GoldenHash, 'feed');
    expect(await first.save()).toBe(true);

    const second = new NvramStore(path, silentSink);
    await second.load();
    expect(second.get(NvramKey.GoldenHash)).toBe('feed');
    expect(second.entries()).toHaveLength(3);
  });

  it('fails to load when the path is not a readable file', async () => {
    const store = new NvramStore(dir, silentSink);
    expect(await store.load()).toBe(false);
  });

  it('fails to save into a missing directory', async () => {
    const store = new NvramStore(join(dir, 'missing', 'nvram.dat'), silentSink);
    store.set('A', '1');
    expect(await store.save()).toBe(false);
  });
});
