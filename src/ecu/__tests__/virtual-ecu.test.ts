import { EventEmitter } from 'node:events';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { VirtualEcu, type ServerHooks } from '../virtual-ecu.js';
import { EcuState } from '../lifecycle.js';
import { NvramKey, type ConfigStore } from '../nvram.js';
import { loadConfig, type EcuConfig } from '../../config.js';
import type { EcuServer } from '../../server/server.js';
import { PayloadType } from '../../doip/framing.js';
import { FirmwareTransfer } from '../../firmware/transfer.js';
import { CommandDispatcher, type VerifiedUpdate } from '../../uds/dispatcher.js';
import { sha256Hex } from '../../util/crypto.js';
import { silentSink } from '../../util/log.js';

class FakeServer extends EventEmitter implements EcuServer {
  listen = vi.fn(async () => {});
  close = vi.fn(async () => {});
}

function waitForState(ecu: VirtualEcu, state: EcuState): Promise<void> {
  return new Promise((resolve) => {
    ecu.on('stateChange', (to: EcuState) => {
      if (to === state) resolve();
    });
  });
}

describe('VirtualEcu', () => {
  let dir: string;
  let config: EcuConfig;
  let server: FakeServer;
  let hooks: ServerHooks | undefined;

  function makeEcu(nvram?: ConfigStore): VirtualEcu {
    return new VirtualEcu({
      config,
      nvram,
      log: silentSink,
      createServer: (_config, serverHooks) => {
        hooks = serverHooks;
        return server;
      },
    });
  }

  async function provision(image: string, golden = sha256Hex(image)): Promise<void> {
    await writeFile(config.imagePath, image);
    await writeFile(config.nvramPath, `FIRMWARE_VERSION=1.0.0\nFIRMWARE_HASH_GOLDEN=${golden}\n`);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vecu-ecu-'));
    config = loadConfig({ dataDir: dir, tickMs: 5, bootStepMs: 0 }, {});
    server = new FakeServer();
    hooks = undefined;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('secure boot', () => {
    it('enters APPLICATION when the image matches the golden hash', async () => {
      await provision('application image');
      expect(await makeEcu().boot()).toBe(EcuState.Application);
    });

    it('passes a first boot of an empty image against factory defaults', async () => {
      await writeFile(config.imagePath, '');
      expect(await makeEcu().boot()).toBe(EcuState.Application);
      expect(await readFile(config.nvramPath, 'utf-8')).toContain(`FIRMWARE_HASH_GOLDEN=${sha256Hex('')}`);
    });

    it('bricks when the image was tampered with', async () => {
      await provision('tampered image', sha256Hex('application image'));
      expect(await makeEcu().boot()).toBe(EcuState.Bricked);
    });

    it('bricks when the image is missing', async () => {
      await writeFile(config.nvramPath, `FIRMWARE_HASH_GOLDEN=${sha256Hex('')}\n`);
      expect(await makeEcu().boot()).toBe(EcuState.Bricked);
    });

    it('bricks when the golden hash is absent', async () => {
      await writeFile(config.imagePath, '');
      await writeFile(config.nvramPath, 'FIRMWARE_VERSION=1.0.0\n');
      expect(await makeEcu().boot()).toBe(EcuState.Bricked);
    });

    it('keeps a programming session entered while booting', async () => {
      await provision('application image');
      config = loadConfig({ dataDir: dir, tickMs: 5, bootStepMs: 30 }, {});
      const ecu = makeEcu();
      const transfer = new FirmwareTransfer(config.stagingPath);
      const dispatcher = new CommandDispatcher({ lifecycle: ecu.lifecycle, transfer, vin: config.vin });

      const booting = ecu.boot();
      const ack = await dispatcher.dispatch({
        payloadType: PayloadType.Diagnostic,
        payload: Buffer.from([0x31, 0x01, 0xff, 0x00]),
      });
      expect(ack.response?.payload.toString('hex')).toBe('7101ff00');
      expect(ecu.state).toBe(EcuState.UpdatePending);

      expect(await booting).toBe(EcuState.UpdatePending);
      expect(ecu.state).toBe(EcuState.UpdatePending);

      const download = Buffer.alloc(10);
      download[0] = 0x34;
      download.writeUInt32BE(4, 6);
      const accepted = await dispatcher.dispatch({ payloadType: PayloadType.Diagnostic, payload: download });
      expect(accepted.response?.payload.toString('hex')).toBe('74201000');
      await transfer.abort();
    });

    it('still bricks when a programming session was entered while booting', async () => {
      await provision('tampered image', sha256Hex('application image'));
      config = loadConfig({ dataDir: dir, tickMs: 5, bootStepMs: 30 }, {});
      const ecu = makeEcu();

      const booting = ecu.boot();
      ecu.lifecycle.transition(EcuState.UpdatePending);

      expect(await booting).toBe(EcuState.Bricked);
    });

    it('bricks when NVRAM cannot be loaded', async () => {
      const nvram: ConfigStore = {
        load: async () => false,
        save: async () => true,
        get: () => undefined,
        set: () => {},
      };
      expect(await makeEcu(nvram).boot()).toBe(EcuState.Bricked);
    });
  });

  describe('main loop', () => {
    it('starts the listener and stops on shutdown', async () => {
      await provision('application image');
      const ecu = makeEcu();
      const running = waitForState(ecu, EcuState.Application);

      const result = ecu.run();
      await running;
      ecu.shutdown();

      expect(await result).toBe('shutdown');
      expect(server.listen).toHaveBeenCalledTimes(1);
      expect(server.close).toHaveBeenCalledTimes(1);
    });

    it('halts once bricked until shut down', async () => {
      await provision('tampered image', sha256Hex('application image'));
      const ecu = makeEcu();
      const bricked = waitForState(ecu, EcuState.Bricked);
      let settled = false;

      const result = ecu.run().then((reason) => {
        settled = true;
        return reason;
      });
      await bricked;
      await delay(20);
      expect(settled).toBe(false);
      expect(server.close).not.toHaveBeenCalled();

      ecu.shutdown();
      expect(await result).toBe('bricked');
      expect(ecu.state).toBe(EcuState.Bricked);
    });

    it('exits after the server reports an applied update', async () => {
      await provision('application image');
      const ecu = makeEcu();
      const applied = vi.fn();
      ecu.on('update-applied', applied);
      const running = waitForState(ecu, EcuState.Application);

      const result = ecu.run();
      await running;
      const update: VerifiedUpdate = { stagingPath: config.stagingPath, digest: 'd', bytesWritten: 1, declaredSize: 1 };
      server.emit('update-applied', update);

      expect(await result).toBe('update-applied');
      expect(applied).toHaveBeenCalledWith(update);
    });

    it('keeps ticking while an update is pending', async () => {
      await provision('application image');
      const ecu = makeEcu();
      const running = waitForState(ecu, EcuState.Application);

      const result = ecu.run();
      await running;
      ecu.lifecycle.transition(EcuState.UpdatePending);
      await delay(20);
      expect(ecu.state).toBe(EcuState.UpdatePending);

      ecu.shutdown();
      expect(await result).toBe('shutdown');
    });
  });

  describe('installing an update', () => {
    it('replaces the image and records its digest as golden', async () => {
      await provision('application image');
      const ecu = makeEcu();
      await ecu.nvram.load();
      await writeFile(config.stagingPath, 'new image');

      const update = {
        stagingPath: config.stagingPath,
        digest: sha256Hex('new image'),
        bytesWritten: 9,
        declaredSize: 9,
      };
      expect(await hooks?.onUpdate(update)).toBe(true);

      expect(await readFile(config.imagePath, 'utf-8')).toBe('new image');
      expect(ecu.nvram.get(NvramKey.GoldenHash)).toBe(sha256Hex('new image'));
      expect(await readFile(config.nvramPath, 'utf-8')).toContain(`FIRMWARE_HASH_GOLDEN=${sha256Hex('new image')}`);
    });

    it('boots the new image after an update', async () => {
      await provision('application image');
      const first = makeEcu();
      await first.nvram.load();
      await writeFile(config.stagingPath, 'new image');
      await first.installUpdate({
        stagingPath: config.stagingPath,
        digest: sha256Hex('new image'),
        bytesWritten: 9,
        declaredSize: 9,
      });

      expect(await makeEcu().boot()).toBe(EcuState.Application);
    });

    it('keeps the old image when the staged file is gone', async () => {
      await provision('application image');
      const ecu = makeEcu();
      await ecu.nvram.load();

      const ok = await ecu.installUpdate({
        stagingPath: join(dir, 'missing.bin'),
        digest: sha256Hex('x'),
        bytesWritten: 1,
        declaredSize: 1,
      });

      expect(ok).toBe(false);
      expect(await readFile(config.imagePath, 'utf-8')).toBe('application image');
      expect(ecu.nvram.get(NvramKey.GoldenHash)).toBe(sha256Hex('application image'));
    });
  });

  it('hands the lifecycle to the server', () => {
    const ecu = makeEcu();
    expect(hooks?.lifecycle).toBe(ecu.lifecycle);
  });
});
