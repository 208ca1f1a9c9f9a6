#!/usr/bin/env node
import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { DoipClient } from '../client/tester.js';
import { DEFAULT_PORT, loadConfig } from '../config.js';
import { scan } from '../discovery.js';
import { NvramKey, NvramStore } from '../ecu/nvram.js';
import { VirtualEcu, type ExitReason } from '../ecu/virtual-ecu.js';
import { errorMessage } from '../errors.js';
import { hashFile } from '../util/crypto.js';

const EXIT_CODES: Record<ExitReason, number> = {
  shutdown: 0,
  'update-applied': 0,
  bricked: 2,
};

function portFrom(value: string | undefined): number {
  if (value === undefined) return DEFAULT_PORT;
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 0xffff) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

async function cmdServe() {
  const config = loadConfig();
  await mkdir(config.dataDir, { recursive: true });

  const ecu = new VirtualEcu({ config });
  const stop = () => {
    console.error('\nShutting down...');
    ecu.shutdown();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  const reason = await ecu.run();
  process.exit(EXIT_CODES[reason]);
}

async function withClient<T>(host: string, port: number, fn: (client: DoipClient) => Promise<T>): Promise<T> {
  const client = new DoipClient();
  // Requests in flight are rejected with the same error.
  client.on('error', (err: Error) => console.error(`Connection error: ${err.message}`));
  console.log(`Connecting to ${host}:${port}...`);
  await client.connect(host, port);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

async function cmdIdentify(host = '127.0.0.1', port?: string) {
  const vin = await withClient(host, portFrom(port), (client) => client.identify());
  console.log(`VIN: ${vin}`);
}

async function cmdFlash(imagePath: string | undefined, host = '127.0.0.1', port?: string) {
  if (!imagePath) throw new Error('Usage: vecu flash <image> [host] [port]');
  const image = await readFile(imagePath);

  const result = await withClient(host, portFrom(port), (client) =>
    client.flash(image, {
      onProgress: (sent, total) => process.stdout.write(`\r  ${sent}/${total} bytes`),
    }),
  );
  process.stdout.write('\n');
  console.log(`Flashed ${result.bytesSent} bytes in ${result.blocks} blocks (sha256 ${result.digest})`);
}

async function cmdHash(path: string | undefined) {
  if (!path) throw new Error('Usage: vecu hash <file>');
  const digest = await hashFile(path);
  if (digest === null) throw new Error(`Cannot read ${path}`);
  console.log(digest);
}

/** Install `imagePath` as the running firmware and record it as golden. */
async function cmdProvision(imagePath: string | undefined) {
  if (!imagePath) throw new Error('Usage: vecu provision <image>');
  const config = loadConfig();
  await mkdir(config.dataDir, { recursive: true });

  const digest = await hashFile(imagePath);
  if (digest === null) throw new Error(`Cannot read ${imagePath}`);

  const nvram = new NvramStore(config.nvramPath);
  if (!(await nvram.load())) throw new Error(`Cannot load ${config.nvramPath}`);
  await copyFile(imagePath, config.imagePath);
  nvram.set(NvramKey.GoldenHash, digest);
  if (!(await nvram.save())) throw new Error(`Cannot write ${config.nvramPath}`);
  console.log(`Provisioned ${config.imagePath} (sha256 ${digest})`);
  for (const [key, value] of nvram.entries()) {
    console.log(`  ${key}=${value}`);
  }
}

async function cmdScan() {
  console.log('Scanning for ECUs...');
  const ecus = await scan({ timeout: 5000 });
  if (ecus.length === 0) {
    console.log('No ECUs found.');
    return;
  }
  ecus.forEach((ecu, i) => {
    console.log(`  ${i + 1}. ${ecu}`);
  });
}

function fail(err: unknown) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

// Main
const [, , cmd, ...args] = process.argv;

switch (cmd) {
  case 'serve':
    cmdServe().catch(fail);
    break;
  case 'identify':
    cmdIdentify(args[0], args[1]).catch(fail);
    break;
  case 'flash':
    cmdFlash(args[0], args[1], args[2]).catch(fail);
    break;
  case 'hash':
    cmdHash(args[0]).catch(fail);
    break;
  case 'provision':
    cmdProvision(args[0]).catch(fail);
    break;
  case 'scan':
    cmdScan().catch(fail);
    break;
  default:
    console.log('Usage:');
    console.log('  vecu serve                         Run the virtual ECU');
    console.log('  vecu identify [host] [port]        Ask an ECU for its VIN');
    console.log('  vecu flash <image> [host] [port]   Download and install a firmware image');
    console.log('  vecu hash <file>                   Print the SHA-256 of a file');
    console.log('  vecu provision <image>             Install an image and record it as golden');
    console.log('  vecu scan                          Find advertised ECUs on the LAN');
    console.log('');
    console.log('Environment: VECU_DATA_DIR, VECU_HOST, VECU_PORT, VECU_VIN, VECU_TICK_MS,');
    console.log('             VECU_STRICT_FRAMING, VECU_MAX_PAYLOAD, VECU_IDLE_TIMEOUT_MS, VECU_ADVERTISE');
}
