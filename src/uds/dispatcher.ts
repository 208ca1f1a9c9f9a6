import { PayloadType, type Frame } from '../doip/framing.js';
import { EcuState, type EcuLifecycle } from '../ecu/lifecycle.js';
import { errorMessage } from '../errors.js';
import type { FinalizeResult, FirmwareTransfer, StagingLease } from '../firmware/transfer.js';
import {
  DOWNLOAD_LENGTH_FORMAT,
  NegativeResponseCode,
  REQUEST_DOWNLOAD_MIN_LENGTH,
  REQUEST_DOWNLOAD_SIZE_OFFSET,
  ROUTINE_ENTER_PROGRAMMING_SESSION,
  RoutineControlType,
  ServiceId,
  buildNegativeResponse,
  buildPositiveResponse,
  serviceName,
} from './services.js';

export interface Response {
  payloadType: number;
  payload: Buffer;
}

/** A staged image whose digest matched the one the tester supplied. */
export interface VerifiedUpdate {
  stagingPath: string;
  digest: string;
  bytesWritten: number;
  declaredSize: number;
}

export interface DispatchResult {
  response?: Response;
  /** Set when the positive ack must be followed by apply-update. */
  update?: VerifiedUpdate;
}

export interface DispatcherOptions {
  lifecycle: EcuLifecycle;
  transfer: FirmwareTransfer;
  /** ASCII identifier returned in VehicleAnnouncement. */
  vin: string;
  /** Answer an integrity mismatch with `7F 37 72` instead of silence. */
  nackOnIntegrityFailure?: boolean;
  /** Shared between connections when only one may download at a time. */
  lease?: StagingLease;
  log?: (msg: string) => void;
}

type ServiceHandler = (payload: Buffer) => Promise<DispatchResult>;

const NO_RESPONSE: DispatchResult = {};

/**
 * Maps decoded frames to handlers for one connection.
 *
 * Frames without a handler, out-of-sequence services and malformed
 * payloads produce no response and leave all state untouched.
 */
export class CommandDispatcher {
  private readonly services: ReadonlyMap<number, ServiceHandler>;
  private readonly lifecycle: EcuLifecycle;
  private readonly transfer: FirmwareTransfer;
  private readonly vin: string;
  private readonly nack: boolean;
  private readonly lease?: StagingLease;
  private readonly logFn: (msg: string) => void;

  constructor(options: DispatcherOptions) {
    this.lifecycle = options.lifecycle;
    this.transfer = options.transfer;
    this.vin = options.vin;
    this.nack = options.nackOnIntegrityFailure ?? true;
    this.lease = options.lease;
    this.logFn = options.log ?? (() => {});
    this.services = new Map<number, ServiceHandler>([
      [ServiceId.RoutineControl, (p) => this.routineControl(p)],
      [ServiceId.RequestDownload, (p) => this.requestDownload(p)],
      [ServiceId.TransferData, (p) => this.transferData(p)],
      [ServiceId.RequestTransferExit, (p) => this.requestTransferExit(p)],
    ]);
  }

  async dispatch(frame: Pick<Frame, 'payloadType' | 'payload'>): Promise<DispatchResult> {
    switch (frame.payloadType) {
      case PayloadType.VehicleIdRequest:
        return this.identify();
      case PayloadType.Diagnostic:
        return this.diagnostic(frame.payload);
      default:
        this.log('Received unhandled message type. Waiting for next message.');
        return NO_RESPONSE;
    }
  }

  /** Release whatever this connection holds on the staging image. */
  async release(): Promise<void> {
    this.lease?.release(this);
    await this.transfer.abort();
  }

  private identify(): DispatchResult {
    this.log('Responding to Vehicle ID Request...');
    return {
      response: {
        payloadType: PayloadType.VehicleAnnouncement,
        payload: Buffer.from(this.vin, 'ascii'),
      },
    };
  }

  private async diagnostic(payload: Buffer): Promise<DispatchResult> {
    if (payload.length === 0) {
      this.log('Empty diagnostic payload ignored.');
      return NO_RESPONSE;
    }
    const handler = this.services.get(payload[0]);
    if (!handler) {
      this.log(`Unsupported service ${serviceName(payload[0])}.`);
      return NO_RESPONSE;
    }
    try {
      return await handler(payload);
    } catch (err) {
      this.log(`ERROR: ${serviceName(payload[0])} failed: ${errorMessage(err)}`);
      return NO_RESPONSE;
    }
  }

  // [0x31][sub][routine hi][routine lo]
  private async routineControl(payload: Buffer): Promise<DispatchResult> {
    if (payload.length < 4) return this.reject('Routine Control payload too short.');
    if (this.lifecycle.bricked) return this.reject('Routine Control refused: ECU is BRICKED.');

    const subFunction = payload[1];
    const routineId = payload.readUInt16BE(2);
    if (subFunction !== RoutineControlType.StartRoutine || routineId !== ROUTINE_ENTER_PROGRAMMING_SESSION) {
      return this.reject(
        `Routine 0x${routineId.toString(16).padStart(4, '0')} sub-function ${subFunction} not implemented.`,
      );
    }

    this.log('Received command: Enter Programming Session.');
    this.lifecycle.transition(EcuState.UpdatePending);
    return this.diagnosticResponse(buildPositiveResponse(ServiceId.RoutineControl, payload.subarray(1)));
  }

  // [0x34][dfi][alfi][addr x3][size x4]
  private async requestDownload(payload: Buffer): Promise<DispatchResult> {
    if (!this.lifecycle.is(EcuState.UpdatePending)) {
      return this.reject('ERROR: Request Download received outside of update session.');
    }
    if (payload.length < REQUEST_DOWNLOAD_MIN_LENGTH) return this.reject('Request Download payload too short.');
    if (this.lease && !this.lease.acquire(this)) {
      return this.reject('Request Download refused: another connection is downloading.');
    }

    const declaredSize = payload.readUInt32BE(REQUEST_DOWNLOAD_SIZE_OFFSET);
    this.log(`Received Request Download. Firmware size: ${declaredSize} bytes.`);
    try {
      await this.transfer.begin(declaredSize);
    } catch (err) {
      this.lease?.release(this);
      return this.reject(`CRITICAL: could not open ${this.transfer.stagingPath}: ${errorMessage(err)}`);
    }
    this.log(`Opened ${this.transfer.stagingPath} for writing. Ready for data transfer.`);
    return this.diagnosticResponse(buildPositiveResponse(ServiceId.RequestDownload, DOWNLOAD_LENGTH_FORMAT));
  }

  // [0x36][block counter][chunk...]
  private async transferData(payload: Buffer): Promise<DispatchResult> {
    if (!this.lifecycle.is(EcuState.UpdatePending) || !this.transfer.isOpen) {
      return this.reject('ERROR: Transfer Data received in wrong state.');
    }
    if (payload.length < 2) return this.reject('Transfer Data payload too short.');

    const counter = payload[1];
    const chunk = payload.subarray(2);
    const total = await this.transfer.write(chunk);
    this.log(`Wrote ${chunk.length} bytes. Total received: ${total}/${this.transfer.declaredSize}`);
    return this.diagnosticResponse(buildPositiveResponse(ServiceId.TransferData, [counter]));
  }

  // [0x37][hex digest...]
  private async requestTransferExit(payload: Buffer): Promise<DispatchResult> {
    if (!this.lifecycle.is(EcuState.UpdatePending) || !this.transfer.isOpen) {
      return this.reject('ERROR: Transfer Exit received in wrong state.');
    }

    this.log('Finalizing file transfer.');
    const expected = payload.subarray(1).toString('latin1');
    let result: FinalizeResult;
    try {
      result = await this.transfer.finish(expected, { resetOnMismatch: this.nack });
    } catch (err) {
      this.lease?.release(this);
      throw err;
    }

    switch (result.status) {
      case 'unreadable':
        this.lease?.release(this);
        return this.reject(`Failed to hash ${this.transfer.stagingPath}`);
      case 'mismatch':
        this.log(`  -> Expected Hash:   ${result.expected}`);
        this.log(`  -> Calculated Hash: ${result.actual}`);
        this.log('!!! INTEGRITY CHECK FAILED for new firmware !!!');
        if (!this.nack) return NO_RESPONSE;
        this.lease?.release(this);
        return this.diagnosticResponse(
          buildNegativeResponse(ServiceId.RequestTransferExit, NegativeResponseCode.GeneralProgrammingFailure),
        );
      case 'verified':
        this.log(`Integrity check PASSED for new firmware (${result.bytesWritten} bytes).`);
        this.lease?.release(this);
        return {
          response: {
            payloadType: PayloadType.Diagnostic,
            payload: buildPositiveResponse(ServiceId.RequestTransferExit),
          },
          update: {
            stagingPath: this.transfer.stagingPath,
            digest: result.digest,
            bytesWritten: result.bytesWritten,
            declaredSize: result.declaredSize,
          },
        };
    }
  }

  private diagnosticResponse(payload: Buffer): DispatchResult {
    return { response: { payloadType: PayloadType.Diagnostic, payload } };
  }

  private reject(reason: string): DispatchResult {
    this.log(reason);
    return NO_RESPONSE;
  }

  private log(msg: string): void {
    this.logFn(msg);
  }
}
