import { PayloadType, payloadTypeName, type Frame } from './doip/framing.js';
import { NEGATIVE_RESPONSE, POSITIVE_RESPONSE_OFFSET, ServiceId, serviceName } from './uds/services.js';

export { PayloadType };

/** Read-only view of a frame used for logging and inspection. */
export class Message {
  readonly payloadType: number;
  readonly payload: Buffer;
  /** First payload byte of a Diagnostic frame. */
  readonly serviceId?: number;

  constructor(frame: Pick<Frame, 'payloadType' | 'payload'>) {
    this.payloadType = frame.payloadType;
    this.payload = frame.payload;
    if (frame.payloadType === PayloadType.Diagnostic && frame.payload.length > 0) {
      this.serviceId = frame.payload[0];
    }
  }

  get isDiagnostic(): boolean {
    return this.payloadType === PayloadType.Diagnostic;
  }

  toString(): string {
    const typeName = payloadTypeName(this.payloadType);
    if (this.serviceId === undefined) {
      return `Message(${typeName}, ${this.payload.length} bytes)`;
    }
    return `Message(${typeName}, ${describeService(this.serviceId)}, ${this.payload.length} bytes)`;
  }
}

function describeService(sid: number): string {
  if (sid === NEGATIVE_RESPONSE) return 'NegativeResponse';
  const request = sid - POSITIVE_RESPONSE_OFFSET;
  if (ServiceId[request] !== undefined) return `${ServiceId[request]}Response`;
  return serviceName(sid);
}
