/**
 * Diagnostics-over-IP frame codec.
 * Frame format: 1-byte version + 1-byte inverse version + 2-byte BE payload type
 * + 4-byte BE payload length + payload
 */

import { FramingError } from '../errors.js';

export enum PayloadType {
  VehicleIdRequest = 0x0004,
  VehicleAnnouncement = 0x0005,
  Diagnostic = 0x8001,
  DiagnosticError = 0x8002,
}

export const PROTOCOL_VERSION = 0x02;
export const HEADER_SIZE = 8;

export interface FrameHeader {
  protocolVersion: number;
  inverseProtocolVersion: number;
  /** Raw 16-bit code; may be outside {@link PayloadType}. */
  payloadType: number;
  payloadLength: number;
}

export interface Frame {
  protocolVersion: number;
  inverseProtocolVersion: number;
  payloadType: number;
  payload: Buffer;
}

export interface ParseOptions {
  /** Reject headers whose inverse byte is not the complement of the version. */
  strict?: boolean;
  /** Reject headers that declare more payload than this. Unbounded when unset. */
  maxPayloadLength?: number;
}

export function encodeFrame(type: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  const header = Buffer.alloc(HEADER_SIZE);
  header[0] = PROTOCOL_VERSION;
  header[1] = ~PROTOCOL_VERSION & 0xff;
  header.writeUInt16BE(type, 2);
  header.writeUInt32BE(payload.length, 4);
  return Buffer.concat([header, payload]);
}

export function decodeHeader(buf: Buffer, offset = 0): FrameHeader {
  if (buf.length - offset < HEADER_SIZE) {
    throw new FramingError(`Header needs ${HEADER_SIZE} bytes, got ${buf.length - offset}`);
  }
  return {
    protocolVersion: buf[offset],
    inverseProtocolVersion: buf[offset + 1],
    payloadType: buf.readUInt16BE(offset + 2),
    payloadLength: buf.readUInt32BE(offset + 4),
  };
}

export function isValidHeader(header: FrameHeader): boolean {
  return header.inverseProtocolVersion === (~header.protocolVersion & 0xff);
}

function checkHeader(header: FrameHeader, options: ParseOptions): void {
  if (options.strict && !isValidHeader(header)) {
    throw new FramingError(
      `Inverse protocol version 0x${hex8(header.inverseProtocolVersion)} does not match version 0x${hex8(header.protocolVersion)}`,
    );
  }
  if (options.maxPayloadLength !== undefined && header.payloadLength > options.maxPayloadLength) {
    throw new FramingError(
      `Declared payload length ${header.payloadLength} exceeds limit ${options.maxPayloadLength}`,
    );
  }
}

/**
 * Extract every complete frame from an accumulated stream buffer.
 * Bytes belonging to an incomplete frame are returned as the remainder.
 */
export function parseFrames(
  buffer: Buffer,
  options: ParseOptions = {},
): { frames: Frame[]; remainder: Buffer } {
  const frames: Frame[] = [];
  let offset = 0;

  while (offset + HEADER_SIZE <= buffer.length) {
    const header = decodeHeader(buffer, offset);
    checkHeader(header, options);

    const end = offset + HEADER_SIZE + header.payloadLength;
    if (end > buffer.length) {
      break; // incomplete frame
    }

    frames.push({
      protocolVersion: header.protocolVersion,
      inverseProtocolVersion: header.inverseProtocolVersion,
      payloadType: header.payloadType,
      payload: Buffer.from(buffer.subarray(offset + HEADER_SIZE, end)),
    });
    offset = end;
  }

  return { frames, remainder: Buffer.from(buffer.subarray(offset)) };
}

export function payloadTypeName(type: number): string {
  return PayloadType[type] ?? `Unknown(0x${type.toString(16).padStart(4, '0')})`;
}

function hex8(value: number): string {
  return value.toString(16).padStart(2, '0').toUpperCase();
}
