/**
 * Diagnostic service identifiers and response helpers carried inside
 * Diagnostic (0x8001) frames.
 */

export enum ServiceId {
  RoutineControl = 0x31,
  RequestDownload = 0x34,
  TransferData = 0x36,
  RequestTransferExit = 0x37,
}

export const POSITIVE_RESPONSE_OFFSET = 0x40;
export const NEGATIVE_RESPONSE = 0x7f;

export enum RoutineControlType {
  StartRoutine = 0x01,
  StopRoutine = 0x02,
  RequestRoutineResults = 0x03,
}

export const ROUTINE_ENTER_PROGRAMMING_SESSION = 0xff00;

/** Length format 0x20 followed by a 0x1000 byte max block length. */
export const DOWNLOAD_LENGTH_FORMAT = Buffer.from([0x20, 0x10, 0x00]);

export const REQUEST_DOWNLOAD_MIN_LENGTH = 10;
export const REQUEST_DOWNLOAD_SIZE_OFFSET = 6;

export enum NegativeResponseCode {
  GeneralReject = 0x10,
  ServiceNotSupported = 0x11,
  SubFunctionNotSupported = 0x12,
  IncorrectMessageLength = 0x13,
  ConditionsNotCorrect = 0x22,
  RequestSequenceError = 0x24,
  RequestOutOfRange = 0x31,
  UploadDownloadNotAccepted = 0x70,
  TransferDataSuspended = 0x71,
  GeneralProgrammingFailure = 0x72,
  WrongBlockSequenceCounter = 0x73,
}

const NRC_MESSAGES: Record<number, string> = {
  [NegativeResponseCode.GeneralReject]: 'General reject',
  [NegativeResponseCode.ServiceNotSupported]: 'Service not supported',
  [NegativeResponseCode.SubFunctionNotSupported]: 'Sub-function not supported',
  [NegativeResponseCode.IncorrectMessageLength]: 'Incorrect message length or invalid format',
  [NegativeResponseCode.ConditionsNotCorrect]: 'Conditions not correct',
  [NegativeResponseCode.RequestSequenceError]: 'Request sequence error',
  [NegativeResponseCode.RequestOutOfRange]: 'Request out of range',
  [NegativeResponseCode.UploadDownloadNotAccepted]: 'Upload/download not accepted',
  [NegativeResponseCode.TransferDataSuspended]: 'Transfer data suspended',
  [NegativeResponseCode.GeneralProgrammingFailure]: 'General programming failure',
  [NegativeResponseCode.WrongBlockSequenceCounter]: 'Wrong block sequence counter',
};

export function positiveResponseId(service: number): number {
  return (service + POSITIVE_RESPONSE_OFFSET) & 0xff;
}

export function buildPositiveResponse(service: number, ...data: Array<Buffer | number[]>): Buffer {
  return Buffer.concat([Buffer.from([positiveResponseId(service)]), ...data.map((d) => Buffer.from(d))]);
}

export function buildNegativeResponse(service: number, nrc: NegativeResponseCode): Buffer {
  return Buffer.from([NEGATIVE_RESPONSE, service, nrc]);
}

export function isNegativeResponse(payload: Buffer): boolean {
  return payload.length >= 3 && payload[0] === NEGATIVE_RESPONSE;
}

function hexByte(value: number): string {
  return `0x${value.toString(16).padStart(2, '0').toUpperCase()}`;
}

/** Human-readable description of a `[0x7F, sid, nrc]` response. */
export function describeNegativeResponse(payload: Buffer): string {
  if (!isNegativeResponse(payload)) {
    return `Invalid negative response: ${payload.toString('hex')}`;
  }
  const sid = payload[1];
  const nrc = payload[2];
  const message = NRC_MESSAGES[nrc] ?? `Unknown NRC (${hexByte(nrc)})`;
  return `Negative response for service ${hexByte(sid)}: ${message} (NRC ${hexByte(nrc)})`;
}

export function serviceName(service: number): string {
  return ServiceId[service] ?? `Unknown(${hexByte(service)})`;
}
