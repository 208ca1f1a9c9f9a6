export { VirtualEcu, createDoipServer } from './ecu/virtual-ecu.js';
export { EcuLifecycle, EcuState } from './ecu/lifecycle.js';
export { NvramStore, NvramKey, defaultNvram, parseNvram, serializeNvram } from './ecu/nvram.js';
export { DoipServer } from './server/server.js';
export { DoipSession } from './server/session.js';
export { DoipClient } from './client/tester.js';
export { CommandDispatcher } from './uds/dispatcher.js';
export {
  ServiceId,
  NegativeResponseCode,
  describeNegativeResponse,
  buildPositiveResponse,
  buildNegativeResponse,
} from './uds/services.js';
export { PayloadType, encodeFrame, decodeHeader, parseFrames } from './doip/framing.js';
export { FirmwareTransfer, StagingLease, TransferState } from './firmware/transfer.js';
export { verifyImage, verifyBytes } from './firmware/integrity.js';
export { applyUpdate } from './firmware/apply.js';
export { Message } from './message.js';
export { scan, advertise, parseDoipTxt, DiscoveredEcu } from './discovery.js';
export { loadConfig, DEFAULT_PORT, DEFAULT_VIN } from './config.js';
export { FramingError, TransferError } from './errors.js';
export { sha256Hex, hashFile } from './util/crypto.js';
export type { ExitReason, VirtualEcuOptions, ServerHooks } from './ecu/virtual-ecu.js';
export type { ConfigStore } from './ecu/nvram.js';
export type { EcuServer, DoipServerOptions } from './server/server.js';
export type { DoipClientOptions, FlashOptions, FlashResult } from './client/tester.js';
export type { DispatchResult, VerifiedUpdate, DispatcherOptions } from './uds/dispatcher.js';
export type { Frame, FrameHeader, ParseOptions } from './doip/framing.js';
export type { FinalizeResult } from './firmware/transfer.js';
export type { IntegrityResult } from './firmware/integrity.js';
export type { EcuConfig, ConfigOverrides } from './config.js';
export type { ScanOptions, AdvertiseOptions, Advertisement, DiscoveredEcuInfo } from './discovery.js';
export type { LogSink } from './util/log.js';
