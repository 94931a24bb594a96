export * from './model/location.js';
export * from './model/origin.js';
export * from './model/versioned.js';
export type { ReceivedIntent, SentIntent, TransferIntent } from './model/intent.js';

export * from './resolver/address-utils.js';
export * from './resolver/asset-ref.js';
export * from './resolver/asset-registry.js';
export * from './resolver/asset-resolver.js';
export * from './resolver/chain-resolver.js';
export * from './resolver/normalize.js';

export { ISSUANCE_EXTRACTORS, type Issuance, type IssuanceExtractor } from './incoming/extractors.js';
export {
  correlateIncoming,
  FIRST_SEGMENT_ABSORBS_EARLY_ISSUANCES,
  MESSAGE_PROCESSED_EVENT,
  segmentEvents,
  type ClosedSegment,
} from './incoming/correlator.js';
export { deriveTransferType, interpretExtrinsics, TRANSFER_CALLS, XCM_PALLETS } from './outgoing/interpreter.js';
export * from './output/formatter.js';
export * from './pipeline/process-block.js';
