export * from './codec/types.js';
export * from './codec/errors.js';
export { CodecInputWriter, CodecValueReader, lookupType } from './codec/codec-value.js';
export { createCodec, decode, decodeExact, encode, tryDecode } from './codec/scale.js';
export * from './codec/value-utils.js';

export * from './metadata/runtime-metadata.js';
export { hashStorageKey, storageKey, storagePrefix } from './metadata/storage.js';
export { computeSchemaFingerprints, schemaItemKey, type SchemaItem } from './metadata/fingerprint.js';

export { decodeExtrinsic, toDecodedCall, type DecodedCall, type DecodedExtrinsic } from './block/extrinsic.js';
export { decodeEventRecords, eventKey, type EventPhase, type EventRecord } from './block/events.js';
