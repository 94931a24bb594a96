import type { TypeId } from '../codec/types.js';
import { decodeRuntimeMetadata, type RuntimeMetadata } from '../metadata/runtime-metadata.js';
import { buildMetadataBytes, LookupBuilder } from '../testing/lookup-builder.js';

export interface MiniRuntime {
  metadata: RuntimeMetadata;
  metadataBytes: Uint8Array;
  types: {
    accountId: TypeId;
    address: TypeId;
    eventRecords: TypeId;
    pairKey: TypeId;
    runtimeCall: TypeId;
    u8: TypeId;
    units: TypeId;
  };
}

/**
 * A runtime with a single `System` pallet: one call, one event, a plain and
 * two map storage entries, and a V4 extrinsic format with a nonce extension.
 */
export function buildMiniRuntime(
  options: { padding?: number; remarkField?: string; version?: 14 | 15 } = {}
): MiniRuntime {
  const b = new LookupBuilder();
  for (let i = 0; i < (options.padding ?? 0); i++) {
    b.composite([], ['padding', `P${i}`]);
  }

  const u8 = b.primitive('u8');
  const u32 = b.primitive('u32');
  const bytes = b.bytes();
  const hash = b.array(32, u8);
  const accountId = b.composite([hash], ['sp_core', 'crypto', 'AccountId32']);
  const address = b.variant(
    [
      { fields: [accountId], index: 0, name: 'Id' },
      { fields: [b.array(20, u8)], index: 4, name: 'Address20' },
    ],
    ['sp_runtime', 'multiaddress', 'MultiAddress'],
    [
      { name: 'AccountId', type: accountId },
      { name: 'AccountIndex', type: b.tuple([]) },
    ]
  );
  const signature64 = b.array(64, u8);
  const signature = b.variant(
    [
      { fields: [signature64], index: 0, name: 'Ed25519' },
      { fields: [signature64], index: 1, name: 'Sr25519' },
    ],
    ['sp_runtime', 'MultiSignature']
  );
  const nonce = b.compact(u32);
  const extra = b.tuple([nonce]);

  const systemCall = b.variant([{ fields: [[options.remarkField ?? 'remark', bytes]], index: 0, name: 'remark' }], [
    'frame_system',
    'pallet',
    'Call',
  ]);
  const runtimeCall = b.variant([{ fields: [systemCall], index: 0, name: 'System' }], ['mini_runtime', 'RuntimeCall']);
  const unchecked = b.composite(
    [bytes],
    ['sp_runtime', 'generic', 'unchecked_extrinsic', 'UncheckedExtrinsic'],
    [
      { name: 'Address', type: address },
      { name: 'Call', type: runtimeCall },
      { name: 'Signature', type: signature },
      { name: 'Extra', type: extra },
    ]
  );

  const phase = b.variant(
    [
      { fields: [u32], index: 0, name: 'ApplyExtrinsic' },
      { index: 1, name: 'Finalization' },
      { index: 2, name: 'Initialization' },
    ],
    ['frame_system', 'Phase']
  );
  const systemEvent = b.variant(
    [
      {
        fields: [
          ['sender', accountId],
          ['hash', hash],
        ],
        index: 0,
        name: 'Remarked',
      },
    ],
    ['frame_system', 'pallet', 'Event']
  );
  const runtimeEvent = b.variant([{ fields: [systemEvent], index: 0, name: 'System' }], ['mini_runtime', 'RuntimeEvent']);
  const runtimeError = b.variant([], ['mini_runtime', 'RuntimeError']);
  const eventRecord = b.composite(
    [
      ['phase', phase],
      ['event', runtimeEvent],
      ['topics', b.sequence(hash)],
    ],
    ['frame_system', 'EventRecord']
  );
  const eventRecords = b.sequence(eventRecord);
  const runtime = b.composite([], ['mini_runtime', 'Runtime']);
  const noAdditional = b.tuple([]);
  const pairKey = b.tuple([u32, u8]);
  const units = b.sequence(b.tuple([]));

  const metadataBytes = buildMetadataBytes({
    extrinsic: {
      address,
      call: runtimeCall,
      extra,
      signature,
      signedExtensions: [{ additionalSigned: noAdditional, identifier: 'CheckNonce', type: nonce }],
      uncheckedExtrinsic: unchecked,
    },
    lookup: b,
    outerEnums: { call: runtimeCall, error: runtimeError, event: runtimeEvent },
    pallets: [
      {
        calls: systemCall,
        constants: [{ name: 'SS58Prefix', type: u8, value: Uint8Array.of(0) }],
        events: systemEvent,
        index: 0,
        name: 'System',
        storage: {
          entries: [
            { default: Uint8Array.of(0), modifier: 'Default', name: 'Events', type: { kind: 'plain', value: eventRecords } },
            {
              default: Uint8Array.of(0, 0, 0, 0),
              modifier: 'Default',
              name: 'Nonces',
              type: { hashers: ['Blake2_128Concat'], key: accountId, kind: 'map', value: u32 },
            },
            {
              default: new Uint8Array(),
              modifier: 'Optional',
              name: 'Pairs',
              type: { hashers: ['Twox64Concat', 'Identity'], key: pairKey, kind: 'map', value: u8 },
            },
          ],
          prefix: 'System',
        },
      },
    ],
    runtime,
    version: options.version ?? 14,
  });

  return {
    metadata: decodeRuntimeMetadata(metadataBytes)._unsafeUnwrap(),
    metadataBytes,
    types: { accountId, address, eventRecords, pairKey, runtimeCall, u8, units },
  };
}
