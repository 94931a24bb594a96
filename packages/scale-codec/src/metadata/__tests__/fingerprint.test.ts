import { describe, expect, it } from 'vitest';

import { buildMiniRuntime } from '../../__tests__/mini-runtime.js';
import { computeSchemaFingerprints, schemaItemKey, type SchemaItem } from '../fingerprint.js';

const ITEMS: SchemaItem[] = [
  { kind: 'call', name: 'remark', pallet: 'System' },
  { kind: 'event', name: 'Remarked', pallet: 'System' },
  { kind: 'storage', name: 'Events', pallet: 'System' },
  { kind: 'type', path: ['frame_system', 'Phase'] },
  { kind: 'extrinsic' },
];

describe('computeSchemaFingerprints', () => {
  it('keys fingerprints by item', () => {
    expect(ITEMS.map(schemaItemKey)).toEqual([
      'call:System.remark',
      'event:System.Remarked',
      'storage:System.Events',
      'type:frame_system::Phase',
      'extrinsic',
    ]);
  });

  it('ignores type ids, so a renumbered registry matches', () => {
    const a = computeSchemaFingerprints(buildMiniRuntime().metadata, ITEMS);
    const b = computeSchemaFingerprints(buildMiniRuntime({ padding: 5 }).metadata, ITEMS);

    expect(b).toEqual(a);
    for (const value of Object.values(a)) {
      expect(value).toMatch(/^0x[0-9a-f]{64}$/);
    }
  });

  it('changes when a field is renamed', () => {
    const a = computeSchemaFingerprints(buildMiniRuntime().metadata, ITEMS);
    const b = computeSchemaFingerprints(buildMiniRuntime({ remarkField: 'data' }).metadata, ITEMS);

    expect(b['call:System.remark']).not.toBe(a['call:System.remark']);
    expect(b['event:System.Remarked']).toBe(a['event:System.Remarked']);
  });

  it('maps missing items to null', () => {
    const fingerprints = computeSchemaFingerprints(buildMiniRuntime().metadata, [
      { kind: 'call', name: 'transfer_assets', pallet: 'PolkadotXcm' },
      { kind: 'event', name: 'Missing', pallet: 'System' },
    ]);
    expect(fingerprints).toEqual({ 'call:PolkadotXcm.transfer_assets': null, 'event:System.Missing': null });
  });
});
