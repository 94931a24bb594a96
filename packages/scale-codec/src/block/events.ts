import { err, ok, Result } from 'neverthrow';

import { DecodeError } from '../codec/errors.js';
import { decodeExact } from '../codec/scale.js';
import type { DecodedField, DecodedValue } from '../codec/types.js';
import { asNumber, asVariant, getField } from '../codec/value-utils.js';
import { findStorageEntry, type RuntimeMetadata } from '../metadata/runtime-metadata.js';

export type EventPhase =
  | { kind: 'ApplyExtrinsic'; extrinsicIndex: number }
  | { kind: 'Finalization' }
  | { kind: 'Initialization' };

export interface EventRecord {
  phase: EventPhase;
  pallet: string;
  name: string;
  fields: DecodedField[];
}

function toPhase(value: DecodedValue | undefined): EventPhase | undefined {
  const phase = asVariant(value);
  if (!phase) return undefined;
  switch (phase.name) {
    case 'ApplyExtrinsic': {
      const extrinsicIndex = asNumber(phase.fields[0]?.value);
      return extrinsicIndex === undefined ? undefined : { extrinsicIndex, kind: 'ApplyExtrinsic' };
    }
    case 'Finalization':
      return { kind: 'Finalization' };
    case 'Initialization':
      return { kind: 'Initialization' };
    default:
      return undefined;
  }
}

function toRecord(value: DecodedValue, position: number): Result<EventRecord, DecodeError> {
  const phase = toPhase(getField(value, 'phase'));
  const outer = asVariant(getField(value, 'event'));
  const inner = asVariant(outer?.fields[0]?.value);
  if (!phase || !outer || !inner) {
    return err(new DecodeError('INVALID_VALUE', `Event record ${position} does not have the expected shape`));
  }
  return ok({ fields: inner.fields, name: inner.name, pallet: outer.name, phase });
}

/**
 * Decode the `System.Events` storage value of a block.
 */
export function decodeEventRecords(bytes: Uint8Array, metadata: RuntimeMetadata): Result<EventRecord[], DecodeError> {
  const entryType = findStorageEntry(metadata, 'System', 'Events')?.type;
  if (entryType?.kind !== 'plain') {
    return err(new DecodeError('UNKNOWN_TYPE', 'System.Events is not a plain storage entry in this runtime'));
  }

  return decodeExact(bytes, entryType.value, metadata.registry).andThen((value) => {
    if (value.kind !== 'sequence') {
      return err(new DecodeError('INVALID_VALUE', 'System.Events is not a sequence'));
    }
    return Result.combine(value.items.map((item, i) => toRecord(item, i)));
  });
}

/** Short label such as `Balances.Minted`. */
export function eventKey(record: Pick<EventRecord, 'pallet' | 'name'>): string {
  return `${record.pallet}.${record.name}`;
}
