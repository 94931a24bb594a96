import type { ChainContext, TransferType } from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';
import { asBool, eventKey, getField, type DecodedValue, type EventRecord } from '@xcm-indexer/scale-codec';

import type { ReceivedIntent } from '../model/intent.js';
import { readAggregateOrigin, type AggregateOrigin } from '../model/origin.js';
import { encodeSS58Address } from '../resolver/address-utils.js';
import { isTeleportTrusted, type AssetRef } from '../resolver/asset-ref.js';
import { resolveOrigin } from '../resolver/chain-resolver.js';

import { ISSUANCE_EXTRACTORS, type Issuance, type IssuanceExtractor } from './extractors.js';

const logger = getLogger('IncomingCorrelator');

export const MESSAGE_PROCESSED_EVENT = 'MessageQueue.Processed';

/**
 * The finalization hook that processes inbound messages has no observable
 * start, so issuances between the start of the finalization phase and the
 * first `Processed` marker are attributed to that first message. Some of
 * them may have other causes; the resulting false positives are accepted.
 */
export const FIRST_SEGMENT_ABSORBS_EARLY_ISSUANCES = 'FIRST_SEGMENT_ABSORBS_EARLY_ISSUANCES';

export interface ClosedSegment {
  /** Undefined when the marker's origin could not be read */
  origin: AggregateOrigin | undefined;
  success: boolean;
  issuances: Issuance[];
  /** Rule under which the segment was opened, for the first segment of a block */
  rule?: typeof FIRST_SEGMENT_ABSORBS_EARLY_ISSUANCES | undefined;
}

type CorrelatorState =
  | { kind: 'BeforeFirstMarker'; issuances: Issuance[] }
  | { kind: 'InSegment'; issuances: Issuance[]; previousOrigin: AggregateOrigin | undefined };

type CorrelatorInput =
  | { kind: 'issuance'; issuance: Issuance }
  | { kind: 'marker'; origin: AggregateOrigin | undefined; success: boolean };

interface Transition {
  state: CorrelatorState;
  closed?: ClosedSegment | undefined;
}

function transition(state: CorrelatorState, input: CorrelatorInput): Transition {
  if (input.kind === 'issuance') {
    return { state: { ...state, issuances: [...state.issuances, input.issuance] } };
  }

  const closed: ClosedSegment = {
    issuances: state.issuances,
    origin: input.origin,
    rule: state.kind === 'BeforeFirstMarker' ? FIRST_SEGMENT_ABSORBS_EARLY_ISSUANCES : undefined,
    success: input.success,
  };
  return { closed, state: { issuances: [], kind: 'InSegment', previousOrigin: input.origin } };
}

function toInput(record: EventRecord, extractors: ReadonlyMap<string, IssuanceExtractor>): CorrelatorInput | undefined {
  const key = eventKey(record);
  const fields: DecodedValue = { fields: record.fields, kind: 'composite' };

  if (key === MESSAGE_PROCESSED_EVENT) {
    return {
      kind: 'marker',
      origin: readAggregateOrigin(getField(fields, 'origin')),
      success: asBool(getField(fields, 'success')) ?? false,
    };
  }

  const extractor = extractors.get(key);
  if (!extractor) return undefined;

  const issuance = extractor(fields);
  if (!issuance) {
    logger.debug({ event: key }, 'Skipping issuance event with unexpected fields');
    return undefined;
  }
  return { issuance, kind: 'issuance' };
}

/**
 * Splits the finalization-phase events of a block into segments, each closed
 * by a `MessageQueue.Processed` marker. Issuances after the last marker
 * belong to no completed message and are dropped.
 */
export function segmentEvents(
  records: readonly EventRecord[],
  extractors: ReadonlyMap<string, IssuanceExtractor> = ISSUANCE_EXTRACTORS
): ClosedSegment[] {
  let state: CorrelatorState = { issuances: [], kind: 'BeforeFirstMarker' };
  const segments: ClosedSegment[] = [];

  for (const record of records) {
    if (record.phase.kind !== 'Finalization') continue;
    const input = toInput(record, extractors);
    if (!input) continue;

    const next = transition(state, input);
    state = next.state;
    if (next.closed) segments.push(next.closed);
  }

  if (state.issuances.length > 0) {
    logger.debug(
      {
        issuances: state.issuances.length,
        previousOrigin: state.kind === 'InSegment' ? state.previousOrigin : undefined,
      },
      'Dropping issuances after the last processed message'
    );
  }
  return segments;
}

/**
 * Which assets a message from each kind of origin may mint here.
 */
const ORIGIN_POLICY: Readonly<Record<AggregateOrigin['kind'], (asset: AssetRef) => boolean>> = {
  Here: () => false,
  Parent: (asset) => asset.kind === 'native',
  Sibling: () => true,
};

/**
 * Received transfers of one block, in event order.
 */
export function correlateIncoming(
  records: readonly EventRecord[],
  context: ChainContext,
  extractors: ReadonlyMap<string, IssuanceExtractor> = ISSUANCE_EXTRACTORS
): ReceivedIntent[] {
  const intents: ReceivedIntent[] = [];

  for (const segment of segmentEvents(records, extractors)) {
    const { origin } = segment;
    if (!segment.success || !origin) {
      logger.debug({ issuances: segment.issuances.length, origin }, 'Discarding segment of a failed or unreadable message');
      continue;
    }
    if (segment.issuances.length === 0) {
      logger.debug({ origin }, 'Processed message minted nothing');
      continue;
    }

    const originChain = resolveOrigin(origin, context);
    const accepts = ORIGIN_POLICY[origin.kind];

    for (const issuance of segment.issuances) {
      if (!accepts(issuance.asset)) {
        logger.debug({ asset: issuance.asset.kind, origin }, 'Origin cannot transfer this asset');
        continue;
      }
      const transferType: TransferType = isTeleportTrusted(issuance.asset, originChain, context) ? 'Teleport' : 'Reserve';
      intents.push({
        asset: issuance.asset,
        beneficiary: encodeSS58Address(issuance.who, context.ss58Format),
        kind: 'received',
        originChain,
        rawAmount: issuance.amount,
        transferType,
      });
    }
  }

  return intents;
}
