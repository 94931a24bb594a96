import { asNumber, asVariant, type DecodedValue } from '@xcm-indexer/scale-codec';

/**
 * Where a message processed by `MessageQueue` came from.
 */
export type AggregateOrigin =
  | { readonly kind: 'Here' }
  | { readonly kind: 'Parent' }
  | { readonly kind: 'Sibling'; readonly paraId: number };

export function readAggregateOrigin(value: DecodedValue | undefined): AggregateOrigin | undefined {
  const variant = asVariant(value);
  if (!variant) return undefined;
  switch (variant.name) {
    case 'Here':
      return { kind: 'Here' };
    case 'Parent':
      return { kind: 'Parent' };
    case 'Sibling': {
      const paraId = asNumber(variant.fields[0]?.value);
      return paraId === undefined ? undefined : { kind: 'Sibling', paraId };
    }
    default:
      return undefined;
  }
}
