/**
 * Value model the indexer reads decoded runtime data through.
 *
 * Types are addressed by their id in the runtime's portable registry
 * (`metadata.lookup`); ids may refer to each other recursively.
 */

export type TypeId = number;

export interface DecodedField {
  name?: string | undefined;
  value: DecodedValue;
}

/**
 * Structural result of decoding. Integers of every width are bigints; sequences
 * and arrays of u8 collapse to `bytes`.
 */
export type DecodedValue =
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: bigint }
  | { kind: 'str'; value: string }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'bits'; length: number; value: Uint8Array }
  | { kind: 'composite'; fields: DecodedField[] }
  | { kind: 'variant'; name: string; index: number; fields: DecodedField[] }
  | { kind: 'sequence'; items: DecodedValue[] }
  | { kind: 'tuple'; items: DecodedValue[] };

export type DecodedValueKind = DecodedValue['kind'];

export interface DecodeOutput {
  value: DecodedValue;
  remaining: Uint8Array;
}
