import { z } from 'zod';

export const HexStringSchema = z
  .string()
  .regex(/^0x([\da-fA-F]{2})*$/, 'Must be an even-length 0x-prefixed hex string')
  .transform((value) => value.toLowerCase());

export const BlockHashSchema = z
  .string()
  .regex(/^0x[\da-fA-F]{64}$/, 'Must be a 32-byte hex hash')
  .transform((value) => value.toLowerCase());

export const BlockNumberSchema = z
  .string()
  .regex(/^0x[\da-fA-F]+$/, 'Must be a hex block number')
  .transform((value) => parseInt(value, 16));

export const HeaderSchema = z.object({
  number: BlockNumberSchema,
  parentHash: BlockHashSchema,
});

export const SignedBlockSchema = z.object({
  block: z.object({
    extrinsics: z.array(HexStringSchema),
    header: HeaderSchema,
  }),
});

export const RuntimeVersionSchema = z.object({
  specName: z.string(),
  specVersion: z.number().int().nonnegative(),
});

/** `chain_getBlock` answers null for unknown hashes. */
export const MaybeSignedBlockSchema = SignedBlockSchema.nullable();
export const MaybeBlockHashSchema = BlockHashSchema.nullable();
export const StorageValueSchema = HexStringSchema.nullable();

export type Header = z.infer<typeof HeaderSchema>;
export type SignedBlock = z.infer<typeof SignedBlockSchema>;
export type RuntimeVersion = z.infer<typeof RuntimeVersionSchema>;
