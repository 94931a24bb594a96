import { z } from 'zod';

export const OutputFileSchema = z.object({
  outputFile: z.string().trim().min(1, { message: '--output-file must not be empty' }).optional(),
});

export const BlockHashOptionSchema = z
  .string()
  .trim()
  .regex(/^0x[0-9a-fA-F]{64}$/, { message: '--block-hash must be 0x followed by 64 hex digits' })
  .transform((hash) => hash.toLowerCase());

/**
 * get-transfers-at command options
 */
export const GetTransfersAtCommandOptionsSchema = OutputFileSchema.extend({
  blockHash: BlockHashOptionSchema,
});

/**
 * subscribe-to-new-transfers command options
 */
export const SubscribeCommandOptionsSchema = OutputFileSchema;

/**
 * update-schema command options
 */
export const UpdateSchemaCommandOptionsSchema = z.object({
  schemaPath: z.string().trim().min(1, { message: '--schema-path must not be empty' }).optional(),
});
