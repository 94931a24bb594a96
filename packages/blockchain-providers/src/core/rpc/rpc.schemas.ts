import { z } from 'zod';

export const JsonRpcErrorSchema = z.object({
  code: z.number(),
  data: z.unknown().optional(),
  message: z.string(),
});

export const JsonRpcResponseSchema = z.object({
  error: JsonRpcErrorSchema.optional(),
  id: z.number(),
  jsonrpc: z.literal('2.0'),
  result: z.unknown().optional(),
});

export const JsonRpcNotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.object({
    result: z.unknown(),
    subscription: z.union([z.string(), z.number()]).transform(String),
  }),
});

export const JsonRpcMessageSchema = z.union([JsonRpcResponseSchema, JsonRpcNotificationSchema]);

export const SubscriptionIdSchema = z.union([z.string(), z.number()]).transform(String);

export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;
export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema>;
