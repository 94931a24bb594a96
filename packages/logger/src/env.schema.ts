import { z } from 'zod';

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: z
    .string()
    .default('true')
    .transform((val: string) => val === 'true'),
  LOGGER_LOG_LEVEL: z.enum(logLevels).default('info'),
  LOGGER_PRETTY: z
    .string()
    .optional()
    .transform((val: string | undefined) => (val === undefined ? undefined : val === 'true')),
  LOGGER_SERVICE_NAME: z.string().default('xcm-indexer'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
