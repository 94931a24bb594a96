export { getLogger, setLoggerDestination, type Logger } from './pino-logger.js';
export { logLevels, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
