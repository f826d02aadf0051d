export { formatLabel, getLogger, getLoggerTransports, setLoggerTransports } from './logger.js';
export type { Logger, TransportMode } from './logger.js';
export { loggerEnvSchema, logLevels, validateLoggerEnv } from './env.schema.js';
export type { LoggerEnvConfig } from './env.schema.js';
