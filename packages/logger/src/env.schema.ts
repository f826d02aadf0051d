import { z } from 'zod';

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const booleanString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

// Define environment schema
export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: booleanString('true'),
  LOGGER_FILE_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs'),
  LOGGER_FILE_LOG_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('ledgerline.log'),
  LOGGER_LOG_LEVEL: z
    .string()
    .transform((val: string) => val.toLowerCase())
    .pipe(z.enum(logLevels))
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().default('ledgerline'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

// Infer TypeScript type from schema
export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

// Function to validate environment variables
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
