import { z, ZodError } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Data storage
  SQLITE_DB_PATH: z.string().min(1).default('./data/ledger.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Month closing
  CLOSE_POLICY: z.enum(['strict', 'permissive']).default('strict'),
  RECURRENCE_AUTO_EXPAND: booleanFlag,

  // Rate limiting (API)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
});

export type Env = z.infer<typeof envSchema>;

export type ClosePolicy = Env['CLOSE_POLICY'];

/**
 * Parses a raw environment map, throwing ZodError on invalid input
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
