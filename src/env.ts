import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  CAPTURE_ENABLED: z.string().default('request'),
  CAPTURE_SIZE_LIMIT_KB: z.coerce.number().nonnegative().default(64),
  CAPTURE_SIZE_MEASURE: z.enum(['characters', 'bytes']).default('characters'),
  CAPTURE_HIDDEN_RESPONSE_FIELDS: z.string().default(''),
  CAPTURE_HIDDEN_REQUEST_FIELDS: z.string().default('password,password_confirmation'),
  CAPTURE_HIDDEN_HEADERS: z.string().default('authorization,cookie,x-api-key'),
  CAPTURE_IGNORE_PATHS: z.string().default('healthz,readyz,metrics'),
  CAPTURE_ONLY_PATHS: z.string().default(''),
  CAPTURE_BATCH_HEADER: z.string().min(1).default('batch-id'),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | null = null;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new Error(`Environment validation failed: ${issues}`);
    }
    throw error;
  }
}

/**
 * Splits a comma-separated env value, dropping blanks.
 */
export function splitList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter(Boolean);
}
