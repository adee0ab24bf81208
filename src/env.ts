import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
      return true;
    }
    if (normalized === 'false' || normalized === '0' || normalized === 'no') {
      return false;
    }
  }
  return value;
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('0.0.0.0')),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),

  SIGNALING_MODE: z.preprocess(emptyToUndefined, z.enum(['auto', 'ari', 'demo']).default('auto')),
  ARI_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  ARI_USERNAME: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  ARI_PASSWORD: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  ARI_APP: z.preprocess(emptyToUndefined, z.string().min(1).default('softphone')),
  ARI_OUTBOUND_ENDPOINT: z.preprocess(emptyToUndefined, z.string().min(1).default('softphone')),
  ARI_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5000)),
  SIP_DOMAIN: z.preprocess(emptyToUndefined, z.string().min(1).default('localhost')),

  AUTO_ANSWER: z.preprocess(stringToBoolean, z.boolean().default(false)),
  AUTO_RECORD: z.preprocess(stringToBoolean, z.boolean().default(true)),
  RECORDING_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('recordings')),
  RECORDING_FORMAT: z.preprocess(emptyToUndefined, z.string().regex(/^[a-z0-9]+$/).default('wav')),

  REDIS_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  HISTORY_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('softphone')),

  ENRICHMENT_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),
  TRANSCRIBE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  SENTIMENT_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  SUMMARY_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  ENRICHMENT_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30_000),
  ),
  ENRICHMENT_CONCURRENCY: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(2)),
  ENRICHMENT_QUEUE_LIMIT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(100)),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export const env = parseEnv(process.env);
