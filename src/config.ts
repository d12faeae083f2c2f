import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export type Env = Record<string, string | undefined>;

const flag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const positive = z.coerce.number().finite().positive();
const nonNegative = z.coerce.number().finite().nonnegative();

export const DeliveryPolicySchema = z.enum(['advance-always', 'advance-on-success']);
export type DeliveryPolicy = z.infer<typeof DeliveryPolicySchema>;

const ConfigSchema = z.object({
  WINDOW_DURATION_S: positive.default(10),
  SAMPLING_RATE_HZ: positive.default(250),
  HEART_RATE_BPM: positive.default(72),
  NOISE_LEVEL: nonNegative.default(0.05),
  AMPLITUDE_SCALE: z.coerce.number().finite().default(1),
  INCLUDE_P_WAVE: flag.default('true'),
  INCLUDE_T_WAVE: flag.default('true'),
  BATCH_SIZE: z.coerce.number().int().positive().default(10),
  SEND_INTERVAL_MS: nonNegative.default(100),
  POLL_INTERVAL_MS: positive.default(1000),
  API_ENDPOINT: z.string().url().default('http://localhost:3000/api/ecg-data'),
  LOG_PATH: z.string().min(1).default('ecg_simulation_data.csv'),
  CURSOR_PATH: z.string().min(1).optional(),
  USER_ID: z.string().min(1).optional(),
  DELIVERY_POLICY: DeliveryPolicySchema.default('advance-always'),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: nonNegative.default(500),
  REQUEST_TIMEOUT_MS: positive.default(10000),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  CORS_ORIGIN: z.string().default('*')
});

export type SynthesisConfig = {
  durationSeconds: number;
  samplingRateHz: number;
  heartRateBpm: number;
  noiseLevel: number;
  amplitudeScale: number;
  includePWave: boolean;
  includeTWave: boolean;
};

export type TransmitConfig = {
  batchSize: number;
  sendIntervalMs: number;
  pollIntervalMs: number;
  endpoint: string;
  userId?: string;
  policy: DeliveryPolicy;
  retry: { maxAttempts: number; baseDelayMs: number };
  requestTimeoutMs: number;
};

export type AppConfig = Readonly<{
  synthesis: Readonly<SynthesisConfig>;
  transmit: Readonly<TransmitConfig>;
  logPath: string;
  cursorPath?: string;
  server: Readonly<{ port: number; corsOrigin: string }>;
}>;

function pick(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(ConfigSchema.shape)) {
    const v = env[key];
    if (v === undefined || v === '') continue;
    out[key] = v.trim();
  }
  return out;
}

/**
 * Builds the immutable configuration from an environment map. Nothing outside
 * this module reads `process.env`.
 */
export function parseConfig(env: Env): AppConfig {
  const parsed = ConfigSchema.safeParse(pick(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }
  const c = parsed.data;
  return Object.freeze({
    synthesis: Object.freeze({
      durationSeconds: c.WINDOW_DURATION_S,
      samplingRateHz: c.SAMPLING_RATE_HZ,
      heartRateBpm: c.HEART_RATE_BPM,
      noiseLevel: c.NOISE_LEVEL,
      amplitudeScale: c.AMPLITUDE_SCALE,
      includePWave: c.INCLUDE_P_WAVE,
      includeTWave: c.INCLUDE_T_WAVE
    }),
    transmit: Object.freeze({
      batchSize: c.BATCH_SIZE,
      sendIntervalMs: c.SEND_INTERVAL_MS,
      pollIntervalMs: c.POLL_INTERVAL_MS,
      endpoint: c.API_ENDPOINT,
      userId: c.USER_ID,
      policy: c.DELIVERY_POLICY,
      retry: Object.freeze({ maxAttempts: c.RETRY_MAX_ATTEMPTS, baseDelayMs: c.RETRY_BASE_DELAY_MS }),
      requestTimeoutMs: c.REQUEST_TIMEOUT_MS
    }),
    logPath: c.LOG_PATH,
    cursorPath: c.CURSOR_PATH,
    server: Object.freeze({ port: c.PORT, corsOrigin: c.CORS_ORIGIN })
  });
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
