import { z } from 'zod';
import { ConfigError } from './errors';

type Env = Record<string, string | undefined>;

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const int = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().default(fallback));
const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(fallback));
const str = (fallback: string) => z.preprocess(emptyAsUndefined, z.string().default(fallback));
const optionalStr = z.preprocess(emptyAsUndefined, z.string().optional());

const brokerShape = {
  REDIS_HOST: str('localhost'),
  REDIS_PORT: positiveInt(6379),
  REDIS_PASSWORD: optionalStr,
  TASK_QUEUE: str('execution_tasks'),
  RESULTS_QUEUE: str('execution_results'),
  BROKER_CONNECT_TIMEOUT: positiveInt(5000),
};

const schedulerSchema = z.object({
  ...brokerShape,
  PORT: positiveInt(8001),
  BROKER_CONNECT_ATTEMPTS: positiveInt(10),
  EXECUTION_TIMEOUT: positiveInt(60),
  ENCRYPTION_KEY: optionalStr,
  SIGNATURE_KEY: optionalStr,
  SETTINGS_TTL: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().optional()),
  BODY_LIMIT: str('1mb'),
  RATE_LIMIT_WINDOW_MS: positiveInt(15 * 60 * 1000),
  RATE_LIMIT_MAX: positiveInt(200),
});

const feederSchema = z.object({
  ...brokerShape,
  BROKER_CONNECT_ATTEMPTS: positiveInt(5),
  PISTON_URL: z.preprocess(emptyAsUndefined, z.string().url().default('http://localhost:2000/api/v2')),
  DEFAULT_MEMORY_LIMIT: int(-1),
  DEFAULT_COMPILE_TIMEOUT: positiveInt(10000),
  DEFAULT_RUN_TIMEOUT: positiveInt(10000),
  ENGINE_TIMEOUT_MARGIN: int(5000),
  ENGINE_CONNECT_ATTEMPTS: positiveInt(5),
  RATE_LIMIT_RETRIES: int(10),
  RATE_LIMIT_BACKOFF: int(1000),
  PREFETCH_COUNT: positiveInt(5),
});

export interface BrokerConfig {
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  taskQueue: string;
  resultsQueue: string;
  connectAttempts: number;
  connectTimeoutMs: number;
}

export interface SchedulerConfig {
  port: number;
  broker: BrokerConfig;
  executionTimeoutMs: number;
  encryptionKey?: string;
  signatureKey?: string;
  settingsTtlSeconds?: number;
  bodyLimit: string;
  rateLimit: {
    windowMs: number;
    max: number;
  };
}

export interface ExecutionDefaults {
  memoryLimit: number; // MB
  compileTimeout: number; // ms
  runTimeout: number; // ms
}

export interface FeederConfig {
  broker: BrokerConfig;
  pistonUrl: string;
  defaults: ExecutionDefaults;
  engineTimeoutMarginMs: number;
  engineConnectAttempts: number;
  rateLimitRetries: number;
  rateLimitBackoffMs: number;
  prefetchCount: number;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return result.data;
}

function brokerConfig(
  env: z.output<typeof schedulerSchema> | z.output<typeof feederSchema>
): BrokerConfig {
  return {
    redis: {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      password: env.REDIS_PASSWORD,
    },
    taskQueue: env.TASK_QUEUE,
    resultsQueue: env.RESULTS_QUEUE,
    connectAttempts: env.BROKER_CONNECT_ATTEMPTS,
    connectTimeoutMs: env.BROKER_CONNECT_TIMEOUT,
  };
}

export function loadSchedulerConfig(env: Env = process.env): SchedulerConfig {
  const parsed = parseEnv(schedulerSchema, env);
  return {
    port: parsed.PORT,
    broker: brokerConfig(parsed),
    executionTimeoutMs: parsed.EXECUTION_TIMEOUT * 1000,
    encryptionKey: parsed.ENCRYPTION_KEY,
    signatureKey: parsed.SIGNATURE_KEY,
    settingsTtlSeconds: parsed.SETTINGS_TTL,
    bodyLimit: parsed.BODY_LIMIT,
    rateLimit: {
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
      max: parsed.RATE_LIMIT_MAX,
    },
  };
}

export function loadFeederConfig(env: Env = process.env): FeederConfig {
  const parsed = parseEnv(feederSchema, env);
  return {
    broker: brokerConfig(parsed),
    pistonUrl: parsed.PISTON_URL.replace(/\/+$/, ''),
    defaults: {
      memoryLimit: parsed.DEFAULT_MEMORY_LIMIT,
      compileTimeout: parsed.DEFAULT_COMPILE_TIMEOUT,
      runTimeout: parsed.DEFAULT_RUN_TIMEOUT,
    },
    engineTimeoutMarginMs: Math.max(0, parsed.ENGINE_TIMEOUT_MARGIN),
    engineConnectAttempts: parsed.ENGINE_CONNECT_ATTEMPTS,
    rateLimitRetries: Math.max(0, parsed.RATE_LIMIT_RETRIES),
    rateLimitBackoffMs: Math.max(0, parsed.RATE_LIMIT_BACKOFF),
    prefetchCount: parsed.PREFETCH_COUNT,
  };
}
