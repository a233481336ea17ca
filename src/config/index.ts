import Joi from 'joi';
import path from 'path';

/**
 * Environment-driven configuration for the classification service
 */

export interface AppConfig {
  port: number;
  environment: string;
  databasePath: string;
  openai: {
    apiKey?: string;
    model: string;
  };
  auth: {
    jwtSecret: string;
    required: boolean;
  };
  integrations: {
    baseUrl: string;
    timeoutMs: number;
  };
  redisUrl: string;
  events: {
    enabled: boolean;
    channel: string;
    consumerEnabled: boolean;
  };
  frontendUrl?: string;
}

export const DEV_JWT_SECRET = 'dev-secret-key-change-in-production';

interface RawEnv {
  PORT: number;
  NODE_ENV: string;
  DATABASE_PATH?: string;
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
  JWT_SECRET: string;
  AUTH_REQUIRED: boolean;
  INTEGRATIONS_SERVICE_URL: string;
  INTEGRATIONS_TIMEOUT_MS: number;
  REDIS_URL: string;
  EVENTS_ENABLED: boolean;
  EVENTS_CHANNEL: string;
  EVENT_CONSUMER_ENABLED: boolean;
  FRONTEND_URL?: string;
}

const envSchema = Joi.object<RawEnv>({
  PORT: Joi.number().port().default(8001),
  NODE_ENV: Joi.string().default('development'),
  DATABASE_PATH: Joi.string(),
  OPENAI_API_KEY: Joi.string().allow(''),
  OPENAI_MODEL: Joi.string().default('gpt-4o-mini'),
  JWT_SECRET: Joi.string().default(DEV_JWT_SECRET),
  AUTH_REQUIRED: Joi.boolean().truthy('1').falsy('0').default(false),
  INTEGRATIONS_SERVICE_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('http://localhost:8002'),
  INTEGRATIONS_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
  REDIS_URL: Joi.string().default('redis://localhost:6379'),
  EVENTS_ENABLED: Joi.boolean().truthy('1').falsy('0').default(true),
  EVENTS_CHANNEL: Joi.string().default('classification-events'),
  EVENT_CONSUMER_ENABLED: Joi.boolean().truthy('1').falsy('0').default(false),
  FRONTEND_URL: Joi.string()
}).unknown(true);

export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Configuration errors: ${problems.join(', ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Read and validate configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.validate(env, { abortEarly: false });
  if (result.error) {
    throw new ConfigurationError(result.error.details.map(detail => detail.message));
  }
  const raw = result.value;

  const config: AppConfig = {
    port: raw.PORT,
    environment: raw.NODE_ENV,
    databasePath: raw.DATABASE_PATH || path.join(process.cwd(), 'data', 'classifications.db'),
    openai: {
      apiKey: raw.OPENAI_API_KEY || undefined,
      model: raw.OPENAI_MODEL
    },
    auth: {
      jwtSecret: raw.JWT_SECRET,
      required: raw.AUTH_REQUIRED
    },
    integrations: {
      baseUrl: raw.INTEGRATIONS_SERVICE_URL.replace(/\/+$/, ''),
      timeoutMs: raw.INTEGRATIONS_TIMEOUT_MS
    },
    redisUrl: raw.REDIS_URL,
    events: {
      enabled: raw.EVENTS_ENABLED,
      channel: raw.EVENTS_CHANNEL,
      consumerEnabled: raw.EVENT_CONSUMER_ENABLED
    },
    frontendUrl: raw.FRONTEND_URL
  };

  validateConfig(config);
  return config;
}

export function isProduction(config: AppConfig): boolean {
  return config.environment.toLowerCase() === 'production';
}

/**
 * Production deployments must not run on development defaults
 */
export function validateConfig(config: AppConfig): void {
  const problems: string[] = [];

  if (isProduction(config)) {
    if (!config.openai.apiKey) {
      problems.push('OPENAI_API_KEY is required in production');
    }
    if (config.auth.jwtSecret === DEV_JWT_SECRET) {
      problems.push('JWT_SECRET must be changed in production');
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
}
