import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import type {
  CredentialStoreConfiguration,
  GitHubActivityModuleOptions,
} from '../interfaces/module-options.interface';
import type { LoggingOptions } from '../common/utils/logger.factory';

export const DEFAULT_PORT = 5001;

const LOG_LEVELS = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'] as const;

// Blank variables count as unset
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  GITHUB_CLIENT_ID: optionalString,
  GITHUB_CLIENT_SECRET: optionalString,
  GITHUB_REDIRECT_URI: optionalString.pipe(z.string().url().optional()),
  GITHUB_DEVICE_CLIENT_ID: optionalString,
  JWT_SECRET_KEY: optionalString,
  JWT_ALGORITHM: optionalString.pipe(
    z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ),
  JWT_EXPIRATION_HOURS: optionalString.pipe(
    z.coerce.number().positive().default(24),
  ),
  ENCRYPTION_KEY: optionalString,
  DATABASE_URL: optionalString.pipe(
    z
      .string()
      .regex(
        /^(postgres(ql)?:\/\/|sqlite:)/,
        'Expected a postgres:// or sqlite: URL',
      )
      .optional(),
  ),
  PORT: optionalString.pipe(
    z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  ),
  LOG_LEVEL: optionalString.pipe(
    z
      .string()
      .regex(
        new RegExp(`^(off|(${LOG_LEVELS.join('|')})(,(${LOG_LEVELS.join('|')}))*)$`),
        `Expected "off" or a comma separated list of: ${LOG_LEVELS.join(', ')}`,
      )
      .optional(),
  ),
});

export type EnvironmentVariables = z.infer<typeof envSchema>;

export function validateEnvironment(
  env: Record<string, string | undefined>,
): EnvironmentVariables {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}

/**
 * Builds module options from environment variables.
 * Missing secrets are allowed here; the operation that needs one fails instead.
 */
export function loadConfiguration(
  env: Record<string, string | undefined>,
): GitHubActivityModuleOptions {
  const vars = validateEnvironment(env);

  return {
    github: {
      clientId: vars.GITHUB_CLIENT_ID,
      clientSecret: vars.GITHUB_CLIENT_SECRET,
      redirectUri: vars.GITHUB_REDIRECT_URI,
      deviceClientId: vars.GITHUB_DEVICE_CLIENT_ID,
    },
    session: {
      secret: vars.JWT_SECRET_KEY,
      algorithm: vars.JWT_ALGORITHM,
      expiresInHours: vars.JWT_EXPIRATION_HOURS,
    },
    encryption: {
      secret: vars.ENCRYPTION_KEY,
    },
    storeConfiguration: toStoreConfiguration(vars.DATABASE_URL),
    logging: toLogging(vars.LOG_LEVEL),
  };
}

export function loadPort(env: Record<string, string | undefined>): number {
  return validateEnvironment(env).PORT;
}

function toStoreConfiguration(
  databaseUrl: string | undefined,
): CredentialStoreConfiguration {
  if (!databaseUrl) {
    return { type: 'memory' };
  }

  if (databaseUrl.startsWith('sqlite:')) {
    return {
      type: 'typeorm',
      options: {
        type: 'better-sqlite3',
        database: databaseUrl.slice('sqlite:'.length),
        synchronize: true,
      },
    };
  }

  return {
    type: 'typeorm',
    options: {
      type: 'postgres',
      url: databaseUrl,
      synchronize: true,
    },
  };
}

function toLogging(logLevel: string | undefined): LoggingOptions | undefined {
  if (logLevel === undefined) {
    return undefined;
  }
  if (logLevel === 'off') {
    return false;
  }
  return { level: logLevel.split(',').filter(isLogLevel) };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
