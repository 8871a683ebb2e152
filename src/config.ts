import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { HMAC_ALGORITHMS } from './signing.js';

const ConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(4000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ISSUER_URL: z.string().url().default('http://localhost:4000'),
    JWT_SECRET: z.string().min(1).optional(),
    JWT_ALGORITHM: z.enum(HMAC_ALGORITHMS).default('HS256'),
    TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(900),
    TOKEN_MAX_USES: z.coerce.number().int().positive().default(1000),
    CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(0),
    STORE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().optional(),
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    ADMIN_USERNAME: z.string().min(1).default('admin'),
    ADMIN_PASSWORD: z.string().min(1).optional(),
  })
  .superRefine((data, ctx) => {
    if (data.NODE_ENV === 'production' && !data.JWT_SECRET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['JWT_SECRET'], message: 'required in production' });
    }
    if (data.NODE_ENV === 'production' && !data.ADMIN_PASSWORD) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ADMIN_PASSWORD'], message: 'required in production' });
    }
    if (data.STORE_DRIVER === 'redis' && !data.REDIS_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_URL'], message: 'required when STORE_DRIVER=redis' });
    }
  });

type ParsedConfig = z.infer<typeof ConfigSchema>;

export type AppConfig = Omit<ParsedConfig, 'JWT_SECRET' | 'ADMIN_PASSWORD'> & {
  JWT_SECRET: string;
  ADMIN_PASSWORD: string;
  /** `generated` when no secret was configured and a per-process one was made up. */
  secretSource: 'env' | 'generated';
};

const DEV_ADMIN_PASSWORD = 'change-me';

/**
 * Reads configuration from `env`. Throws {@link ConfigError} when startup
 * must not proceed, e.g. production without a signing secret.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse({
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,
    ISSUER_URL: env.ISSUER_URL,
    JWT_SECRET: env.JWT_SECRET || undefined,
    JWT_ALGORITHM: env.JWT_ALGORITHM,
    TOKEN_TTL_SECONDS: env.TOKEN_TTL_SECONDS,
    TOKEN_MAX_USES: env.TOKEN_MAX_USES,
    CLOCK_TOLERANCE_SECONDS: env.CLOCK_TOLERANCE_SECONDS,
    STORE_DRIVER: env.STORE_DRIVER,
    REDIS_URL: env.REDIS_URL,
    STORE_TIMEOUT_MS: env.STORE_TIMEOUT_MS,
    ADMIN_USERNAME: env.ADMIN_USERNAME,
    ADMIN_PASSWORD: env.ADMIN_PASSWORD || undefined,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`invalid configuration: ${issues.join('; ')}`, issues);
  }

  const { JWT_SECRET, ADMIN_PASSWORD, ...rest } = parsed.data;
  return {
    ...rest,
    JWT_SECRET: JWT_SECRET ?? randomBytes(32).toString('base64url'),
    ADMIN_PASSWORD: ADMIN_PASSWORD ?? DEV_ADMIN_PASSWORD,
    secretSource: JWT_SECRET ? 'env' : 'generated',
  };
}
