import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_URL: z.string().optional(),
  DATABASE_NAME: z.string().optional(),
  AWS_REGION: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),
});

export interface AppConfig {
  port: number;
  host: string;
  /** DynamoDB endpoint. */
  databaseUrl: string | undefined;
  /** DynamoDB table holding every collection. */
  databaseName: string | undefined;
  region: string | undefined;
  /** `true` allows any origin. */
  corsOrigins: string[] | true;
}

export class ConfigError extends Error {
  constructor(readonly validationError: z.ZodError) {
    super(`Invalid environment:\n${z.prettifyError(validationError)}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Unset and empty variables are treated alike, so blanks fall back to defaults.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(result.error);
  }

  const { PORT, HOST, DATABASE_URL, DATABASE_NAME, AWS_REGION, CORS_ORIGINS } = result.data;
  const origins = CORS_ORIGINS?.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    port: PORT,
    host: HOST,
    databaseUrl: DATABASE_URL,
    databaseName: DATABASE_NAME,
    region: AWS_REGION,
    corsOrigins: origins && origins.length > 0 ? origins : true,
  };
}
