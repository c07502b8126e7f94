import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment schema.
 *
 * Values arrive as strings; numbers and flags are coerced here so the rest
 * of the app can read them typed through ConfigService.
 */
export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_DATABASE: z.string().min(1).default('crane_monitoring'),
  DB_SYNCHRONIZE: booleanFlag.default('false'),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  PERSISTENCE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  PERSISTENCE_RETRY_BASE_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(200),

  MQTT_ENABLED: booleanFlag.default('true'),
  MQTT_URL: z.string().url().default('mqtt://localhost:1883'),
  MQTT_USERNAME: z.string().optional(),
  MQTT_PASSWORD: z.string().optional(),
  MQTT_CLIENT_ID: z.string().optional(),
  MQTT_QOS: z.coerce
    .number()
    .int()
    .refine((qos): qos is 0 | 1 | 2 => qos === 0 || qos === 1 || qos === 2, {
      message: 'MQTT_QOS must be 0, 1 or 2',
    })
    .default(1),
});

export type EnvironmentVariables = z.infer<typeof envSchema>;

/**
 * ConfigModule `validate` hook.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}
