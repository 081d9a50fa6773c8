import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  ENVIRONMENT: z.string().min(1).default('development'),
  API_VERSION: z.string().min(1).default('1.0.0'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  /** Directory scanned by the report listing endpoints. */
  REPORTS_DIR: z.string().min(1).default('./attack_data'),
  /** Log per-row pipeline diagnostics to the console. */
  AUDIT_DEBUG: flag,
});

export type Env = z.output<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}
