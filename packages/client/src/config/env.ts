import { toValidationIssues, z } from '@scholia/core';
import type { ValidationIssue } from '@scholia/core';

const positiveInteger = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  SCHOLIA_API_URL: z.string().url().default('http://localhost:8000'),
  SCHOLIA_REQUEST_TIMEOUT_SECONDS: positiveInteger('30'),
  SCHOLIA_MAX_ATTEMPTS: positiveInteger('3'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: ValidationIssue[]) {
    const details = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`Invalid configuration: ${details}`);
    this.name = 'ConfigError';
  }
}

let validatedEnv: Env | null = null;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigError(toValidationIssues(result.error));
  }

  validatedEnv = result.data;
  return validatedEnv;
}

export function getEnv(): Env {
  if (process.env.NODE_ENV === 'test') {
    validatedEnv = null;
  }
  if (!validatedEnv) {
    return validateEnv();
  }
  return validatedEnv;
}

export function resetEnv(): void {
  validatedEnv = null;
}
