import { z } from 'zod';

export type SchemaValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationIssue[] };

export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  expected?: string;
  received?: string;
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
    expected: 'expected' in issue ? String(issue.expected) : undefined,
    received: 'received' in issue ? String(issue.received) : undefined,
  }));
}

export function validateSchema<T>(schema: Schema<T>, data: unknown): SchemaValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { valid: true, data: result.data };
  }

  return { valid: false, errors: toValidationIssues(result.error) };
}

export function isValidSchema<T>(schema: Schema<T>, data: unknown): data is T {
  return schema.safeParse(data).success;
}

export class SchemaValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const message = issues.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Schema validation failed: ${message}`);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

export function validateOrThrow<T>(schema: Schema<T>, data: unknown): T {
  const result = validateSchema(schema, data);
  if (!result.valid) {
    throw new SchemaValidationError(result.errors);
  }
  return result.data;
}
