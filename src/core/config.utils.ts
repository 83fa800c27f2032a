import { z } from 'zod';

// Environment values arrive as strings; each schema turns one into a typed setting.
export type EnvSchema<T> = z.ZodType<T, z.ZodTypeDef, string>;

/**
 * Read `key` through `schema`. Unset or blank values take the default;
 * invalid ones take it too, with a warning naming the failed checks.
 */
export function parseEnvVar<T>(key: string, defaultValue: T, schema: EnvSchema<T>): T {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const reasons = result.error.issues.map((issue) => issue.message).join('; ');
    console.warn(`Invalid value for ${key}: ${raw} (${reasons}), using default: ${String(defaultValue)}`);
    return defaultValue;
  }

  return result.data;
}

export const integerInRange = (min: number, max: number = Number.MAX_SAFE_INTEGER): EnvSchema<number> =>
  z.string()
    .trim()
    .regex(/^-?\d+$/, 'Expected an integer')
    .transform(Number)
    .pipe(z.number().int().safe().min(min).max(max));

export const oneOf = <T extends string>(allowed: readonly T[]): EnvSchema<T> =>
  z.string().transform((value, ctx) => {
    const normalized = value.trim().toLowerCase();
    const match = allowed.find((candidate) => candidate === normalized);
    if (match === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected one of ${allowed.join(', ')}` });
      return z.NEVER;
    }
    return match;
  });

export const trimmed: EnvSchema<string> = z.string().trim();

export function parsePositiveInt(key: string, defaultValue: number, max?: number): number {
  return parseEnvVar(key, defaultValue, integerInRange(1, max));
}

export function parseNonNegativeInt(key: string, defaultValue: number): number {
  return parseEnvVar(key, defaultValue, integerInRange(0));
}

export function parseEnumVar<T extends string>(key: string, defaultValue: T, allowed: readonly T[]): T {
  return parseEnvVar(key, defaultValue, oneOf(allowed));
}

export function parseStringVar(key: string, defaultValue: string): string {
  return parseEnvVar(key, defaultValue, trimmed);
}
