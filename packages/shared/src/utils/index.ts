import { z } from 'zod';

export function validateConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }
  return result.data;
}

export * from './errors';
export * from './patterns';
export * from './time';
export * from './validation';

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
