import { z } from 'zod';
import { PROTOCOL_CONSTANTS } from '@stablecore/types';
import type { Address } from '@stablecore/types';
import { isValidAddress } from '@stablecore/utils';

// ============================================================================
// Primitive Schemas
// ============================================================================

export const addressSchema = z.custom<Address>(
  (value) => typeof value === 'string' && isValidAddress(value),
  'Invalid address: expected 0x followed by 40 hex characters'
);

export const networkIdSchema = z.enum(['anvil', 'sepolia']);

// ============================================================================
// Engine Schemas
// ============================================================================

// Asset/feed length parity is checked by the engine itself so the failure
// carries the engine's error code.
export const engineConfigSchema = z.object({
  collateralTokens: z.array(addressSchema),
  priceFeeds: z.array(addressSchema),
  maxPriceAgeSeconds: z.number()
    .int('Must be a whole number of seconds')
    .nonnegative('Must be non-negative')
    .default(PROTOCOL_CONSTANTS.DEFAULT_MAX_PRICE_AGE_SECONDS),
  maxRetainedEvents: z.number()
    .int('Must be a whole number of events')
    .nonnegative('Must be non-negative')
    .optional(),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type EngineConfig = z.output<typeof engineConfigSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: Record<string, string> };

export function validateSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors: Record<string, string> = {};
  result.error.issues.forEach((issue) => {
    const path = issue.path.join('.') || '(root)';
    errors[path] = issue.message;
  });

  return { success: false, errors };
}

export function validateEngineConfig(data: unknown): ValidationResult<EngineConfig> {
  return validateSchema(engineConfigSchema, data);
}
