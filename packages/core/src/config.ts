/**
 * Load configuration: which trace-header fields carry X, Y, CDP and the
 * coordinate scalar, plus manual adjustments applied at load time.
 */

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import {
  DEFAULT_CDP_FIELD,
  DEFAULT_SCALAR_FIELD,
  DEFAULT_X_FIELD,
  DEFAULT_Y_FIELD,
} from './trace-fields.js';
import type { LoadConfig, LoadConfigInput } from './types.js';

/** Used when neither binary nor trace headers record a sample interval. */
export const DEFAULT_SAMPLE_INTERVAL_US = 1000;

/** Header preview depth used by import configuration screens. */
export const DEFAULT_PREVIEW_TRACES = 20;

export const DEFAULT_LOAD_CONFIG: LoadConfig = {
  xField: DEFAULT_X_FIELD,
  yField: DEFAULT_Y_FIELD,
  cdpField: DEFAULT_CDP_FIELD,
  scalarField: DEFAULT_SCALAR_FIELD,
  scalarOverride: null,
  xOffset: 0,
  yOffset: 0,
  coordinateUnits: 'm',
};

const fieldCode = z.number().int().positive();

const loadConfigSchema = z.object({
  xField: fieldCode,
  yField: fieldCode,
  cdpField: fieldCode.nullable(),
  scalarField: fieldCode.nullable(),
  scalarOverride: z.number().finite().positive().nullable(),
  xOffset: z.number().finite(),
  yOffset: z.number().finite(),
  coordinateUnits: z
    .string()
    .transform((value) => value.trim())
    .transform((value) => (value.length > 0 ? value : 'm')),
  name: z
    .string()
    .transform((value) => value.trim())
    .pipe(z.string().min(1))
    .optional(),
});

/**
 * Merge a partial configuration over the defaults and validate it.
 * Keys explicitly set to undefined keep their default.
 */
export function resolveLoadConfig(input: LoadConfigInput = {}): LoadConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_LOAD_CONFIG };
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = loadConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return result.data;
}
