/**
 * Coordinate normalization.
 *
 * SEG-Y stores coordinates as integers with a per-trace signed scalar
 * (bytes 71–72 by default):
 *   scalar = 0  → value used as is
 *   scalar > 0  → value / scalar
 *   scalar < 0  → value × |scalar|
 *
 * After scalar resolution, an operator-supplied override factor and an
 * additive offset are applied, in that order.
 */

export type ScalarRule =
  | { kind: 'none' }
  | { kind: 'divide'; by: number }
  | { kind: 'multiply'; by: number };

export interface CoordinateAdjustment {
  /** Multiplier applied after scalar scaling. Default: 1 */
  scale?: number;
  /** Added last. Default: 0 */
  offset?: number;
}

export function classifyScalar(scalar: number): ScalarRule {
  if (scalar === 0) return { kind: 'none' };
  if (scalar > 0) return { kind: 'divide', by: scalar };
  return { kind: 'multiply', by: Math.abs(scalar) };
}

export function applyScalar(value: number, rule: ScalarRule): number {
  switch (rule.kind) {
    case 'none':
      return value;
    case 'divide':
      return value / rule.by;
    case 'multiply':
      return value * rule.by;
  }
}

/**
 * Resolve raw header values with their per-trace scalars.
 * Without scalars the values pass through unscaled.
 */
export function scaleCoordinates(
  raw: ArrayLike<number>,
  scalars?: ArrayLike<number>,
): Float64Array {
  const scaled = Float64Array.from(raw);
  if (!scalars) return scaled;

  if (scalars.length !== raw.length) {
    throw new RangeError(
      `Scalar count (${scalars.length}) does not match value count (${raw.length}).`,
    );
  }
  for (let i = 0; i < scaled.length; i++) {
    scaled[i] = applyScalar(scaled[i], classifyScalar(scalars[i]));
  }
  return scaled;
}

/** Multiply by the override scale, then add the offset. Returns a new array. */
export function applyAdjustment(
  values: ArrayLike<number>,
  adjustment: CoordinateAdjustment = {},
): Float64Array {
  const { scale = 1, offset = 0 } = adjustment;
  const out = Float64Array.from(values);
  if (scale === 1 && offset === 0) return out;
  for (let i = 0; i < out.length; i++) {
    out[i] = out[i] * scale + offset;
  }
  return out;
}

export interface NormalizeCoordinatesInput {
  rawX: ArrayLike<number>;
  rawY: ArrayLike<number>;
  scalars?: ArrayLike<number>;
  /** Shared override factor; null or undefined means none */
  scale?: number | null;
  xOffset?: number;
  yOffset?: number;
}

export function normalizeCoordinates(input: NormalizeCoordinatesInput): {
  x: Float64Array;
  y: Float64Array;
} {
  const scale = input.scale ?? 1;
  return {
    x: applyAdjustment(scaleCoordinates(input.rawX, input.scalars), {
      scale,
      offset: input.xOffset ?? 0,
    }),
    y: applyAdjustment(scaleCoordinates(input.rawY, input.scalars), {
      scale,
      offset: input.yOffset ?? 0,
    }),
  };
}
