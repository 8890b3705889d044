/**
 * Trace-header field catalog.
 *
 * Field codes are the 1-based byte positions of the standard 240-byte
 * trace header (SourceX = 73, CDP = 21, ...). The layout table lives in
 * data/trace-fields.json and is loaded once, at module load.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { FieldCode, TraceFieldLayout } from './types.js';

export const TRACE_HEADER_SIZE = 240;

/** Commonly used trace-header fields. */
export const TraceField = {
  TRACE_SEQUENCE_LINE: 1,
  FieldRecord: 9,
  CDP: 21,
  offset: 37,
  ElevationScalar: 69,
  SourceGroupScalar: 71,
  SourceX: 73,
  SourceY: 77,
  GroupX: 81,
  GroupY: 85,
  CoordinateUnits: 89,
  TRACE_SAMPLE_COUNT: 115,
  TRACE_SAMPLE_INTERVAL: 117,
  CDP_X: 181,
  CDP_Y: 185,
  INLINE_3D: 189,
  CROSSLINE_3D: 193,
  ShotPoint: 197,
} as const;

export const DEFAULT_X_FIELD: FieldCode = TraceField.SourceX;
export const DEFAULT_Y_FIELD: FieldCode = TraceField.SourceY;
export const DEFAULT_CDP_FIELD: FieldCode = TraceField.CDP;
export const DEFAULT_SCALAR_FIELD: FieldCode = TraceField.SourceGroupScalar;

const fieldTableSchema = z.array(
  z.object({
    byte: z.number().int().min(1).max(TRACE_HEADER_SIZE - 1),
    name: z.string().min(1),
    size: z.union([z.literal(2), z.literal(4)]),
    signed: z.boolean().default(true),
  }),
);

function loadFieldTable(): TraceFieldLayout[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../data/trace-fields.json', import.meta.url), 'utf-8'),
  );
  return fieldTableSchema.parse(raw);
}

/**
 * Lookup chain, built once: layout table entries first, then any
 * TraceField constant the table does not name.
 */
function buildCatalog(): Map<FieldCode, TraceFieldLayout> {
  const catalog = new Map<FieldCode, TraceFieldLayout>();
  for (const entry of loadFieldTable()) {
    if (!catalog.has(entry.byte)) catalog.set(entry.byte, entry);
  }
  for (const [name, byte] of Object.entries(TraceField)) {
    if (!catalog.has(byte)) catalog.set(byte, { byte, name, size: 4, signed: true });
  }
  return new Map([...catalog.entries()].sort((a, b) => a[0] - b[0]));
}

const CATALOG: ReadonlyMap<FieldCode, TraceFieldLayout> = buildCatalog();

export function getFieldLayout(field: FieldCode): TraceFieldLayout | undefined {
  return CATALOG.get(field);
}

/** Canonical name of a field, or the numeric code as a string when unknown. */
export function resolveFieldName(field: FieldCode): string {
  return CATALOG.get(field)?.name ?? String(field);
}

/** All known fields, code → name, sorted by code. */
export function listAvailableFields(): Map<FieldCode, string> {
  const fields = new Map<FieldCode, string>();
  for (const [code, layout] of CATALOG) fields.set(code, layout.name);
  return fields;
}
