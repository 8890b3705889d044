/**
 * @seisline/core — Type definitions
 *
 * Axis convention for a loaded line:
 *   rows    = traces, in file order (trace-indexed arrays share this length)
 *   columns = samples along the time axis (milliseconds from 0)
 *
 * Amplitudes are stored as a Float32Array in row-major order: [trace][sample]
 */

// ─── Header fields ──────────────────────────────────────────────────────────

/** Trace-header byte position (1-based), e.g. 73 for SourceX. */
export type FieldCode = number;

export interface TraceFieldLayout {
  byte: FieldCode;
  name: string;
  /** Width in bytes (2 or 4) */
  size: 2 | 4;
  signed: boolean;
}

// ─── File layout ────────────────────────────────────────────────────────────

export type Endianness = 'big' | 'little';

export interface SampleGrid {
  data: Float32Array;
  /** Number of traces */
  rows: number;
  /** Samples per trace */
  columns: number;
}

// ─── Line ───────────────────────────────────────────────────────────────────

export interface LineMetadata {
  /** Unique within a loaded set; rewritten on name collision */
  name: string;
  path: string;
  traceCount: number;
  sampleCount: number;
  sampleIntervalUs: number;
  sampleUnits: string;
  coordinateUnits: string;
  xField: string;
  yField: string;
  /** null when CDP was synthesized from trace indices */
  cdpField: string | null;
  /** null when coordinates were read without scalar scaling */
  scalarField: string | null;
  scalarOverride: number | null;
  xOffset: number;
  yOffset: number;
  sampleFormat: string;
  endianness: Endianness;
}

export interface Line {
  metadata: LineMetadata;
  samples: SampleGrid;
  /** Sample times in ms, length = sampleCount */
  timesMs: Float32Array;
  /** Cumulative along-line distance, length = traceCount */
  distance: Float64Array;
  x: Float64Array;
  y: Float64Array;
  cdp: Float64Array;
}

// ─── Inspection ─────────────────────────────────────────────────────────────

export interface FileInfo {
  path: string;
  traceCount: number;
  sampleCount: number;
  sampleIntervalUs: number;
  /** Textual header decoded to ASCII, 80-column cards joined by newlines */
  textHeader: string;
  binaryHeader: Record<string, number>;
  sampleFormat: string;
  endianness: Endianness;
}

export interface HeaderPreview {
  field: FieldCode;
  name: string;
  /** Raw (unscaled) values of the first traces; empty when the field is absent */
  values: number[];
}

// ─── Load configuration ─────────────────────────────────────────────────────

export interface LoadConfig {
  xField: FieldCode;
  yField: FieldCode;
  /** null ⇒ CDP synthesized as 0..traceCount-1 */
  cdpField: FieldCode | null;
  /** null ⇒ coordinates are not scalar-scaled */
  scalarField: FieldCode | null;
  /** Manual factor applied after scalar scaling; null ⇒ no override */
  scalarOverride: number | null;
  xOffset: number;
  yOffset: number;
  coordinateUnits: string;
  /** Line name; defaults to the file stem */
  name?: string;
}

export type LoadConfigInput = Partial<LoadConfig>;

// ─── Multi-file loading ─────────────────────────────────────────────────────

export interface LoadFailure {
  path: string;
  error: Error;
}

export interface LoadManyResult {
  /** Keyed by final (unique) line name, in load order */
  lines: Map<string, Line>;
  failures: LoadFailure[];
}
