/**
 * @seisline/core — Main entry point
 */

// ─── Types ──────────────────────────────────────────────────────────────────

export type {
  FieldCode,
  TraceFieldLayout,
  Endianness,
  SampleGrid,
  LineMetadata,
  Line,
  FileInfo,
  HeaderPreview,
  LoadConfig,
  LoadConfigInput,
  LoadFailure,
  LoadManyResult,
} from './types.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export {
  SegyError,
  NotFoundError,
  FieldNotFoundError,
  DecodeFailure,
  InvalidConfigError,
} from './errors.js';
export type { ConfigIssue } from './errors.js';

// ─── Config ─────────────────────────────────────────────────────────────────

export {
  DEFAULT_LOAD_CONFIG,
  DEFAULT_SAMPLE_INTERVAL_US,
  DEFAULT_PREVIEW_TRACES,
  resolveLoadConfig,
} from './config.js';

// ─── Header field catalog ───────────────────────────────────────────────────

export {
  TraceField,
  DEFAULT_X_FIELD,
  DEFAULT_Y_FIELD,
  DEFAULT_CDP_FIELD,
  DEFAULT_SCALAR_FIELD,
  resolveFieldName,
  listAvailableFields,
  getFieldLayout,
} from './trace-fields.js';

// ─── File handle ────────────────────────────────────────────────────────────

export { SegyFile, withSegyFile } from './segy-file.js';
export { ibmToIeee, getSampleFormat } from './sample-formats.js';
export type { SampleFormat } from './sample-formats.js';
export { decodeTextHeader, wrapCards } from './text-header.js';

// ─── Coordinates & geometry ─────────────────────────────────────────────────

export {
  classifyScalar,
  applyScalar,
  scaleCoordinates,
  applyAdjustment,
  normalizeCoordinates,
} from './coordinates.js';
export type { ScalarRule, CoordinateAdjustment, NormalizeCoordinatesInput } from './coordinates.js';

export { cumulativeDistance, lineLength } from './geometry.js';

// ─── Line loading ───────────────────────────────────────────────────────────

export {
  loadLine,
  inspectFile,
  previewHeader,
  lineNameFromPath,
  buildTimeAxis,
  traceAt,
  amplitudeRange,
  globalAmplitudeRange,
} from './line-loader.js';

export { loadMany, uniqueLineName } from './multi-loader.js';
export type { LoadManyOptions } from './multi-loader.js';
