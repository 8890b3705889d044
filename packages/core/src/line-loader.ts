/**
 * Line assembly.
 *
 * Reads one SEG-Y file into a Line: amplitude grid, time axis, scaled
 * X/Y, CDP and cumulative distance. Also exposes the read-only
 * inspection and header-preview views used to pick header fields
 * before loading.
 */

import { basename, extname } from 'node:path';
import {
  DEFAULT_PREVIEW_TRACES,
  DEFAULT_SAMPLE_INTERVAL_US,
  resolveLoadConfig,
} from './config.js';
import { normalizeCoordinates } from './coordinates.js';
import { FieldNotFoundError } from './errors.js';
import { cumulativeDistance } from './geometry.js';
import { withSegyFile } from './segy-file.js';
import type { SegyFile } from './segy-file.js';
import { resolveFieldName } from './trace-fields.js';
import type {
  FieldCode,
  FileInfo,
  HeaderPreview,
  Line,
  LineMetadata,
  LoadConfigInput,
  SampleGrid,
} from './types.js';

/** File name without directory or extension. */
export function lineNameFromPath(path: string): string {
  return basename(path, extname(path));
}

/** Sample times in ms: times[i] = i × intervalUs / 1000. */
export function buildTimeAxis(sampleCount: number, intervalUs: number): Float32Array {
  const intervalMs = intervalUs / 1000;
  const times = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    times[i] = i * intervalMs;
  }
  return times;
}

function traceIndices(count: number): Float64Array {
  const indices = new Float64Array(count);
  for (let i = 0; i < count; i++) indices[i] = i;
  return indices;
}

/** Read a field, or undefined when the file's header layout has no such field. */
function tryReadAttribute(file: SegyFile, field: FieldCode): Float64Array | undefined {
  try {
    return file.readAttribute(field);
  } catch (err) {
    if (err instanceof FieldNotFoundError) return undefined;
    throw err;
  }
}

function readCoordinate(file: SegyFile, field: FieldCode, axis: 'X' | 'Y'): Float64Array {
  const values = tryReadAttribute(file, field);
  if (values) return values;
  console.warn(
    `[SEGY] ${file.path}: ${axis} field ${resolveFieldName(field)} not found, using zeros.`,
  );
  return new Float64Array(file.traceCount);
}

/**
 * Load a single SEG-Y line.
 *
 * @throws NotFoundError when `path` does not exist
 * @throws DecodeFailure when the structural headers cannot be decoded
 * @throws InvalidConfigError when `config` fails validation
 */
export function loadLine(path: string, config: LoadConfigInput = {}): Line {
  const cfg = resolveLoadConfig(config);

  return withSegyFile(path, (file) => {
    const samples = file.readAllSamples();
    const { rows: traceCount, columns: sampleCount } = samples;

    const intervalUs = file.sampleIntervalUs ?? DEFAULT_SAMPLE_INTERVAL_US;
    if (file.sampleIntervalUs === undefined) {
      console.warn(
        `[SEGY] ${path}: no sample interval recorded, assuming ${DEFAULT_SAMPLE_INTERVAL_US} µs.`,
      );
    }
    const timesMs = buildTimeAxis(sampleCount, intervalUs);

    const scalars = cfg.scalarField !== null ? tryReadAttribute(file, cfg.scalarField) : undefined;
    const { x, y } = normalizeCoordinates({
      rawX: readCoordinate(file, cfg.xField, 'X'),
      rawY: readCoordinate(file, cfg.yField, 'Y'),
      scalars,
      scale: cfg.scalarOverride,
      xOffset: cfg.xOffset,
      yOffset: cfg.yOffset,
    });

    const cdpValues = cfg.cdpField !== null ? tryReadAttribute(file, cfg.cdpField) : undefined;
    const cdp = cdpValues ?? traceIndices(traceCount);

    const distance = cumulativeDistance(x, y);

    const metadata: LineMetadata = {
      name: cfg.name ?? lineNameFromPath(path),
      path,
      traceCount,
      sampleCount,
      sampleIntervalUs: intervalUs,
      sampleUnits: 'ms',
      coordinateUnits: cfg.coordinateUnits,
      xField: resolveFieldName(cfg.xField),
      yField: resolveFieldName(cfg.yField),
      // null whenever the field could not be read and nothing was applied
      cdpField: cfg.cdpField !== null && cdpValues ? resolveFieldName(cfg.cdpField) : null,
      scalarField: cfg.scalarField !== null && scalars ? resolveFieldName(cfg.scalarField) : null,
      scalarOverride: cfg.scalarOverride,
      xOffset: cfg.xOffset,
      yOffset: cfg.yOffset,
      sampleFormat: file.sampleFormat.name,
      endianness: file.endianness,
    };

    console.log(
      `[SEGY] Loaded "${metadata.name}": ${traceCount} traces × ${sampleCount} samples, ` +
      `dt=${(intervalUs / 1000).toFixed(3)} ms, ${metadata.sampleFormat}, ` +
      `length ${distance.length > 0 ? distance[distance.length - 1].toFixed(1) : '0.0'} ${cfg.coordinateUnits}`,
    );

    return { metadata, samples, timesMs, distance, x, y, cdp };
  });
}

/** Summary of a file's headers, for display before import. */
export function inspectFile(path: string): FileInfo {
  return withSegyFile(path, (file) => ({
    path,
    traceCount: file.traceCount,
    sampleCount: file.sampleCount,
    sampleIntervalUs: file.sampleIntervalUs ?? DEFAULT_SAMPLE_INTERVAL_US,
    textHeader: file.readTextHeader(),
    binaryHeader: file.readBinaryHeaderSummary(),
    sampleFormat: file.sampleFormat.name,
    endianness: file.endianness,
  }));
}

/**
 * Raw values of one trace-header field for the first `maxTraces` traces.
 * A field absent from the header layout yields an empty preview.
 */
export function previewHeader(
  path: string,
  field: FieldCode,
  maxTraces: number = DEFAULT_PREVIEW_TRACES,
): HeaderPreview {
  return withSegyFile(path, (file) => {
    let values: number[] = [];
    try {
      values = Array.from(file.readAttributeRange(field, Math.floor(maxTraces)));
    } catch (err) {
      if (!(err instanceof FieldNotFoundError)) throw err;
    }
    return { field, name: resolveFieldName(field), values };
  });
}

// ─── Line helpers ───────────────────────────────────────────────────────────

/** Samples of one trace as a view into the grid. */
export function traceAt(grid: SampleGrid, index: number): Float32Array {
  if (index < 0 || index >= grid.rows) {
    throw new RangeError(`Trace index ${index} out of range 0..${grid.rows - 1}.`);
  }
  return grid.data.subarray(index * grid.columns, (index + 1) * grid.columns);
}

/** Min/max amplitude ignoring NaN; [0, 0] when there is nothing to measure. */
export function amplitudeRange(line: Line): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const v of line.samples.data) {
    if (Number.isNaN(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return min <= max ? [min, max] : [0, 0];
}

/** Amplitude bounds across several lines; [0, 1] when there are none. */
export function globalAmplitudeRange(lines: Iterable<Line>): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const line of lines) {
    const [lo, hi] = amplitudeRange(line);
    min = Math.min(min, lo);
    max = Math.max(max, hi);
  }
  return min <= max ? [min, max] : [0, 1];
}
