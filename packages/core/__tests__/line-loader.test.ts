import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  amplitudeRange,
  buildTimeAxis,
  globalAmplitudeRange,
  inspectFile,
  lineNameFromPath,
  loadLine,
  previewHeader,
  traceAt,
} from '../src/line-loader.js';
import { DecodeFailure, NotFoundError } from '../src/errors.js';
import { makeTempDir, sampleLine, writeSegy } from './fixtures.js';

let dir: string;
let linePath: string;

beforeAll(() => {
  dir = makeTempDir();
  linePath = writeSegy(dir, 'line-a.sgy', sampleLine());
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('loadLine', () => {
  it('assembles samples, axes and scaled geometry', () => {
    const line = loadLine(linePath);

    expect(line.samples.rows).toBe(line.metadata.traceCount);
    expect(line.samples.columns).toBe(line.metadata.sampleCount);
    expect(line.timesMs.length).toBe(line.metadata.sampleCount);
    expect(Array.from(line.timesMs)).toEqual([0, 4, 8, 12]);

    // scalars -10 / 10 / 0
    expect(Array.from(line.x)).toEqual([0, 3, 6]);
    expect(Array.from(line.y)).toEqual([0, 4, 8]);
    expect(Array.from(line.distance)).toEqual([0, 5, 10]);
    expect(Array.from(line.cdp)).toEqual([100, 101, 102]);
  });

  it('records every resolved field and adjustment in the metadata', () => {
    const line = loadLine(linePath);
    expect(line.metadata).toEqual({
      name: 'line-a',
      path: linePath,
      traceCount: 3,
      sampleCount: 4,
      sampleIntervalUs: 4000,
      sampleUnits: 'ms',
      coordinateUnits: 'm',
      xField: 'SourceX',
      yField: 'SourceY',
      cdpField: 'CDP',
      scalarField: 'SourceGroupScalar',
      scalarOverride: null,
      xOffset: 0,
      yOffset: 0,
      sampleFormat: 'IEEE float32',
      endianness: 'big',
    });
  });

  it('leaves coordinates unscaled without a scalar field', () => {
    const line = loadLine(linePath, { scalarField: null });
    expect(Array.from(line.x)).toEqual([0, 30, 6]);
    expect(Array.from(line.y)).toEqual([0, 40, 8]);
    expect(Array.from(line.distance)).toEqual([0, 50, 90]);
    expect(line.metadata.scalarField).toBeNull();
  });

  it('applies override scale then offsets after the scalar', () => {
    const line = loadLine(linePath, {
      scalarOverride: 2,
      xOffset: 100,
      yOffset: -1,
      coordinateUnits: 'ft',
    });

    expect(Array.from(line.x)).toEqual([100, 106, 112]);
    expect(Array.from(line.y)).toEqual([-1, 7, 15]);
    expect(Array.from(line.distance)).toEqual([0, 10, 20]);
    expect(line.metadata).toMatchObject({
      scalarOverride: 2,
      xOffset: 100,
      yOffset: -1,
      coordinateUnits: 'ft',
    });
  });

  it('synthesizes CDP from trace indices when no CDP field is configured', () => {
    const line = loadLine(linePath, { cdpField: null });
    expect(Array.from(line.cdp)).toEqual([0, 1, 2]);
    expect(line.metadata.cdpField).toBeNull();
  });

  it('records no CDP or scalar field when neither could be read', () => {
    const line = loadLine(linePath, { cdpField: 999, scalarField: 998 });

    expect(Array.from(line.cdp)).toEqual([0, 1, 2]);
    expect(Array.from(line.x)).toEqual([0, 30, 6]);
    expect(Array.from(line.y)).toEqual([0, 40, 8]);
    expect(line.metadata.cdpField).toBeNull();
    expect(line.metadata.scalarField).toBeNull();
  });

  it('substitutes zeros for an X field outside the header layout', () => {
    const line = loadLine(linePath, { xField: 999 });
    expect(Array.from(line.x)).toEqual([0, 0, 0]);
    expect(Array.from(line.distance)).toEqual([0, 4, 8]);
    expect(line.metadata.xField).toBe('999');
    expect(console.warn).toHaveBeenCalledWith(
      `[SEGY] ${linePath}: X field 999 not found, using zeros.`,
    );
  });

  it('reads alternative coordinate fields', () => {
    const path = writeSegy(dir, 'cdp-xy.sgy', {
      traces: [
        { headers: { 181: 100, 185: 200, 71: 0 }, samples: [1] },
        { headers: { 181: 400, 185: 600, 71: 0 }, samples: [2] },
      ],
    });
    const line = loadLine(path, { xField: 181, yField: 185 });
    expect(Array.from(line.x)).toEqual([100, 400]);
    expect(Array.from(line.y)).toEqual([200, 600]);
    expect(Array.from(line.distance)).toEqual([0, 500]);
    expect(line.metadata.xField).toBe('CDP_X');
  });

  it('defaults the sample interval to 1000 µs when none is recorded', () => {
    const path = writeSegy(dir, 'no-dt.sgy', { ...sampleLine(), intervalUs: 0 });
    const line = loadLine(path);
    expect(line.metadata.sampleIntervalUs).toBe(1000);
    expect(Array.from(line.timesMs)).toEqual([0, 1, 2, 3]);
  });

  it('has a strictly increasing time axis with a constant step', () => {
    const path = writeSegy(dir, 'dt-2500.sgy', {
      intervalUs: 2500,
      traces: [{ samples: [0, 0, 0, 0, 0] }],
    });
    const { timesMs, metadata } = loadLine(path);
    const step = metadata.sampleIntervalUs / 1000;

    expect(timesMs[0]).toBe(0);
    for (let i = 1; i < timesMs.length; i++) {
      expect(timesMs[i] - timesMs[i - 1]).toBeCloseTo(step, 6);
      expect(timesMs[i]).toBeGreaterThan(timesMs[i - 1]);
    }
  });

  it('keeps distance at zero for coincident traces', () => {
    const path = writeSegy(dir, 'stacked.sgy', {
      traces: [0, 1, 2].map(() => ({ headers: { 73: 50, 77: 50 }, samples: [0] })),
    });
    expect(Array.from(loadLine(path).distance)).toEqual([0, 0, 0]);
  });

  it('uses a configured name instead of the file stem', () => {
    expect(loadLine(linePath, { name: 'custom' }).metadata.name).toBe('custom');
  });

  it('is deterministic', () => {
    expect(loadLine(linePath)).toEqual(loadLine(linePath));
  });

  it('throws NotFoundError for a missing file', () => {
    expect(() => loadLine(join(dir, 'missing.sgy'))).toThrow(NotFoundError);
  });

  it('propagates DecodeFailure for a corrupt file', () => {
    const truncated = join(dir, 'truncated.sgy');
    writeFileSync(truncated, new Uint8Array(1000));
    expect(() => loadLine(truncated)).toThrow(DecodeFailure);

    const unknownFormat = writeSegy(dir, 'fmt99.sgy', { format: 99, traces: [{ samples: [] }] });
    expect(() => loadLine(unknownFormat)).toThrow(/unrecognized sample format code 99/);
  });
});

describe('inspectFile', () => {
  it('summarizes headers without loading samples', () => {
    const info = inspectFile(linePath);
    expect(info).toMatchObject({
      path: linePath,
      traceCount: 3,
      sampleCount: 4,
      sampleIntervalUs: 4000,
      sampleFormat: 'IEEE float32',
      endianness: 'big',
      binaryHeader: { Traces: 3, Interval: 4000, Samples: 4, Format: 5, SEGYRevision: 1 },
    });
    expect(info.textHeader.split('\n')[0]).toBe('C 1 SYNTHETIC LINE');
  });

  it('reports the default interval when the file has none', () => {
    const path = writeSegy(dir, 'inspect-no-dt.sgy', { ...sampleLine(), intervalUs: 0 });
    expect(inspectFile(path).sampleIntervalUs).toBe(1000);
  });
});

describe('previewHeader', () => {
  it('returns raw values for the first traces', () => {
    expect(previewHeader(linePath, 73, 2)).toEqual({ field: 73, name: 'SourceX', values: [0, 30] });
    expect(previewHeader(linePath, 71).values).toEqual([-10, 10, 0]);
  });

  it('returns an empty preview for a field outside the layout', () => {
    expect(previewHeader(linePath, 999, 5)).toEqual({ field: 999, name: '999', values: [] });
  });

  it('still fails for a missing file', () => {
    expect(() => previewHeader(join(dir, 'missing.sgy'), 73)).toThrow(NotFoundError);
  });
});

describe('line helpers', () => {
  it('derives names from file stems', () => {
    expect(lineNameFromPath('/data/survey/L-001.sgy')).toBe('L-001');
    expect(lineNameFromPath('relative/line.segy')).toBe('line');
    expect(lineNameFromPath('noext')).toBe('noext');
  });

  it('builds a time axis from the interval', () => {
    expect(Array.from(buildTimeAxis(3, 2500))).toEqual([0, 2.5, 5]);
    expect(buildTimeAxis(0, 1000).length).toBe(0);
  });

  it('returns one trace as a view into the grid', () => {
    const line = loadLine(linePath);
    expect(Array.from(traceAt(line.samples, 2))).toEqual([-1, -2.5, 8, 0.5]);
    expect(() => traceAt(line.samples, 3)).toThrow(RangeError);
  });

  it('measures amplitude range ignoring NaN', () => {
    expect(amplitudeRange(loadLine(linePath))).toEqual([-2.5, 8]);

    const path = writeSegy(dir, 'nan.sgy', { traces: [{ samples: [Number.NaN, 1, -3] }] });
    expect(amplitudeRange(loadLine(path))).toEqual([-3, 1]);
  });

  it('combines amplitude ranges across lines', () => {
    const a = loadLine(linePath);
    const path = writeSegy(dir, 'loud.sgy', { traces: [{ samples: [20, -1] }] });
    expect(globalAmplitudeRange([a, loadLine(path)])).toEqual([-2.5, 20]);
    expect(globalAmplitudeRange([])).toEqual([0, 1]);
  });
});
