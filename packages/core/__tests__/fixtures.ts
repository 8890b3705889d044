import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { getFieldLayout } from '../src/trace-fields.js';

export interface TraceSpec {
  /** Trace-header values keyed by field code */
  headers?: Record<number, number>;
  samples: number[];
}

export interface SegyFixture {
  traces: TraceSpec[];
  /** Sample format code. Default: 5 (IEEE float32) */
  format?: number;
  littleEndian?: boolean;
  /** Binary header interval (µs). Default: 2000 */
  intervalUs?: number;
  /** Trace header interval (µs) written into every trace. Default: 0 */
  traceIntervalUs?: number;
  /** Binary header sample count. Default: samples per trace */
  binarySampleCount?: number;
  textHeader?: string;
  ebcdic?: boolean;
  /** Major revision byte (3501). Default: 1 */
  revision?: number;
  extendedHeaders?: number;
  /** Extended header count written at 3505 when it should differ from `extendedHeaders` */
  declaredExtendedHeaders?: number;
  extSamples?: number;
  trailingBytes?: number;
}

const BYTES_PER_SAMPLE: Record<number, number> = { 1: 4, 2: 4, 3: 2, 5: 4, 6: 8, 8: 1, 11: 2 };

const EBCDIC_TABLE: number[] = JSON.parse(
  readFileSync(new URL('../data/ebcdic-cp037.json', import.meta.url), 'utf-8'),
);
const ASCII_TO_EBCDIC = new Map(EBCDIC_TABLE.map((code, byte) => [code, byte]));

export function ieeeToIbm(value: number): number {
  if (value === 0) return 0;
  const sign = value < 0 ? 1 : 0;
  let v = Math.abs(value);
  let exponent = 64;
  while (v >= 1) {
    v /= 16;
    exponent++;
  }
  while (v < 1 / 16) {
    v *= 16;
    exponent--;
  }
  const fraction = Math.round(v * 0x1000000);
  return ((sign << 31) | (exponent << 24) | fraction) >>> 0;
}

function writeSample(view: DataView, offset: number, format: number, value: number, le: boolean) {
  switch (format) {
    case 1:
      view.setUint32(offset, ieeeToIbm(value), le);
      return;
    case 2:
      view.setInt32(offset, value, le);
      return;
    case 3:
      view.setInt16(offset, value, le);
      return;
    case 5:
      view.setFloat32(offset, value, le);
      return;
    case 6:
      view.setFloat64(offset, value, le);
      return;
    case 8:
      view.setInt8(offset, value);
      return;
    case 11:
      view.setUint16(offset, value, le);
      return;
    default:
      throw new Error(`Fixture cannot encode sample format ${format}`);
  }
}

function encodeText(text: string, ebcdic: boolean): Uint8Array {
  const bytes = new Uint8Array(3200).fill(ebcdic ? 0x40 : 0x20);
  for (let i = 0; i < Math.min(text.length, 3200); i++) {
    const code = text.charCodeAt(i);
    bytes[i] = ebcdic ? ASCII_TO_EBCDIC.get(code) ?? 0x6f : code;
  }
  return bytes;
}

/** Build an in-memory SEG-Y file. */
export function buildSegy(fixture: SegyFixture): Uint8Array {
  const format = fixture.format ?? 5;
  const le = fixture.littleEndian ?? false;
  const bps = BYTES_PER_SAMPLE[format] ?? 4;
  const ns = fixture.traces[0]?.samples.length ?? 0;
  const ext = fixture.extendedHeaders ?? 0;
  const dataOffset = 3600 + ext * 3200;
  const traceSize = 240 + ns * bps;
  const total = dataOffset + fixture.traces.length * traceSize + (fixture.trailingBytes ?? 0);

  const bytes = new Uint8Array(total);
  const view = new DataView(bytes.buffer);

  bytes.set(encodeText(fixture.textHeader ?? 'C 1 SYNTHETIC LINE', fixture.ebcdic ?? false), 0);

  view.setInt16(3212, Math.min(fixture.traces.length, 0x7fff), le);
  view.setUint16(3216, fixture.intervalUs ?? 2000, le);
  view.setUint16(3220, fixture.binarySampleCount ?? ns, le);
  view.setInt16(3224, format, le);
  view.setUint8(3500, fixture.revision ?? 1);
  view.setInt16(3504, fixture.declaredExtendedHeaders ?? ext, le);
  if (fixture.extSamples !== undefined) view.setInt32(3268, fixture.extSamples, le);

  fixture.traces.forEach((trace, t) => {
    const start = dataOffset + t * traceSize;
    view.setUint16(start + 114, ns, le);
    view.setUint16(start + 116, fixture.traceIntervalUs ?? 0, le);
    for (const [code, value] of Object.entries(trace.headers ?? {})) {
      const field = Number(code);
      const layout = getFieldLayout(field);
      if (!layout) throw new Error(`Fixture has no layout for field ${field}`);
      if (layout.size === 2) view.setInt16(start + field - 1, value, le);
      else view.setInt32(start + field - 1, value, le);
    }
    trace.samples.forEach((s, i) => writeSample(view, start + 240 + i * bps, format, s, le));
  });

  return bytes;
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'seisline-'));
}

/** Write a fixture to `dir/relPath` and return its path. */
export function writeSegy(dir: string, relPath: string, fixture: SegyFixture): string {
  const path = join(dir, relPath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, buildSegy(fixture));
  return path;
}

/** Three traces on a 3-4-5 geometry, scalar -10 / 10 / 0. */
export function sampleLine(): SegyFixture {
  return {
    intervalUs: 4000,
    traces: [
      { headers: { 71: -10, 73: 0, 77: 0, 21: 100 }, samples: [0, 1, 2, 3] },
      { headers: { 71: 10, 73: 30, 77: 40, 21: 101 }, samples: [4, 5, 6, 7] },
      { headers: { 71: 0, 73: 6, 77: 8, 21: 102 }, samples: [-1, -2.5, 8, 0.5] },
    ],
  };
}
