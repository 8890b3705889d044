/**
 * Trace sample formats (binary header bytes 3225–3226).
 *
 *   1 IBM float32     5 IEEE float32    9  int64      15 uint24
 *   2 int32           6 IEEE float64    10 uint32     16 uint8
 *   3 int16           7 int24           11 uint16
 *   4 fixed point w/ gain (obsolete, not supported)   12 uint64
 */

export interface SampleFormat {
  code: number;
  name: string;
  bytesPerSample: number;
  read(view: DataView, offset: number, littleEndian: boolean): number;
}

/**
 * Convert an IBM System/360 single-precision float to IEEE.
 * value = (-1)^sign × 0.fraction × 16^(exponent − 64)
 */
export function ibmToIeee(bits: number): number {
  if ((bits & 0x7fffffff) === 0) return 0;

  const sign = bits >>> 31;
  const exponent = (bits >>> 24) & 0x7f;
  const fraction = (bits & 0x00ffffff) / 0x1000000;

  return (sign ? -1 : 1) * fraction * Math.pow(16, exponent - 64);
}

function readInt24(view: DataView, offset: number, littleEndian: boolean): number {
  const u = readUint24(view, offset, littleEndian);
  return u & 0x800000 ? u - 0x1000000 : u;
}

function readUint24(view: DataView, offset: number, littleEndian: boolean): number {
  const b0 = view.getUint8(offset);
  const b1 = view.getUint8(offset + 1);
  const b2 = view.getUint8(offset + 2);
  return littleEndian ? (b2 << 16) | (b1 << 8) | b0 : (b0 << 16) | (b1 << 8) | b2;
}

const FORMATS: readonly SampleFormat[] = [
  {
    code: 1,
    name: 'IBM float32',
    bytesPerSample: 4,
    read: (v, o, le) => ibmToIeee(v.getUint32(o, le)),
  },
  { code: 2, name: 'int32', bytesPerSample: 4, read: (v, o, le) => v.getInt32(o, le) },
  { code: 3, name: 'int16', bytesPerSample: 2, read: (v, o, le) => v.getInt16(o, le) },
  { code: 5, name: 'IEEE float32', bytesPerSample: 4, read: (v, o, le) => v.getFloat32(o, le) },
  { code: 6, name: 'IEEE float64', bytesPerSample: 8, read: (v, o, le) => v.getFloat64(o, le) },
  { code: 7, name: 'int24', bytesPerSample: 3, read: readInt24 },
  { code: 8, name: 'int8', bytesPerSample: 1, read: (v, o) => v.getInt8(o) },
  { code: 9, name: 'int64', bytesPerSample: 8, read: (v, o, le) => Number(v.getBigInt64(o, le)) },
  { code: 10, name: 'uint32', bytesPerSample: 4, read: (v, o, le) => v.getUint32(o, le) },
  { code: 11, name: 'uint16', bytesPerSample: 2, read: (v, o, le) => v.getUint16(o, le) },
  { code: 12, name: 'uint64', bytesPerSample: 8, read: (v, o, le) => Number(v.getBigUint64(o, le)) },
  { code: 15, name: 'uint24', bytesPerSample: 3, read: readUint24 },
  { code: 16, name: 'uint8', bytesPerSample: 1, read: (v, o) => v.getUint8(o) },
];

const FORMATS_BY_CODE = new Map(FORMATS.map((f) => [f.code, f]));

export function getSampleFormat(code: number): SampleFormat | undefined {
  return FORMATS_BY_CODE.get(code);
}

/**
 * Decode `count` consecutive samples starting at `offset` into `out`
 * at `outOffset`.
 */
export function decodeSamples(
  view: DataView,
  offset: number,
  count: number,
  format: SampleFormat,
  littleEndian: boolean,
  out: Float32Array,
  outOffset: number,
): void {
  const step = format.bytesPerSample;
  for (let i = 0; i < count; i++) {
    out[outOffset + i] = format.read(view, offset + i * step, littleEndian);
  }
}
