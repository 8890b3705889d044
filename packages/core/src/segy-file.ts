/**
 * SEG-Y file handle.
 *
 * Layout:
 *   Bytes     0–3199 : textual header (40 × 80 cards)
 *   Bytes  3200–3599 : binary header
 *   then N × 3200    : extended textual headers (rev 1+, count at 3505)
 *   then traces      : 240-byte trace header + sampleCount × bytesPerSample
 *
 * Binary-header byte positions below are 1-based, as printed in the
 * SEG-Y standard; file offsets are `position - 1`.
 */

import { closeSync, existsSync, fstatSync, openSync, readSync, statSync } from 'node:fs';
import { DecodeFailure, FieldNotFoundError, NotFoundError } from './errors.js';
import { decodeSamples, getSampleFormat } from './sample-formats.js';
import type { SampleFormat } from './sample-formats.js';
import { TEXT_HEADER_SIZE, decodeTextHeader, wrapCards } from './text-header.js';
import { TRACE_HEADER_SIZE, TraceField, getFieldLayout } from './trace-fields.js';
import type { Endianness, FieldCode, SampleGrid, TraceFieldLayout } from './types.js';

const BINARY_HEADER_SIZE = 400;
const FILE_HEADER_SIZE = TEXT_HEADER_SIZE + BINARY_HEADER_SIZE;
const BYTE_ORDER_MARK = 0x01020304;
const MAX_REVISION = 2;

type BinaryFieldType = 'uint8' | 'int16' | 'uint16' | 'int32';

interface BinaryHeaderField {
  key: string;
  position: number;
  type: BinaryFieldType;
  /** Lowest major revision that defines the field */
  minRevision: number;
}

const BINARY_SUMMARY_FIELDS: readonly BinaryHeaderField[] = [
  { key: 'Traces', position: 3213, type: 'int16', minRevision: 0 },
  { key: 'Interval', position: 3217, type: 'uint16', minRevision: 0 },
  { key: 'Samples', position: 3221, type: 'uint16', minRevision: 0 },
  { key: 'Format', position: 3225, type: 'int16', minRevision: 0 },
  { key: 'SEGYRevision', position: 3501, type: 'uint8', minRevision: 0 },
  { key: 'ExtTraces', position: 3261, type: 'int32', minRevision: 2 },
  { key: 'ExtSamples', position: 3269, type: 'int32', minRevision: 2 },
];

function readBinaryField(
  view: DataView,
  position: number,
  type: BinaryFieldType,
  littleEndian: boolean,
): number {
  const offset = position - 1;
  switch (type) {
    case 'uint8':
      return view.getUint8(offset);
    case 'int16':
      return view.getInt16(offset, littleEndian);
    case 'uint16':
      return view.getUint16(offset, littleEndian);
    case 'int32':
      return view.getInt32(offset, littleEndian);
  }
}

function viewOf(buf: Buffer): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

/**
 * Byte order: the rev-2 byte-order constant at 3297 when present, else the
 * sample-format code, which only one byte order decodes to a known value.
 */
function detectEndianness(header: DataView): Endianness | undefined {
  const mark = header.getUint32(3296, false);
  if (mark === BYTE_ORDER_MARK) return 'big';
  if (mark === 0x04030201) return 'little';

  const codeBig = header.getInt16(3224, false);
  const codeLittle = header.getInt16(3224, true);
  if (codeBig === 4 || getSampleFormat(codeBig)) return 'big';
  if (codeLittle === 4 || getSampleFormat(codeLittle)) return 'little';
  return undefined;
}

export class SegyFile {
  readonly path: string;
  readonly endianness: Endianness;
  readonly sampleFormat: SampleFormat;
  /** Major revision from byte 3501; 0 for pre-1.0 files and unknown values */
  readonly revision: number;
  readonly traceCount: number;
  readonly sampleCount: number;
  /** Sample interval in µs; undefined when the file records none */
  readonly sampleIntervalUs: number | undefined;

  private fd: number | undefined;
  private readonly header: DataView;
  private readonly dataOffset: number;
  private readonly traceSize: number;

  private constructor(path: string, fd: number) {
    this.path = path;
    this.fd = fd;

    const fileSize = fstatSync(fd).size;
    if (fileSize < FILE_HEADER_SIZE) {
      throw new DecodeFailure(
        path,
        `file is ${fileSize} bytes, smaller than the ${FILE_HEADER_SIZE}-byte file header`,
      );
    }
    this.header = viewOf(this.readExact(0, FILE_HEADER_SIZE));

    const endianness = detectEndianness(this.header);
    if (!endianness) {
      throw new DecodeFailure(
        path,
        `unrecognized sample format code ${this.header.getInt16(3224, false)}`,
      );
    }
    if (endianness === 'little') {
      console.warn(`[SEGY] ${path}: binary header is little-endian, reading file as little-endian.`);
    }
    this.endianness = endianness;
    const le = endianness === 'little';

    const formatCode = this.header.getInt16(3224, le);
    const format = getSampleFormat(formatCode);
    if (!format) {
      throw new DecodeFailure(path, `sample format code ${formatCode} is not supported`);
    }
    this.sampleFormat = format;
    const revisionByte = this.header.getUint8(3500);
    if (revisionByte > MAX_REVISION) {
      console.warn(
        `[SEGY] ${path}: unknown revision byte ${revisionByte}, reading file as revision 0.`,
      );
    }
    this.revision = revisionByte <= MAX_REVISION ? revisionByte : 0;

    this.dataOffset = FILE_HEADER_SIZE + this.resolveExtendedHeaders(fileSize) * TEXT_HEADER_SIZE;

    this.sampleCount = this.resolveSampleCount(fileSize);
    if (this.sampleCount <= 0) {
      throw new DecodeFailure(path, 'sample count is zero in both binary and trace headers');
    }

    this.traceSize = TRACE_HEADER_SIZE + this.sampleCount * format.bytesPerSample;
    const dataBytes = fileSize - this.dataOffset;
    this.traceCount = Math.floor(dataBytes / this.traceSize);
    const trailing = dataBytes - this.traceCount * this.traceSize;
    if (trailing > 0) {
      console.warn(
        `[SEGY] ${path}: ignoring ${trailing} trailing byte(s) after trace ${this.traceCount}.`,
      );
    }

    this.sampleIntervalUs = this.resolveSampleInterval();
  }

  /**
   * Open a file and decode its structural headers.
   * The caller owns the handle; see `withSegyFile` for scoped use.
   */
  static open(path: string): SegyFile {
    if (!existsSync(path)) {
      throw new NotFoundError(path);
    }
    if (!statSync(path).isFile()) {
      throw new DecodeFailure(path, 'not a regular file');
    }

    const fd = openSync(path, 'r');
    try {
      return new SegyFile(path, fd);
    } catch (err) {
      closeSync(fd);
      throw err;
    }
  }

  get isOpen(): boolean {
    return this.fd !== undefined;
  }

  close(): void {
    if (this.fd === undefined) return;
    closeSync(this.fd);
    this.fd = undefined;
  }

  // ─── Samples ──────────────────────────────────────────────────────────────

  /** Every trace's samples stacked into one row-major grid, file order. */
  readAllSamples(): SampleGrid {
    const rows = this.traceCount;
    const columns = this.sampleCount;
    const data = new Float32Array(rows * columns);
    const le = this.endianness === 'little';

    for (let t = 0; t < rows; t++) {
      const buf = this.readExact(
        this.traceOffset(t) + TRACE_HEADER_SIZE,
        this.traceSize - TRACE_HEADER_SIZE,
      );
      decodeSamples(viewOf(buf), 0, columns, this.sampleFormat, le, data, t * columns);
    }

    return { data, rows, columns };
  }

  // ─── Trace headers ────────────────────────────────────────────────────────

  /** One value per trace for a trace-header field. */
  readAttribute(field: FieldCode): Float64Array {
    return this.readAttributeRange(field, this.traceCount);
  }

  /** Values of a field for the first `limit` traces. */
  readAttributeRange(field: FieldCode, limit: number): Float64Array {
    const layout = getFieldLayout(field);
    if (!layout) {
      throw new FieldNotFoundError(field);
    }
    const count = Math.max(0, Math.min(limit, this.traceCount));
    const values = new Float64Array(count);
    for (let t = 0; t < count; t++) {
      values[t] = this.readTraceHeaderValue(t, layout);
    }
    return values;
  }

  // ─── File headers ─────────────────────────────────────────────────────────

  /** Textual header decoded to ASCII as 40 newline-separated cards. */
  readTextHeader(): string {
    const bytes = new Uint8Array(
      this.header.buffer,
      this.header.byteOffset,
      TEXT_HEADER_SIZE,
    );
    return wrapCards(decodeTextHeader(bytes));
  }

  /** Small fixed set of binary-header integers; fields newer than the file's revision are left out. */
  readBinaryHeaderSummary(): Record<string, number> {
    const le = this.endianness === 'little';
    const summary: Record<string, number> = {};
    for (const field of BINARY_SUMMARY_FIELDS) {
      if (this.revision < field.minRevision) continue;
      summary[field.key] = readBinaryField(this.header, field.position, field.type, le);
    }
    return summary;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private traceOffset(index: number): number {
    return this.dataOffset + index * this.traceSize;
  }

  private readTraceHeaderValue(index: number, layout: TraceFieldLayout): number {
    const view = viewOf(this.readExact(this.traceOffset(index) + layout.byte - 1, layout.size));
    const le = this.endianness === 'little';
    if (layout.size === 2) {
      return layout.signed ? view.getInt16(0, le) : view.getUint16(0, le);
    }
    return layout.signed ? view.getInt32(0, le) : view.getUint32(0, le);
  }

  /** Extended textual header count at 3505; revision 1+ only, and only if the headers fit in the file. */
  private resolveExtendedHeaders(fileSize: number): number {
    if (this.revision < 1) return 0;
    const count = this.header.getInt16(3504, this.endianness === 'little');
    if (count < 0) {
      throw new DecodeFailure(this.path, 'a variable number of extended textual headers is not supported');
    }
    if (FILE_HEADER_SIZE + count * TEXT_HEADER_SIZE > fileSize) {
      console.warn(
        `[SEGY] ${this.path}: ${count} extended textual header(s) do not fit in the file, ignoring them.`,
      );
      return 0;
    }
    return count;
  }

  private resolveSampleCount(fileSize: number): number {
    const le = this.endianness === 'little';
    const binary = this.header.getUint16(3220, le);
    if (binary > 0) return binary;

    if (this.revision >= 2) {
      const extended = this.header.getInt32(3268, le);
      if (extended > 0) return extended;
    }

    if (fileSize >= this.dataOffset + TRACE_HEADER_SIZE) {
      const view = viewOf(this.readExact(this.dataOffset + TraceField.TRACE_SAMPLE_COUNT - 1, 2));
      return view.getUint16(0, le);
    }
    return 0;
  }

  /**
   * Binary header interval first (rev-2 extended interval when the short
   * field is zero), then the first trace header's interval.
   */
  private resolveSampleInterval(): number | undefined {
    const le = this.endianness === 'little';
    let binary = this.header.getUint16(3216, le);
    if (binary === 0 && this.revision >= 2) {
      const extended = this.header.getFloat64(3272, le);
      if (Number.isFinite(extended) && extended > 0) binary = extended;
    }

    let trace = 0;
    if (this.traceCount > 0) {
      const view = viewOf(this.readExact(this.dataOffset + TraceField.TRACE_SAMPLE_INTERVAL - 1, 2));
      trace = view.getUint16(0, le);
    }

    if (binary > 0 && trace > 0 && binary !== trace) {
      console.warn(
        `[SEGY] ${this.path}: binary header interval ${binary} µs differs from ` +
        `trace header interval ${trace} µs, using ${binary} µs.`,
      );
    }
    if (binary > 0) return binary;
    if (trace > 0) return trace;
    return undefined;
  }

  private readExact(position: number, length: number): Buffer {
    if (this.fd === undefined) {
      throw new Error(`SEG-Y file ${this.path} is closed.`);
    }
    const buf = Buffer.alloc(length);
    let read = 0;
    while (read < length) {
      const n = readSync(this.fd, buf, read, length - read, position + read);
      if (n === 0) {
        throw new DecodeFailure(this.path, `unexpected end of file at byte ${position + read}`);
      }
      read += n;
    }
    return buf;
  }
}

/** Open `path`, run `fn`, and close the handle on every exit path. */
export function withSegyFile<T>(path: string, fn: (file: SegyFile) => T): T {
  const file = SegyFile.open(path);
  try {
    return fn(file);
  } finally {
    file.close();
  }
}
