const GEOMETRY_TYPES: Record<number, string> = {
  1: 'POINT',
  2: 'LINESTRING',
  3: 'POLYGON',
  4: 'MULTIPOINT',
  5: 'MULTILINESTRING',
  6: 'MULTIPOLYGON',
  7: 'GEOMETRYCOLLECTION',
};

/**
 * Sequential reader over a WKB buffer; each geometry carries its own byte order.
 */
class WkbReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  private ensure(bytes: number): void {
    if (this.offset + bytes > this.buffer.length) {
      throw new Error(`Truncated WKB value: needed ${bytes} bytes at offset ${this.offset}`);
    }
  }

  byte(): number {
    this.ensure(1);
    return this.buffer.readUInt8(this.offset++);
  }

  uint32(littleEndian: boolean): number {
    this.ensure(4);
    const value = littleEndian ? this.buffer.readUInt32LE(this.offset) : this.buffer.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  double(littleEndian: boolean): number {
    this.ensure(8);
    const value = littleEndian ? this.buffer.readDoubleLE(this.offset) : this.buffer.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  skip(bytes: number): void {
    this.ensure(bytes);
    this.offset += bytes;
  }
}

const point = (reader: WkbReader, le: boolean): string =>
  `${reader.double(le)} ${reader.double(le)}`;

const points = (reader: WkbReader, le: boolean): string => {
  const count = reader.uint32(le);
  const parts: string[] = [];
  for (let i = 0; i < count; i++) parts.push(point(reader, le));
  return `(${parts.join(',')})`;
};

const rings = (reader: WkbReader, le: boolean): string => {
  const count = reader.uint32(le);
  const parts: string[] = [];
  for (let i = 0; i < count; i++) parts.push(points(reader, le));
  return `(${parts.join(',')})`;
};

/** Body of a geometry after its byte order and type words */
const readBody = (reader: WkbReader, type: number, le: boolean): string => {
  switch (type) {
    case 1:
      return `(${point(reader, le)})`;
    case 2:
      return points(reader, le);
    case 3:
      return rings(reader, le);
    case 4:
    case 5:
    case 6: {
      const count = reader.uint32(le);
      const parts: string[] = [];
      for (let i = 0; i < count; i++) parts.push(readTagged(reader).body);
      return `(${parts.join(',')})`;
    }
    case 7: {
      const count = reader.uint32(le);
      const parts: string[] = [];
      for (let i = 0; i < count; i++) parts.push(readGeometry(reader));
      return `(${parts.join(',')})`;
    }
    default:
      throw new Error(`Unsupported WKB geometry type: ${type}`);
  }
};

const readTagged = (reader: WkbReader): { type: number; body: string } => {
  const le = reader.byte() === 1;
  const type = reader.uint32(le);
  return { type, body: readBody(reader, type, le) };
};

const readGeometry = (reader: WkbReader): string => {
  const { type, body } = readTagged(reader);
  const name = GEOMETRY_TYPES[type];
  if (name === undefined) throw new Error(`Unsupported WKB geometry type: ${type}`);
  return `${name}${body}`;
};

/**
 * Converts a stored geometry value (4-byte SRID followed by WKB) to WKT.
 * @throws Error on truncated input or unknown geometry types
 */
export function wkbToWkt(value: Buffer | string, hasSrid = true): string {
  const buffer = typeof value === 'string' ? Buffer.from(value, 'latin1') : value;
  const reader = new WkbReader(buffer);
  if (hasSrid) reader.skip(4);
  return readGeometry(reader);
}

/** Hex of the WKB part of a stored geometry, SRID excluded */
export const wkbHexWithoutSrid = (value: Buffer | string): string =>
  (typeof value === 'string' ? Buffer.from(value, 'latin1') : value).subarray(4).toString('hex');
