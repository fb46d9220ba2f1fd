import { describe, it, expect } from 'vitest';
import { wkbHexWithoutSrid, wkbToWkt } from '../../src/gis/wkb.js';

const uint32 = (value: number, littleEndian = true): Buffer => {
  const buffer = Buffer.alloc(4);
  if (littleEndian) buffer.writeUInt32LE(value);
  else buffer.writeUInt32BE(value);
  return buffer;
};

const double = (value: number, littleEndian = true): Buffer => {
  const buffer = Buffer.alloc(8);
  if (littleEndian) buffer.writeDoubleLE(value);
  else buffer.writeDoubleBE(value);
  return buffer;
};

const wkbPoint = (x: number, y: number, littleEndian = true): Buffer =>
  Buffer.concat([Buffer.from([littleEndian ? 1 : 0]), uint32(1, littleEndian), double(x, littleEndian), double(y, littleEndian)]);

const SRID = uint32(0);

describe('wkbToWkt', () => {
  it('reads a point', () => {
    expect(wkbToWkt(Buffer.concat([SRID, wkbPoint(1, 2)]))).toBe('POINT(1 2)');
  });

  it('reads big-endian geometries', () => {
    expect(wkbToWkt(Buffer.concat([SRID, wkbPoint(1.5, -3, false)]))).toBe('POINT(1.5 -3)');
  });

  it('reads a line string', () => {
    const line = Buffer.concat([Buffer.from([1]), uint32(2), uint32(2), double(0), double(0), double(1), double(1)]);
    expect(wkbToWkt(Buffer.concat([SRID, line]))).toBe('LINESTRING(0 0,1 1)');
  });

  it('reads a polygon ring', () => {
    const ring = [double(0), double(0), double(0), double(1), double(1), double(0), double(0), double(0)];
    const polygon = Buffer.concat([Buffer.from([1]), uint32(3), uint32(1), uint32(4), ...ring]);
    expect(wkbToWkt(Buffer.concat([SRID, polygon]))).toBe('POLYGON((0 0,0 1,1 0,0 0))');
  });

  it('nests the points of a multipoint', () => {
    const multi = Buffer.concat([Buffer.from([1]), uint32(4), uint32(2), wkbPoint(1, 2), wkbPoint(3, 4)]);
    expect(wkbToWkt(Buffer.concat([SRID, multi]))).toBe('MULTIPOINT((1 2),(3 4))');
  });

  it('names the members of a collection', () => {
    const collection = Buffer.concat([Buffer.from([1]), uint32(7), uint32(1), wkbPoint(1, 2)]);
    expect(wkbToWkt(Buffer.concat([SRID, collection]))).toBe('GEOMETRYCOLLECTION(POINT(1 2))');
  });

  it('reads values without an SRID', () => {
    expect(wkbToWkt(wkbPoint(5, 6), false)).toBe('POINT(5 6)');
  });

  it('rejects truncated values', () => {
    expect(() => wkbToWkt(Buffer.concat([SRID, Buffer.from([1])]))).toThrow(
      'Truncated WKB value: needed 4 bytes at offset 5'
    );
  });

  it('rejects unknown geometry types', () => {
    expect(() => wkbToWkt(Buffer.concat([SRID, Buffer.from([1]), uint32(9)]))).toThrow(
      'Unsupported WKB geometry type: 9'
    );
  });
});

describe('wkbHexWithoutSrid', () => {
  it('drops the SRID before hex encoding', () => {
    expect(wkbHexWithoutSrid(Buffer.from([0, 0, 0, 0, 0xab, 0x01]))).toBe('ab01');
  });
});
