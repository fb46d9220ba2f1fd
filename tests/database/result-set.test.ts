import { describe, it, expect } from 'vitest';
import { FIELD_FLAGS, FieldMetadata, MYSQL_TYPES } from '../../src/database/field-metadata.js';
import { ResultSet } from '../../src/database/result-set.js';
import { resultOf } from '../support/fake-executor.js';

describe('FieldMetadata', () => {
  it('should map protocol types and flags', () => {
    const meta = new FieldMetadata({
      name: 'id',
      columnType: MYSQL_TYPES.LONGLONG,
      flags: FIELD_FLAGS.PRI_KEY | FIELD_FLAGS.UNSIGNED,
    });

    expect(meta.getMappedType()).toBe('int');
    expect(meta.isNumeric).toBe(true);
    expect(meta.isPrimaryKey).toBe(true);
    expect(meta.isUnsigned).toBe(true);
    expect(meta.isUniqueKey).toBe(false);
    expect(meta.orgname).toBe('id');
  });

  it('should treat binary charset strings as binary', () => {
    expect(new FieldMetadata({ name: 'b', columnType: MYSQL_TYPES.STRING, characterSet: 63 }).isBinary()).toBe(true);
    expect(new FieldMetadata({ name: 'c', columnType: MYSQL_TYPES.STRING, characterSet: 255 }).isBinary()).toBe(false);
  });

  it('should not treat dates, JSON or numbers reported with the binary charset as binary', () => {
    const binaryFlagged = { characterSet: 63, flags: FIELD_FLAGS.BINARY };

    expect(new FieldMetadata({ name: 'd', columnType: MYSQL_TYPES.DATETIME, ...binaryFlagged }).isBinary()).toBe(false);
    expect(new FieldMetadata({ name: 'j', columnType: MYSQL_TYPES.JSON, ...binaryFlagged }).isBinary()).toBe(false);
    expect(new FieldMetadata({ name: 'n', columnType: MYSQL_TYPES.LONG, ...binaryFlagged }).isBinary()).toBe(false);
  });

  it('should recognise date and time types', () => {
    expect(new FieldMetadata({ name: 'd', columnType: MYSQL_TYPES.DATETIME }).isDateTimeType()).toBe(true);
    expect(new FieldMetadata({ name: 'y', columnType: MYSQL_TYPES.YEAR }).isDateTimeType()).toBe(false);
  });

  it('should default to a string column', () => {
    expect(new FieldMetadata({ name: 'x' }).getMappedType()).toBe('string');
  });
});

describe('ResultSet', () => {
  const result = () => new ResultSet(resultOf(['id', 'name'], [['1', 'Ann'], ['2', null]]));

  it('should build fields from column names when metadata is missing', () => {
    const set = result();
    expect(set.fields.map(field => field.name)).toEqual(['id', 'name']);
    expect(set.numRows()).toBe(2);
    expect(set.numFields()).toBe(2);
    expect(set.affectedRows).toBeNull();
  });

  it('should fetch rows in order until exhausted', () => {
    const set = result();
    expect(set.fetchRow()).toEqual(['1', 'Ann']);
    expect(set.fetchAssoc()).toEqual({ id: '2', name: null });
    expect(set.fetchRow()).toBeNull();
  });

  it('should seek within bounds only', () => {
    const set = result();
    set.fetchRow();
    expect(set.seek(0)).toBe(true);
    expect(set.fetchRow()).toEqual(['1', 'Ann']);
    expect(set.seek(2)).toBe(false);
    expect(set.seek(-1)).toBe(false);
    expect(new ResultSet(resultOf([], [])).seek(0)).toBe(true);
  });
});
