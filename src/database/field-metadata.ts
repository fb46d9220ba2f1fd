import type { ColumnDefinition } from '../core/execution/db-executor.js';

/**
 * MySQL protocol column type codes
 */
export const MYSQL_TYPES = {
  DECIMAL: 0,
  TINY: 1,
  SHORT: 2,
  LONG: 3,
  FLOAT: 4,
  DOUBLE: 5,
  NULL: 6,
  TIMESTAMP: 7,
  LONGLONG: 8,
  INT24: 9,
  DATE: 10,
  TIME: 11,
  DATETIME: 12,
  YEAR: 13,
  NEWDATE: 14,
  VARCHAR: 15,
  BIT: 16,
  JSON: 245,
  NEWDECIMAL: 246,
  ENUM: 247,
  SET: 248,
  TINY_BLOB: 249,
  MEDIUM_BLOB: 250,
  LONG_BLOB: 251,
  BLOB: 252,
  VAR_STRING: 253,
  STRING: 254,
  GEOMETRY: 255,
} as const;

/**
 * Column flag bits
 */
export const FIELD_FLAGS = {
  NOT_NULL: 1,
  PRI_KEY: 2,
  UNIQUE_KEY: 4,
  MULTIPLE_KEY: 8,
  BLOB: 16,
  UNSIGNED: 32,
  ZEROFILL: 64,
  BINARY: 128,
  ENUM: 256,
  AUTO_INCREMENT: 512,
  TIMESTAMP: 1024,
  SET: 2048,
  NUM: 32768,
} as const;

/** Character set number of the binary collation */
export const BINARY_CHARSET = 63;

export type MappedType =
  | 'int'
  | 'real'
  | 'string'
  | 'blob'
  | 'date'
  | 'time'
  | 'datetime'
  | 'timestamp'
  | 'year'
  | 'geometry'
  | 'json'
  | 'null'
  | 'bit'
  | 'unknown';

const TYPE_MAP: Record<number, MappedType> = {
  [MYSQL_TYPES.DECIMAL]: 'real',
  [MYSQL_TYPES.NEWDECIMAL]: 'real',
  [MYSQL_TYPES.TINY]: 'int',
  [MYSQL_TYPES.SHORT]: 'int',
  [MYSQL_TYPES.LONG]: 'int',
  [MYSQL_TYPES.LONGLONG]: 'int',
  [MYSQL_TYPES.INT24]: 'int',
  [MYSQL_TYPES.FLOAT]: 'real',
  [MYSQL_TYPES.DOUBLE]: 'real',
  [MYSQL_TYPES.NULL]: 'null',
  [MYSQL_TYPES.TIMESTAMP]: 'timestamp',
  [MYSQL_TYPES.DATE]: 'date',
  [MYSQL_TYPES.NEWDATE]: 'date',
  [MYSQL_TYPES.TIME]: 'time',
  [MYSQL_TYPES.DATETIME]: 'datetime',
  [MYSQL_TYPES.YEAR]: 'year',
  [MYSQL_TYPES.VARCHAR]: 'string',
  [MYSQL_TYPES.VAR_STRING]: 'string',
  [MYSQL_TYPES.STRING]: 'string',
  [MYSQL_TYPES.ENUM]: 'string',
  [MYSQL_TYPES.SET]: 'string',
  [MYSQL_TYPES.TINY_BLOB]: 'blob',
  [MYSQL_TYPES.MEDIUM_BLOB]: 'blob',
  [MYSQL_TYPES.LONG_BLOB]: 'blob',
  [MYSQL_TYPES.BLOB]: 'blob',
  [MYSQL_TYPES.GEOMETRY]: 'geometry',
  [MYSQL_TYPES.BIT]: 'bit',
  [MYSQL_TYPES.JSON]: 'json',
};

/**
 * Metadata of one result-set column.
 */
export class FieldMetadata {
  readonly name: string;
  readonly orgname: string;
  readonly table: string;
  readonly orgtable: string;
  readonly database: string;
  readonly length: number;
  readonly decimals: number;
  readonly charsetnr: number;
  readonly flags: number;
  readonly columnType: number;
  /** Media type picked by the transformation in effect, e.g. text_plain */
  internalMediaType?: string;

  private readonly mappedType: MappedType;

  constructor(definition: ColumnDefinition) {
    this.name = definition.name;
    this.orgname = definition.orgName ?? definition.name;
    this.table = definition.table ?? '';
    this.orgtable = definition.orgTable ?? '';
    this.database = definition.db ?? '';
    this.length = definition.columnLength ?? 0;
    this.decimals = definition.decimals ?? 0;
    this.charsetnr = definition.characterSet ?? 0;
    this.flags = definition.flags ?? 0;
    this.columnType = definition.columnType ?? MYSQL_TYPES.VAR_STRING;
    this.mappedType = TYPE_MAP[this.columnType] ?? 'unknown';
  }

  private hasFlag(flag: number): boolean {
    return (this.flags & flag) !== 0;
  }

  getMappedType(): MappedType {
    return this.mappedType;
  }

  isType(type: MappedType): boolean {
    return this.mappedType === type;
  }

  get isNumeric(): boolean {
    return this.hasFlag(FIELD_FLAGS.NUM) || this.mappedType === 'int' || this.mappedType === 'real';
  }

  /**
   * Byte strings: binary charset on string or BLOB columns. Dates, JSON and
   * numbers also carry charset 63 and the BINARY flag but are text.
   */
  isBinary(): boolean {
    return this.charsetnr === BINARY_CHARSET && (this.mappedType === 'blob' || this.mappedType === 'string');
  }

  get isBlob(): boolean {
    return this.hasFlag(FIELD_FLAGS.BLOB) || this.mappedType === 'blob';
  }

  get isEnum(): boolean {
    return this.hasFlag(FIELD_FLAGS.ENUM) || this.columnType === MYSQL_TYPES.ENUM;
  }

  get isSet(): boolean {
    return this.hasFlag(FIELD_FLAGS.SET) || this.columnType === MYSQL_TYPES.SET;
  }

  get isNotNull(): boolean {
    return this.hasFlag(FIELD_FLAGS.NOT_NULL);
  }

  get isPrimaryKey(): boolean {
    return this.hasFlag(FIELD_FLAGS.PRI_KEY);
  }

  get isUniqueKey(): boolean {
    return this.hasFlag(FIELD_FLAGS.UNIQUE_KEY);
  }

  get isMultipleKey(): boolean {
    return this.hasFlag(FIELD_FLAGS.MULTIPLE_KEY);
  }

  get isUnsigned(): boolean {
    return this.hasFlag(FIELD_FLAGS.UNSIGNED);
  }

  get isZerofill(): boolean {
    return this.hasFlag(FIELD_FLAGS.ZEROFILL);
  }

  get isMappedTypeBit(): boolean {
    return this.mappedType === 'bit';
  }

  get isMappedTypeGeometry(): boolean {
    return this.mappedType === 'geometry';
  }

  get isMappedTypeTimestamp(): boolean {
    return this.mappedType === 'timestamp';
  }

  isDateTimeType(): boolean {
    return ['date', 'datetime', 'time', 'timestamp'].includes(this.mappedType);
  }
}

