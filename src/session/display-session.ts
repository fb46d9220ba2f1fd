import type { RelationalDisplayMode, Settings } from '../config/settings.js';

export type PartialTextMode = 'P' | 'F';
export type GeometryDisplay = 'GEOM' | 'WKT' | 'WKB';
export type MaxRows = number | 'all';

export const ALL_ROWS = 'all';
export const MAX_REMEMBERED_QUERIES = 10;

/** Display options remembered for one query */
export interface QueryMemory {
  sql: string;
  repeat_cells: number;
  max_rows: MaxRows;
  pos: number;
  pftext: PartialTextMode;
  relational_display: RelationalDisplayMode;
  geoOption: GeometryDisplay;
  display_binary?: boolean;
  display_blob?: boolean;
  hide_transformation?: boolean;
}

/** Display options in effect for the current render */
export interface DisplayTmpval {
  pftext: PartialTextMode;
  relational_display: RelationalDisplayMode;
  geoOption: GeometryDisplay;
  display_binary: boolean;
  display_blob: boolean;
  hide_transformation: boolean;
  pos: number;
  max_rows: MaxRows;
  repeat_cells: number;
  /** Set by the runner once it knows whether a geometry column can be shown graphically */
  possible_as_geometry?: boolean;
  /** Remembered queries keyed by hash, least recently used first */
  query: Record<string, QueryMemory>;
}

export interface DisplaySession {
  id: string;
  tmpval: DisplayTmpval;
}

export const createDisplaySession = (id: string, settings: Pick<Settings, 'MaxRows' | 'RepeatCells' | 'RelationalDisplay'>): DisplaySession => ({
  id,
  tmpval: {
    pftext: 'P',
    relational_display: settings.RelationalDisplay,
    geoOption: 'GEOM',
    display_binary: true,
    display_blob: false,
    hide_transformation: false,
    pos: 0,
    max_rows: settings.MaxRows,
    repeat_cells: settings.RepeatCells,
    query: {},
  },
});

// --- guards for values read back from a store ---

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isPartialTextMode = (value: unknown): value is PartialTextMode => value === 'P' || value === 'F';

export const isRelationalDisplayMode = (value: unknown): value is RelationalDisplayMode => value === 'K' || value === 'D';

export const isGeometryDisplay = (value: unknown): value is GeometryDisplay =>
  value === 'GEOM' || value === 'WKT' || value === 'WKB';

export const isMaxRows = (value: unknown): value is MaxRows =>
  value === ALL_ROWS || (typeof value === 'number' && Number.isInteger(value) && value >= 0);

const isOptionalBoolean = (value: unknown): value is boolean | undefined =>
  value === undefined || typeof value === 'boolean';

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

const isQueryMemory = (value: unknown): value is QueryMemory =>
  isRecord(value)
  && typeof value.sql === 'string'
  && isNonNegativeInteger(value.repeat_cells)
  && isMaxRows(value.max_rows)
  && isNonNegativeInteger(value.pos)
  && isPartialTextMode(value.pftext)
  && isRelationalDisplayMode(value.relational_display)
  && isGeometryDisplay(value.geoOption)
  && isOptionalBoolean(value.display_binary)
  && isOptionalBoolean(value.display_blob)
  && isOptionalBoolean(value.hide_transformation);

const isDisplayTmpval = (value: unknown): value is DisplayTmpval =>
  isRecord(value)
  && isPartialTextMode(value.pftext)
  && isRelationalDisplayMode(value.relational_display)
  && isGeometryDisplay(value.geoOption)
  && typeof value.display_binary === 'boolean'
  && typeof value.display_blob === 'boolean'
  && typeof value.hide_transformation === 'boolean'
  && isNonNegativeInteger(value.pos)
  && isMaxRows(value.max_rows)
  && isNonNegativeInteger(value.repeat_cells)
  && isOptionalBoolean(value.possible_as_geometry)
  && isRecord(value.query)
  && Object.values(value.query).every(isQueryMemory);

/** A stored session, or null when the value does not have the session shape */
export const readDisplaySession = (value: unknown): DisplaySession | null => {
  if (!isRecord(value) || typeof value.id !== 'string' || !isDisplayTmpval(value.tmpval)) return null;
  return { id: value.id, tmpval: value.tmpval };
};
