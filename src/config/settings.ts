export type RowActionLinksPosition = 'left' | 'right' | 'both' | 'none';
export type RowActionType = 'icons' | 'text' | 'both';
export type GridEditingMode = 'double-click' | 'click' | 'disabled';
export type ProtectBinaryMode = 'blob' | 'noblob' | 'all' | false;
export type RelationalDisplayMode = 'K' | 'D';
export type SortOrderSetting = 'ASC' | 'DESC' | 'SMART';
export type SlidersState = 'open' | 'closed' | 'disabled';

/**
 * Display configuration of the result grid
 */
export interface Settings {
  /** Rows per page */
  MaxRows: number;
  /** Tables with more estimated rows are not counted exactly */
  MaxExactCount: number;
  /** Views are counted up to this many rows; 0 disables counting */
  MaxExactCountViews: number;
  ShowAll: boolean;
  LimitChars: number;
  /** Repeat the header row every N rows; 0 never repeats */
  RepeatCells: number;
  RelationalDisplay: RelationalDisplayMode;
  ProtectBinary: ProtectBinaryMode;
  SaveCellsAtOnce: boolean;
  /** Links with longer URLs are rendered as POST forms */
  LinkLengthLimit: number;
  RowActionLinks: RowActionLinksPosition;
  RowActionLinksWithoutUnique: boolean;
  RowActionType: RowActionType;
  GridEditing: GridEditingMode;
  BrowsePointerEnable: boolean;
  BrowseMarkerEnable: boolean;
  ShowBrowseComments: boolean;
  BrowseMIME: boolean;
  Order: SortOrderSetting;
  InitialSlidersState: SlidersState;
  RememberSorting: boolean;
  /** HMAC key for signed SQL and where clauses */
  secret: string;
  /** Prefix of every generated route */
  basePath: string;
  isAmazonRds: boolean;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  MaxRows: 25,
  MaxExactCount: 50000,
  MaxExactCountViews: 0,
  ShowAll: false,
  LimitChars: 50,
  RepeatCells: 100,
  RelationalDisplay: 'K',
  ProtectBinary: 'blob',
  SaveCellsAtOnce: false,
  LinkLengthLimit: 1000,
  RowActionLinks: 'left',
  RowActionLinksWithoutUnique: false,
  RowActionType: 'both',
  GridEditing: 'double-click',
  BrowsePointerEnable: true,
  BrowseMarkerEnable: true,
  ShowBrowseComments: true,
  BrowseMIME: true,
  Order: 'SMART',
  InitialSlidersState: 'closed',
  RememberSorting: true,
  secret: '',
  basePath: '',
  isAmazonRds: false,
});

type NumericSetting = 'MaxRows' | 'MaxExactCount' | 'MaxExactCountViews' | 'LimitChars' | 'RepeatCells' | 'LinkLengthLimit';

const MINIMUMS: Record<NumericSetting, number> = {
  MaxRows: 1,
  MaxExactCount: 0,
  MaxExactCountViews: 0,
  LimitChars: 1,
  RepeatCells: 0,
  LinkLengthLimit: 0,
};

const NUMERIC_SETTINGS: NumericSetting[] = ['MaxRows', 'MaxExactCount', 'MaxExactCountViews', 'LimitChars', 'RepeatCells', 'LinkLengthLimit'];

const assertOneOf = <K extends keyof Settings>(settings: Settings, key: K, allowed: readonly Settings[K][]): void => {
  if (!allowed.includes(settings[key])) {
    throw new Error(
      `Invalid value for ${key}: ${JSON.stringify(settings[key])}. ` +
      `Expected one of ${allowed.map(value => JSON.stringify(value)).join(', ')}.`
    );
  }
};

/**
 * Merges user settings over the defaults and validates them
 * @throws Error on values outside an enumeration or below a minimum
 */
export function resolveSettings(overrides: Partial<Settings> = {}): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS, ...overrides };

  assertOneOf(settings, 'RelationalDisplay', ['K', 'D']);
  assertOneOf(settings, 'ProtectBinary', ['blob', 'noblob', 'all', false]);
  assertOneOf(settings, 'RowActionLinks', ['left', 'right', 'both', 'none']);
  assertOneOf(settings, 'RowActionType', ['icons', 'text', 'both']);
  assertOneOf(settings, 'GridEditing', ['double-click', 'click', 'disabled']);
  assertOneOf(settings, 'Order', ['ASC', 'DESC', 'SMART']);
  assertOneOf(settings, 'InitialSlidersState', ['open', 'closed', 'disabled']);

  for (const key of NUMERIC_SETTINGS) {
    const value = settings[key];
    if (!Number.isInteger(value) || value < MINIMUMS[key]) {
      throw new Error(`Invalid value for ${key}: ${JSON.stringify(value)}. Expected an integer >= ${MINIMUMS[key]}.`);
    }
  }

  return settings;
}
