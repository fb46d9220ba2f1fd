import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS, resolveSettings, type Settings } from '../../src/config/settings.js';

describe('resolveSettings', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('merges overrides over the defaults', () => {
    const settings = resolveSettings({ MaxRows: 50, RowActionLinks: 'right' });
    expect(settings.MaxRows).toBe(50);
    expect(settings.RowActionLinks).toBe('right');
    expect(settings.LimitChars).toBe(50);
  });

  it('rejects values outside an enumeration', () => {
    const overrides: Partial<Settings> = JSON.parse('{"Order":"RANDOM"}');
    expect(() => resolveSettings(overrides)).toThrow(
      'Invalid value for Order: "RANDOM". Expected one of "ASC", "DESC", "SMART".'
    );
  });

  it('rejects numbers below their minimum', () => {
    expect(() => resolveSettings({ MaxRows: 0 })).toThrow('Invalid value for MaxRows: 0. Expected an integer >= 1.');
    expect(() => resolveSettings({ RepeatCells: 1.5 })).toThrow('Invalid value for RepeatCells: 1.5. Expected an integer >= 0.');
  });
});
