import { describe, it, expect } from 'vitest';
import { DELETE_LINK, DisplayParts } from '../../src/display/display-parts.js';

describe('DisplayParts', () => {
  it('should turn missing parts off', () => {
    const parts = DisplayParts.fromArray({ hasSortLink: true });

    expect(parts.hasSortLink).toBe(true);
    expect(parts.hasEditLink).toBe(false);
    expect(parts.deleteLink).toBe(DELETE_LINK.NO_DELETE);
    expect(parts.hasNavigationBar).toBe(false);
  });

  it('should copy with changes and leave the original alone', () => {
    const parts = DisplayParts.fromArray({ hasEditLink: true, deleteLink: DELETE_LINK.DELETE_ROW });
    const changed = parts.with({ deleteLink: DELETE_LINK.KILL_PROCESS });

    expect(changed.deleteLink).toBe(DELETE_LINK.KILL_PROCESS);
    expect(changed.hasEditLink).toBe(true);
    expect(parts.deleteLink).toBe(DELETE_LINK.DELETE_ROW);
  });
});
