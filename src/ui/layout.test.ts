import { describe, expect, it } from 'vitest';

import {
  firstVisibleRow,
  isTooSmall,
  noteIndexAt,
  previewBodyHeight,
  previewWidth,
  sidebarWidth,
  visibleRows,
} from './layout.js';

describe('layout', () => {
  it('requires at least 40x10 cells', () => {
    expect(isTooSmall({ width: 39, height: 24 })).toBe(true);
    expect(isTooSmall({ width: 80, height: 9 })).toBe(true);
    expect(isTooSmall({ width: 40, height: 10 })).toBe(false);
  });

  it('gives the sidebar a third of the width', () => {
    expect(sidebarWidth(80)).toBe(26);
    expect(sidebarWidth(120)).toBe(40);
  });

  it('fits whole note rows between header and footer', () => {
    // 24 - 2 footer - 2 header = 20 lines, 6 rows of 3
    expect(visibleRows(24)).toBe(6);
    expect(visibleRows(10)).toBe(2);
  });

  it('gives the preview the rest of the width and the body height below its header', () => {
    expect(previewWidth(60)).toBe(39);
    expect(previewBodyHeight(12)).toBe(7);
    expect(previewBodyHeight(10)).toBe(5);
  });

  it('scrolls just far enough to keep the selection visible', () => {
    expect(firstVisibleRow(3, 24)).toBe(0);
    expect(firstVisibleRow(5, 24)).toBe(0);
    expect(firstVisibleRow(8, 24)).toBe(3);
  });

  describe('noteIndexAt', () => {
    const viewport = { width: 80, height: 24 };

    it('maps sidebar rows to note indices', () => {
      expect(noteIndexAt(viewport, 0, 5, 0, 2)).toBe(0);
      expect(noteIndexAt(viewport, 0, 5, 10, 4)).toBe(0);
      expect(noteIndexAt(viewport, 0, 5, 10, 5)).toBe(1);
      expect(noteIndexAt(viewport, 0, 5, 25, 14)).toBe(4);
    });

    it('ignores the header, the preview pane and rows past the list', () => {
      expect(noteIndexAt(viewport, 0, 5, 5, 1)).toBeUndefined();
      expect(noteIndexAt(viewport, 0, 5, 26, 5)).toBeUndefined();
      expect(noteIndexAt(viewport, 0, 5, 5, 17)).toBeUndefined();
    });

    it('accounts for scrolling', () => {
      expect(noteIndexAt(viewport, 8, 10, 0, 2)).toBe(3);
    });
  });
});
