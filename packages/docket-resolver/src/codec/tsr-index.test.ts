/**
 * Tests for the TSR index
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildTsrIndex } from './tsr-index.js';

describe('buildTsrIndex', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should label each section and reduce plat codes to their prefix', () => {
    const rows = buildTsrIndex(['0115N02WS1']);

    expect(rows).toEqual([
      {
        section: 1,
        township: 15,
        townshipDir: 'N',
        range: 2,
        rangeDir: 'W',
        baseline: 'S',
        code: '0115N02WS',
        label: '1 15N 2W S',
      },
    ]);
  });

  it('should deduplicate codes sharing a section', () => {
    const rows = buildTsrIndex(['0115N02WS1', '0115N02WS2', '0115N02WS']);
    expect(rows.map((row) => row.code)).toEqual(['0115N02WS']);
  });

  it('should sort by baseline, directions, township, range, then section', () => {
    const rows = buildTsrIndex([
      '0102S03WU',
      '0210N03WS',
      '0110N03WS',
      '0102S03WS',
      '0102N03ES',
      '0109N04WS',
    ]);

    expect(rows.map((row) => row.code)).toEqual([
      '0102N03ES',
      '0109N04WS',
      '0110N03WS',
      '0210N03WS',
      '0102S03WS',
      '0102S03WU',
    ]);
  });

  it('should skip codes that do not decode and warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const rows = buildTsrIndex(['garbage12', '0115N02WS1']);

    expect(rows.map((row) => row.code)).toEqual(['0115N02WS']);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
