/**
 * Tests for trajectory classification and age windows
 */

import { describe, it, expect } from 'vitest';
import { AGE_WINDOWS } from '../core/constants.js';
import {
  classifyPoints,
  cleanPoints,
  partitionByAge,
  reconcilePlanned,
  resolveWindows,
  wellIdsIn,
  windowPoints,
} from './classifier.js';
import { surveyPoint } from '../__tests__/fixtures/rows.js';
import type { SurveyPoint } from '../core/types/index.js';

function ids(points: readonly Pick<SurveyPoint, 'wellId'>[]): string[] {
  return [...wellIdsIn(points)].sort();
}

// One docket: ages chosen to land in each window boundary
const docket: SurveyPoint[] = [
  surveyPoint({ wellId: 'D1', citingType: 'asDrilled', ageMonths: 12, measuredDepth: 100 }),
  surveyPoint({ wellId: 'D1', citingType: 'asDrilled', ageMonths: 12, measuredDepth: 0 }),
  surveyPoint({ wellId: 'D1', citingType: 'planned', ageMonths: 12 }),
  surveyPoint({ wellId: 'P1', citingType: 'planned', ageMonths: 61 }),
  surveyPoint({ wellId: 'V1', citingType: 'vertical', ageMonths: 120 }),
  surveyPoint({ wellId: 'X1', citingType: 'planned', ageMonths: null, status: 'Drilling' }),
  surveyPoint({ wellId: 'OLD', citingType: 'asDrilled', ageMonths: 9999 }),
  surveyPoint({ wellId: 'ANCIENT', citingType: 'asDrilled', ageMonths: 10_000 }),
  surveyPoint({ wellId: 'NOELEV', citingType: 'asDrilled', targetElevation: null }),
];

describe('cleanPoints', () => {
  it('should drop points without a target elevation and zero missing ages', () => {
    const clean = cleanPoints(docket);

    expect(ids(clean)).not.toContain('NOELEV');
    expect(clean.find((p) => p.wellId === 'X1')?.ageMonths).toBe(0);
    expect(clean).toHaveLength(docket.length - 1);
  });
});

describe('classifyPoints', () => {
  it('should place vertical surveys in both drilled and planned', () => {
    const classified = classifyPoints(docket);

    expect(ids(classified.drilled)).toEqual(['ANCIENT', 'D1', 'OLD', 'V1']);
    expect(ids(classified.planned)).toEqual(['D1', 'P1', 'V1', 'X1']);
  });

  it('should classify currently drilling by well status, not citing type', () => {
    expect(ids(classifyPoints(docket).currentlyDrilling)).toEqual(['X1']);
  });
});

describe('partitionByAge', () => {
  const { drilled } = classifyPoints(docket);
  const windows = partitionByAge(drilled);

  it('should gate each window on age <= threshold', () => {
    expect(ids(windows.get(12) ?? [])).toEqual(['D1']);
    expect(ids(windows.get(60) ?? [])).toEqual(['D1']);
    expect(ids(windows.get(120) ?? [])).toEqual(['D1', 'V1']);
    expect(ids(windows.get(9999) ?? [])).toEqual(['D1', 'OLD', 'V1']);
  });

  it('should nest the windows', () => {
    for (let i = 1; i < AGE_WINDOWS.length; i++) {
      const smaller = windows.get(AGE_WINDOWS[i - 1] ?? 12) ?? [];
      const larger = windows.get(AGE_WINDOWS[i] ?? 12) ?? [];
      for (const point of smaller) {
        expect(larger).toContain(point);
      }
    }
  });

  it('should sort each window by well id then measured depth', () => {
    const all = windows.get(9999) ?? [];
    expect(all.map((p) => [p.wellId, p.measuredDepth])).toEqual([
      ['D1', 0],
      ['D1', 100],
      ['OLD', 0],
      ['V1', 0],
    ]);
  });
});

describe('reconcilePlanned', () => {
  it('should remove drilled and drilling wells from each planned window', () => {
    const classified = classifyPoints(docket);
    const drilled = partitionByAge(classified.drilled);
    const planned = reconcilePlanned(partitionByAge(classified.planned), drilled);

    expect(ids(planned.get(12) ?? [])).toEqual([]);
    expect(ids(planned.get(60) ?? [])).toEqual([]);
    expect(ids(planned.get(120) ?? [])).toEqual(['P1']);
    expect(ids(planned.get(9999) ?? [])).toEqual(['P1']);
  });

  it('should only subtract drilled wells of the same window', () => {
    const young = [surveyPoint({ wellId: 'W', citingType: 'planned', ageMonths: 10 })];
    const drilledLater = partitionByAge(
      cleanPoints([surveyPoint({ wellId: 'W', citingType: 'asDrilled', ageMonths: 100 })])
    );

    const planned = reconcilePlanned(partitionByAge(cleanPoints(young)), drilledLater);

    expect(ids(planned.get(12) ?? [])).toEqual(['W']);
    expect(ids(planned.get(120) ?? [])).toEqual([]);
  });
});

describe('resolveWindows', () => {
  it('should never leave a well in both drilled and planned for any window', () => {
    const windows = resolveWindows(docket);

    for (const threshold of AGE_WINDOWS) {
      const drilled = wellIdsIn(windowPoints(windows, 'drilled', threshold));
      const planned = wellIdsIn(windowPoints(windows, 'planned', threshold));
      expect([...planned].filter((id) => drilled.has(id))).toEqual([]);
    }
  });

  it('should key results by category then window', () => {
    const windows = resolveWindows(docket);

    expect([...windows.keys()]).toEqual(['drilled', 'planned', 'currentlyDrilling']);
    expect([...(windows.get('drilled')?.keys() ?? [])]).toEqual([12, 60, 120, 9999]);
    expect(ids(windowPoints(windows, 'currentlyDrilling', 12))).toEqual(['X1']);
  });

  it('should produce empty windows, not errors, for no points', () => {
    const windows = resolveWindows([]);

    for (const category of ['drilled', 'planned', 'currentlyDrilling'] as const) {
      for (const threshold of AGE_WINDOWS) {
        expect(windowPoints(windows, category, threshold)).toEqual([]);
      }
    }
  });
});
