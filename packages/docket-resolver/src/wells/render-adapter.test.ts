import { describe, it, expect } from 'vitest';
import { renderedY, toRenderPoints, trajectoriesFor } from './render-adapter.js';
import { surveyPoint } from '../__tests__/fixtures/rows.js';

describe('toRenderPoints', () => {
  it('should offset repeated vertical locations by occurrence', () => {
    const points = [0, 100, 200].map((md) =>
      surveyPoint({ citingType: 'vertical', x: 10, y: 20, measuredDepth: md })
    );

    const rendered = toRenderPoints(points, 0.5);

    expect(rendered.map((p) => p.yOffset)).toEqual([0, 0.5, 1]);
    expect(rendered.map((p) => p.y)).toEqual([20, 20, 20]);
    expect(rendered.map(renderedY)).toEqual([20, 20.5, 21]);
  });

  it('should leave non-vertical points unshifted', () => {
    const rendered = toRenderPoints(
      [
        surveyPoint({ citingType: 'asDrilled', x: 10, y: 20 }),
        surveyPoint({ citingType: 'asDrilled', x: 10, y: 20, measuredDepth: 50 }),
      ],
      0.5
    );

    expect(rendered.map((p) => p.yOffset)).toEqual([0, 0]);
  });

  it('should count occurrences per location', () => {
    const rendered = toRenderPoints(
      [
        surveyPoint({ citingType: 'vertical', x: 1, y: 1 }),
        surveyPoint({ citingType: 'vertical', x: 2, y: 2 }),
        surveyPoint({ citingType: 'vertical', x: 1, y: 1, measuredDepth: 10 }),
      ],
      2
    );

    expect(rendered.map((p) => p.yOffset)).toEqual([0, 0, 2]);
  });

  it('should carry target elevation as z', () => {
    const [point] = toRenderPoints([surveyPoint({ targetElevation: 1234 })]);
    expect(point?.z).toBe(1234);
  });
});

describe('trajectoriesFor', () => {
  it('should group paths per well in first-appearance order', () => {
    const trajectories = trajectoriesFor([
      surveyPoint({ wellId: 'B', x: 3048, y: 0, targetElevation: 100 }),
      surveyPoint({ wellId: 'A', x: 1, y: 2, targetElevation: null }),
      surveyPoint({ wellId: 'B', x: 6096, y: 0, targetElevation: 50 }),
    ]);

    expect(trajectories.map((t) => t.wellId)).toEqual(['B', 'A']);
    expect(trajectories[0]?.path2d).toEqual([
      [3048, 0],
      [6096, 0],
    ]);
    expect(trajectories[0]?.path3d[1]).toBeNearPoint([20_000, 0, 50]);
    expect(trajectories[1]?.path2d).toEqual([[1, 2]]);
    expect(trajectories[1]?.path3d).toEqual([]);
  });
});
