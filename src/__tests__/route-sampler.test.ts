import { interpolatedPosition } from '../modules/seat-schedule/route-sampler';
import { RoutePolyline } from '../shared/types/geo.types';

describe('interpolatedPosition', () => {
  const fivePoints: RoutePolyline = [[10, 50], [11, 51], [12, 52], [13, 53], [14, 54]];

  it('converts (longitude, latitude) points to named coordinates', () => {
    expect(interpolatedPosition([[2.35, 48.85], [2.4, 48.9]], 1, 0)).toEqual({
      latitude: 48.85,
      longitude: 2.35,
    });
  });

  it('maps steps one-to-one when steps match segments', () => {
    const positions = [0, 1, 2, 3, 4].map(step => interpolatedPosition(fivePoints, 4, step));
    expect(positions.map(p => p.longitude)).toEqual([10, 11, 12, 13, 14]);
  });

  it('takes the nearest preceding point', () => {
    // floor(i / 3 * 4) -> 0, 1, 2, 4
    const positions = [0, 1, 2, 3].map(step => interpolatedPosition(fivePoints, 3, step));
    expect(positions.map(p => p.longitude)).toEqual([10, 11, 12, 14]);
  });

  it('handles a two-point route for any step count', () => {
    const route: RoutePolyline = [[0, 0], [1, 1]];

    for (let totalSteps = 1; totalSteps <= 12; totalSteps++) {
      for (let step = 0; step <= totalSteps; step++) {
        const position = interpolatedPosition(route, totalSteps, step);
        const expected = step === totalSteps ? 1 : 0;
        expect(position).toEqual({ latitude: expected, longitude: expected });
      }
    }
  });

  it('returns the first point when there are no steps', () => {
    expect(interpolatedPosition(fivePoints, 0, 0)).toEqual({ latitude: 50, longitude: 10 });
  });

  it('rejects an empty route', () => {
    expect(() => interpolatedPosition([], 1, 0)).toThrow(RangeError);
  });
});
