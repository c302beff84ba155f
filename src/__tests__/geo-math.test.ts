/**
 * =============================================================================
 * GEO MATH - Unit Tests
 * =============================================================================
 *
 * Bearing, linear sun azimuth and the seat side decision.
 * =============================================================================
 */

import { SeatSide } from '../core/constants';
import { decideSeat, sunAzimuth } from '../modules/seat-schedule/sun-position';
import { bearing, haversineDistanceKm } from '../shared/utils/geospatial.utils';

describe('bearing', () => {
  it('points due north along a meridian', () => {
    expect(bearing({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 })).toBe(0);
  });

  it('points due east along the equator', () => {
    expect(bearing({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(90, 10);
  });

  it('points due south along a meridian', () => {
    expect(bearing({ latitude: 1, longitude: 0 }, { latitude: 0, longitude: 0 })).toBeCloseTo(180, 10);
  });

  it('normalizes westward bearings into [0, 360)', () => {
    expect(bearing({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: -1 })).toBeCloseTo(270, 10);
  });

  it('returns 0 when both points are the same', () => {
    const point = { latitude: 48.85, longitude: 2.35 };
    expect(bearing(point, point)).toBe(0);
  });

  it('stays within [0, 360) for points spread around the globe', () => {
    const points = [
      { latitude: 40.758, longitude: -73.9855 },
      { latitude: -33.8688, longitude: 151.2093 },
      { latitude: 64.1466, longitude: -21.9426 },
      { latitude: -54.8019, longitude: -68.303 },
      { latitude: 1.3521, longitude: 103.8198 },
    ];

    for (const from of points) {
      for (const to of points) {
        if (from === to) continue;
        const value = bearing(from, to);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(360);
      }
    }
  });

  it('gives different forward and reverse bearings', () => {
    const a = { latitude: 10, longitude: 20 };
    const b = { latitude: 30, longitude: 40 };
    expect(bearing(a, b)).not.toBeCloseTo(bearing(b, a), 3);
  });
});

describe('haversineDistanceKm', () => {
  it('measures one degree of longitude on the equator', () => {
    expect(haversineDistanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(111.195, 2);
  });
});

describe('sunAzimuth', () => {
  it('rises at azimuth 0 at 06:00', () => {
    expect(sunAzimuth(6)).toBe(0);
  });

  it('reaches 90 at noon', () => {
    expect(sunAzimuth(12)).toBe(90);
  });

  it('sets at azimuth 180 at 18:00', () => {
    expect(sunAzimuth(18)).toBe(180);
  });

  it('moves 15 degrees per hour', () => {
    expect(sunAzimuth(8)).toBe(30);
    expect(sunAzimuth(8.5)).toBe(37.5);
  });

  it('has no azimuth outside daylight hours', () => {
    expect(sunAzimuth(5.999)).toBeNull();
    expect(sunAzimuth(18.001)).toBeNull();
    expect(sunAzimuth(0)).toBeNull();
    expect(sunAzimuth(23.5)).toBeNull();
  });
});

describe('decideSeat', () => {
  it('has no preference at night', () => {
    expect(decideSeat(123, null)).toBe(SeatSide.NO_PREFERENCE);
  });

  it('treats a relative angle of exactly 90 as Right', () => {
    expect(decideSeat(0, 90)).toBe(SeatSide.RIGHT);
  });

  it('treats a relative angle just past 90 as Left', () => {
    expect(decideSeat(0, 91)).toBe(SeatSide.LEFT);
  });

  it('treats a relative angle just below 270 as Left', () => {
    expect(decideSeat(0, 269)).toBe(SeatSide.LEFT);
  });

  it('treats a relative angle of exactly 270 as Right', () => {
    expect(decideSeat(0, 270)).toBe(SeatSide.RIGHT);
  });

  it('treats sun dead ahead as Right', () => {
    expect(decideSeat(45, 45)).toBe(SeatSide.RIGHT);
  });

  it('wraps the relative angle around 360', () => {
    // (30 - 90 + 360) % 360 = 300
    expect(decideSeat(90, 30)).toBe(SeatSide.RIGHT);
    // (30 - 270 + 360) % 360 = 120
    expect(decideSeat(270, 30)).toBe(SeatSide.LEFT);
  });
});
