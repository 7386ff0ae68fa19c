
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { DateTime, Settings, type Zone } from 'luxon';
import * as SunCalc from 'suncalc';
import { suntime } from './suntime';
import type { CalendarDate } from '../models/calendar-date';
import { NoSuchEventError } from '../models/error/no-such-event-error';
import { SmError } from '../models/error/sm-error';

const london = {
  lat: 51.5074,
  lon: -0.1278,
} as const;
const berlin = {
  lat: 52.5,
  lon: 13.4,
} as const;
const svalbard = {
  lat: 78,
  lon: 15,
} as const;

const utc_min_fmt = 'yyyy-MM-dd HH:mm';

describe('suntime', () => {
  let jan1: CalendarDate;
  beforeEach(() => {
    jan1 = {
      year: 2023,
      month: 1,
      day: 1,
    };
  });

  test('.getSunrise() London 2023-01-01', () => {
    let sunrise = suntime.getSunrise(london.lat, london.lon, jan1, 'utc');
    expect(sunrise.toFormat(utc_min_fmt)).toBe('2023-01-01 08:07');
    let expected = DateTime.utc(2023, 1, 1, 8, 6);
    expect(Math.abs(sunrise.diff(expected, 'minutes').minutes)).toBeLessThanOrEqual(1);
  });

  test('.getSunset() London 2023-01-01', () => {
    let sunset = suntime.getSunset(london.lat, london.lon, jan1, 'utc');
    expect(sunset.toFormat(utc_min_fmt)).toBe('2023-01-01 16:02');
    let expected = DateTime.utc(2023, 1, 1, 16, 1);
    expect(Math.abs(sunset.diff(expected, 'minutes').minutes)).toBeLessThanOrEqual(1);
  });

  test('sunrise before sunset, Berlin 2024-06-21', () => {
    let date = { year: 2024, month: 6, day: 21 };
    let sunrise = suntime.getSunrise(berlin.lat, berlin.lon, date, 'utc');
    let sunset = suntime.getSunset(berlin.lat, berlin.lon, date, 'utc');
    expect(sunrise.toFormat(utc_min_fmt)).toBe('2024-06-21 02:44');
    expect(sunset.toFormat(utc_min_fmt)).toBe('2024-06-21 19:33');
    expect(sunrise.toMillis()).toBeLessThan(sunset.toMillis());
  });

  test('result is expressed in the requested zone, same instant', () => {
    let utcRise = suntime.getSunrise(london.lat, london.lon, jan1, 'utc');
    let nyRise = suntime.getSunrise(london.lat, london.lon, jan1, 'America/New_York');
    expect(nyRise.zoneName).toBe('America/New_York');
    expect(nyRise.toFormat('HH:mm')).toBe('03:07');
    expect(nyRise.toMillis()).toBe(utcRise.toMillis());
  });

  test('sun always rises and sets on the equator', () => {
    for(let month = 1; month <= 12; month++) {
      for(let day of [ 1, 15 ]) {
        let date = { year: 2024, month, day };
        let sunrise = suntime.calcSunTime(0, 0, date, 'sunrise', 'utc');
        let sunset = suntime.calcSunTime(0, 0, date, 'sunset', 'utc');
        expect(sunrise.ok).toBe(true);
        expect(sunset.ok).toBe(true);
      }
    }
  });

  test('.getSunset() throws during midnight sun, Svalbard 2023-06-21', () => {
    let date = { year: 2023, month: 6, day: 21 };
    let err: unknown;
    try {
      suntime.getSunset(svalbard.lat, svalbard.lon, date, 'utc');
    } catch(e) {
      err = e;
    }
    expect(err).toBeInstanceOf(NoSuchEventError);
    expect(err).toMatchObject({
      reason: 'never_sets',
      code: 'SUN_0.2',
    });
  });

  test('.getSunrise() throws during polar night, Svalbard 2023-12-21', () => {
    let date = { year: 2023, month: 12, day: 21 };
    expect(() => {
      suntime.getSunrise(svalbard.lat, svalbard.lon, date, 'utc');
    }).toThrow(new NoSuchEventError('never_rises'));
  });

  test('.calcSunTime() returns the reason instead of throwing', () => {
    let summer = suntime.calcSunTime(svalbard.lat, svalbard.lon, { year: 2023, month: 6, day: 21 }, 'sunrise', 'utc');
    let winter = suntime.calcSunTime(svalbard.lat, svalbard.lon, { year: 2023, month: 12, day: 21 }, 'sunset', 'utc');
    expect(summer).toEqual({
      ok: false,
      reason: 'never_sets',
    });
    expect(winter).toEqual({
      ok: false,
      reason: 'never_rises',
    });
  });

  test('southern hemisphere polar conditions are reversed', () => {
    let june = suntime.calcSunTime(-78, 15, { year: 2023, month: 6, day: 21 }, 'sunrise', 'utc');
    let december = suntime.calcSunTime(-78, 15, { year: 2023, month: 12, day: 21 }, 'sunset', 'utc');
    expect(june).toEqual({ ok: false, reason: 'never_rises' });
    expect(december).toEqual({ ok: false, reason: 'never_sets' });
  });

  test('longitude and longitude + 360 give the same result', () => {
    let sunrise = suntime.getSunrise(london.lat, london.lon, jan1, 'utc');
    let shifted = suntime.getSunrise(london.lat, london.lon + 360, jan1, 'utc');
    let sunset = suntime.getSunset(london.lat, london.lon, jan1, 'utc');
    let shiftedSunset = suntime.getSunset(london.lat, london.lon + 360, jan1, 'utc');
    expect(shifted.toMillis()).toBe(sunrise.toMillis());
    expect(shiftedSunset.toMillis()).toBe(sunset.toMillis());
  });

  test('longitude 180 is used as given', () => {
    /* lngHour = 12, not -12 _*/
    let sunset = suntime.getSunset(45, 180, jan1, 'utc');
    let sunrise = suntime.getSunrise(45, 180, { year: 2023, month: 12, day: 4 }, 'utc');
    expect(sunset.toFormat(utc_min_fmt)).toBe('2023-01-01 04:28');
    expect(sunrise.toFormat(utc_min_fmt)).toBe('2023-12-04 19:20');
  });

  test('longitude past 180 reduces onto the same meridian', () => {
    let sunset = suntime.getSunset(45, 180, jan1, 'utc');
    let wrapped = suntime.getSunset(45, 540, jan1, 'utc');
    expect(wrapped.toMillis()).toBe(sunset.toMillis());
  });

  test('date the month does not have throws SmError', () => {
    let feb30 = { year: 2023, month: 2, day: 30 };
    expect(() => {
      suntime.calcSunTime(51.5, 0, feb30, 'sunrise', 'utc');
    }).toThrow(SmError);
    expect(() => {
      suntime.getSunset(51.5, 0, feb30, 'utc');
    }).toThrow('DT_0.1');
  });

  test('same input, same result', () => {
    let first = suntime.getSunset(berlin.lat, berlin.lon, jan1, 'utc');
    let second = suntime.getSunset(berlin.lat, berlin.lon, jan1, 'utc');
    expect(second.toMillis()).toBe(first.toMillis());
  });

  test('minute carry past midnight rolls over the year', () => {
    let sunset = suntime.getSunset(50, -118.1, { year: 2023, month: 12, day: 31 }, 'utc');
    expect(sunset.toFormat(utc_min_fmt)).toBe('2024-01-01 00:00');
  });

  test('minute carry past midnight rolls over the month, leap day', () => {
    let sunset = suntime.getSunset(50, -94.5, { year: 2024, month: 2, day: 29 }, 'utc');
    expect(sunset.toFormat(utc_min_fmt)).toBe('2024-03-01 00:00');
  });

  test('unknown zone throws SmError', () => {
    expect(() => {
      suntime.getSunrise(london.lat, london.lon, jan1, 'Mars/Olympus_Mons');
    }).toThrow(SmError);
    expect(() => {
      suntime.getSunrise(london.lat, london.lon, jan1, 'Mars/Olympus_Mons');
    }).toThrow('SUN_0.3');
  });

  test('.dayOfYear()', () => {
    expect(suntime.dayOfYear(jan1)).toBe(1);
    expect(suntime.dayOfYear({ year: 2023, month: 12, day: 31 })).toBe(365);
    expect(suntime.dayOfYear({ year: 2024, month: 12, day: 31 })).toBe(366);
    expect(suntime.dayOfYear({ year: 2024, month: 3, day: 1 })).toBe(61);
  });

  test('agrees with suncalc within a few minutes at mid-latitudes', () => {
    let cases = [
      { ...london, date: jan1 },
      { ...berlin, date: { year: 2024, month: 6, day: 21 } },
      { lat: 40.7128, lon: -74.006, date: { year: 2024, month: 3, day: 20 } },
    ];
    for(let i = 0; i < cases.length; i++) {
      let { lat, lon, date } = cases[i];
      let noon = new Date(Date.UTC(date.year, date.month - 1, date.day, 12));
      let sc = SunCalc.getTimes(noon, lat, lon);
      let sunrise = suntime.getSunrise(lat, lon, date, 'utc');
      let sunset = suntime.getSunset(lat, lon, date, 'utc');
      expect(Math.abs(sunrise.toMillis() - sc.sunrise.valueOf())).toBeLessThan(5 * 60 * 1000);
      expect(Math.abs(sunset.toMillis() - sc.sunset.valueOf())).toBeLessThan(5 * 60 * 1000);
    }
  });

  describe('defaults', () => {
    let origZone: Zone;
    beforeEach(() => {
      origZone = Settings.defaultZone;
    });
    afterEach(() => {
      Settings.defaultZone = origZone;
      vi.useRealTimers();
    });

    test('zone defaults to the current default zone at call time', () => {
      Settings.defaultZone = 'Asia/Tokyo';
      let tokyoRise = suntime.getSunrise(london.lat, london.lon, jan1);
      Settings.defaultZone = 'Europe/Berlin';
      let berlinRise = suntime.getSunrise(london.lat, london.lon, jan1);
      expect(tokyoRise.zoneName).toBe('Asia/Tokyo');
      expect(berlinRise.zoneName).toBe('Europe/Berlin');
      expect(berlinRise.toMillis()).toBe(tokyoRise.toMillis());
    });

    test('date defaults to today in the requested zone', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2023-01-01T23:30:00Z'));
      let utcRise = suntime.getSunrise(london.lat, london.lon, undefined, 'utc');
      let tokyoRise = suntime.getSunrise(london.lat, london.lon, undefined, 'Asia/Tokyo');
      expect(utcRise.toUTC().toFormat(utc_min_fmt)).toBe('2023-01-01 08:07');
      expect(tokyoRise.toUTC().toFormat(utc_min_fmt)).toBe('2023-01-02 08:07');
    });
  });
});
