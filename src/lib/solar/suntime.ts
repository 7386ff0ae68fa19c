
import { DateTime, type Zone } from 'luxon';
import { CalendarDate } from '../models/calendar-date';
import type { NoSuchEventReason, SunEvent, SunEventKind } from '../models/sun-event';
import { NoSuchEventError } from '../models/error/no-such-event-error';
import { dtUtil, type ZoneLike } from '../util/dt-util';

/*
  Sunrise / sunset from the almanac approximation
    (Almanac for Computers, 1990, Nautical Almanac Office)
  Accurate to a minute or two away from the poles.
_*/

/*
  sun's centre 48' below the horizon: refraction + apparent radius
_*/
export const SUN_ZENITH_DEG = 90.8;

const TO_RAD = Math.PI / 180;
const TO_DEG = 180 / Math.PI;

export const suntime = {
  getSunrise: getSunrise,
  getSunset: getSunset,
  calcSunTime: calcSunTime,
  dayOfYear: dayOfYear,
} as const;

/*
  throws NoSuchEventError during polar day/night
_*/
function getSunrise(lat: number, lon: number, date?: CalendarDate, zone?: ZoneLike): DateTime {
  return getSunTime(lat, lon, 'sunrise', date, zone);
}

function getSunset(lat: number, lon: number, date?: CalendarDate, zone?: ZoneLike): DateTime {
  return getSunTime(lat, lon, 'sunset', date, zone);
}

function getSunTime(
  lat: number,
  lon: number,
  kind: SunEventKind,
  date?: CalendarDate,
  zone?: ZoneLike,
): DateTime {
  let tz: Zone;
  let sunEvt: SunEvent;
  tz = dtUtil.resolveZone(zone);
  sunEvt = calcSunTime(lat, lon, date ?? CalendarDate.today(tz), kind, tz);
  if(!sunEvt.ok) {
    throw new NoSuchEventError(sunEvt.reason);
  }
  return sunEvt.time;
}

function calcSunTime(
  lat: number,
  lon: number,
  date: CalendarDate,
  kind: SunEventKind,
  zone?: ZoneLike,
): SunEvent {
  let tz = dtUtil.resolveZone(zone);
  date = CalendarDate.validate(date);
  let utHours = calcUtHours(lat, lon, date, kind);
  if(typeof utHours === 'string') {
    return {
      ok: false,
      reason: utHours,
    };
  }
  return {
    ok: true,
    time: toUtcDateTime(date, utHours).setZone(tz),
  };
}

/*
  UTC decimal hours of the event on the given date, e.g. 16.03
_*/
function calcUtHours(
  lat: number,
  lon: number,
  date: CalendarDate,
  kind: SunEventKind,
): number | NoSuchEventReason {
  let isRise = kind === 'sunrise';

  let N = dayOfYear(date);

  let lngHour = normLongitude(lon) / 15;

  let t = isRise
    ? N + ((6 - lngHour) / 24)
    : N + ((18 - lngHour) / 24)
  ;

  /* mean anomaly */
  let M = (0.9856 * t) - 3.289;

  /* true longitude */
  let L = M
    + (1.916 * Math.sin(TO_RAD * M))
    + (0.020 * Math.sin(TO_RAD * 2 * M))
    + 282.634
  ;
  L = forceRange(L, 360);

  /* right ascension, in the same quadrant as L, then in hours */
  let RA = TO_DEG * Math.atan(0.91764 * Math.tan(TO_RAD * L));
  RA = forceRange(RA, 360);
  let lQuadrant = Math.floor(L / 90) * 90;
  let raQuadrant = Math.floor(RA / 90) * 90;
  RA = RA + (lQuadrant - raQuadrant);
  RA = RA / 15;

  /* declination */
  let sinDec = 0.39782 * Math.sin(TO_RAD * L);
  let cosDec = Math.cos(Math.asin(sinDec));

  /* local hour angle */
  let cosH = (
    Math.cos(TO_RAD * SUN_ZENITH_DEG) - (sinDec * Math.sin(TO_RAD * lat))
  ) / (cosDec * Math.cos(TO_RAD * lat));
  if(cosH > 1) {
    return 'never_rises';
  }
  if(cosH < -1) {
    return 'never_sets';
  }

  let H = isRise
    ? 360 - (TO_DEG * Math.acos(cosH))
    : TO_DEG * Math.acos(cosH)
  ;
  H = H / 15;

  /* local mean time of the event */
  let T = H + RA - (0.06571 * t) - 6.622;

  return forceRange(T - lngHour, 24);
}

/*
  Rounds to the minute. 23:59.7 lands on 00:00 of the next day,
    luxon handles the month/year carry.
_*/
function toUtcDateTime(date: CalendarDate, utHours: number): DateTime {
  let hr = Math.floor(utHours) % 24;
  let min = Math.round((utHours - Math.floor(utHours)) * 60);
  if(min === 60) {
    hr += 1;
    min = 0;
  }
  let dt = DateTime.utc(date.year, date.month, date.day);
  if(hr === 24) {
    hr = 0;
    dt = dt.plus({ days: 1 });
  }
  return dt.set({
    hour: hr,
    minute: min,
  });
}

/*
  1-based day of the year. Every 4th year counts as leap, 1900 and 2100 too.
_*/
function dayOfYear(date: CalendarDate): number {
  let { year, month, day } = date;
  let N1 = Math.floor(275 * month / 9);
  let N2 = Math.floor((month + 9) / 12);
  let N3 = 1 + Math.floor((year - (4 * Math.floor(year / 4)) + 2) / 3);
  return N1 - (N2 * N3) + day - 30;
}

/*
  lon and lon+360 are the same meridian. In-range values pass through as is,
    others are reduced into (-180, 180]
_*/
function normLongitude(lon: number): number {
  if(lon >= -180 && lon <= 180) {
    return lon;
  }
  return 180 - forceRange(180 - lon, 360);
}

/*
  v into [0, max)
_*/
function forceRange(v: number, max: number): number {
  return ((v % max) + max) % max;
}
