
import { suntime } from './lib/solar/suntime';
import { sunMode } from './lib/solar/sun-mode';

export const {
  getSunrise,
  getSunset,
  calcSunTime,
} = suntime;

export const {
  getAppearance,
  isDark,
} = sunMode;

export { SUN_ZENITH_DEG } from './lib/solar/suntime';
export type { Appearance } from './lib/solar/sun-mode';
export { CalendarDate } from './lib/models/calendar-date';
export type { GeoCoord } from './lib/models/geo-coord';
export type { SunEvent, SunEventKind, NoSuchEventReason } from './lib/models/sun-event';
export { NoSuchEventError } from './lib/models/error/no-such-event-error';
export { SmError } from './lib/models/error/sm-error';
export type { ZoneLike } from './lib/util/dt-util';
