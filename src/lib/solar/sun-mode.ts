
import { DateTime } from 'luxon';
import { CalendarDate } from '../models/calendar-date';
import { sun_event_kinds, type NoSuchEventReason, type SunEventKind } from '../models/sun-event';
import { suntime } from './suntime';

export const appearances = [
  'dark',
  'light',
] as const;
export type Appearance = typeof appearances[number];

type TimelineEvt = {
  kind: SunEventKind;
  ts: number;
} & {};

/*
  Dark after sunset and before sunrise.
  Events are stamped onto the UTC date they were computed for, so far from
    Greenwich "today's" sunset can come before "today's" sunrise. Look at
    yesterday, today and tomorrow (UTC) and go by the last event before now.
_*/
export const sunMode = {
  getAppearance: getAppearance,
  isDark: isDark,
} as const;

function getAppearance(lat: number, lon: number, now?: DateTime): Appearance {
  let nowUtc: DateTime;
  let nowTs: number;
  let timeline: TimelineEvt[];
  let todayReason: NoSuchEventReason | undefined;
  nowUtc = (now ?? DateTime.now()).toUTC();
  nowTs = nowUtc.toMillis();
  timeline = [];
  for(let dayOffset = -1; dayOffset <= 1; dayOffset++) {
    let date = CalendarDate.fromDateTime(nowUtc.plus({ days: dayOffset }));
    for(let i = 0; i < sun_event_kinds.length; i++) {
      let kind = sun_event_kinds[i];
      let sunEvt = suntime.calcSunTime(lat, lon, date, kind, 'utc');
      if(sunEvt.ok) {
        timeline.push({
          kind,
          ts: sunEvt.time.toMillis(),
        });
      } else if(dayOffset === 0) {
        todayReason ??= sunEvt.reason;
      }
    }
  }
  timeline.sort((a, b) => a.ts - b.ts);
  let lastEvt: TimelineEvt | undefined;
  let nextEvt: TimelineEvt | undefined;
  for(let i = 0; i < timeline.length; i++) {
    if(timeline[i].ts <= nowTs) {
      lastEvt = timeline[i];
    } else {
      nextEvt = timeline[i];
      break;
    }
  }
  if(lastEvt !== undefined) {
    return (lastEvt.kind === 'sunset') ? 'dark' : 'light';
  }
  if(nextEvt !== undefined) {
    return (nextEvt.kind === 'sunrise') ? 'dark' : 'light';
  }
  /* polar day or night for the whole window */
  return (todayReason === 'never_sets') ? 'light' : 'dark';
}

function isDark(lat: number, lon: number, now?: DateTime): boolean {
  return getAppearance(lat, lon, now) === 'dark';
}
