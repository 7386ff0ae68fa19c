
import type { DateTime } from 'luxon';

export const sun_event_kinds = [
  'sunrise',
  'sunset',
] as const;
export type SunEventKind = typeof sun_event_kinds[number];

export const no_such_event_reasons = [
  'never_rises',
  'never_sets',
] as const;
export type NoSuchEventReason = typeof no_such_event_reasons[number];

/*
  exactly one of: a concrete instant, or the reason there is none
_*/
export type SunEvent = {
  ok: true;
  time: DateTime;
} | {
  ok: false;
  reason: NoSuchEventReason;
};
