
import { type Static, Type } from '@sinclair/typebox';
import { DateTime, type Zone } from 'luxon';
import { tbUtil } from '../util/tb-util';
import { SmError, sm_err_codes } from './error/sm-error';

const calendar_date_fmt = 'yyyy-MM-dd';

const CalendarDateTSchema = Type.Object({
  year: Type.Integer(),
  month: Type.Integer({ minimum: 1, maximum: 12 }),
  day: Type.Integer({ minimum: 1, maximum: 31 }),
});

/* proleptic Gregorian, month is 1-based */
export type CalendarDate = Static<typeof CalendarDateTSchema>;

export const CalendarDate = {
  tschema: CalendarDateTSchema,
  validate: calendarDateValidate,
  parse: calendarDateParse,
  fromDateTime: fromDateTime,
  today: today,
} as const;

/*
  for dates handed in by library callers, e.g. { year: 2023, month: 2, day: 30 }
_*/
function calendarDateValidate(rawVal: unknown): CalendarDate {
  let date: CalendarDate;
  try {
    date = tbUtil.decodeWithSchema(CalendarDateTSchema, rawVal);
  } catch(e) {
    if(!(e instanceof Error)) {
      throw e;
    }
    throw new SmError(`Invalid date: ${e.message}`, sm_err_codes.invalid_date, { cause: e });
  }
  let dt = DateTime.utc(date.year, date.month, date.day);
  if(!dt.isValid) {
    throw new SmError(
      `Invalid date ${date.year}-${date.month}-${date.day}: ${dt.invalidExplanation ?? dt.invalidReason}`,
      sm_err_codes.invalid_date,
    );
  }
  return date;
}

/*
  parse a YYYY-MM-DD string, rejecting days the month doesn't have
_*/
function calendarDateParse(dateStr: string): CalendarDate {
  let dt = DateTime.fromFormat(dateStr, calendar_date_fmt, { zone: 'utc' });
  if(!dt.isValid) {
    throw new SmError(
      `Invalid date '${dateStr}', expected ${calendar_date_fmt}: ${dt.invalidExplanation ?? dt.invalidReason}`,
      sm_err_codes.invalid_date,
    );
  }
  return fromDateTime(dt);
}

function fromDateTime(dt: DateTime): CalendarDate {
  return {
    year: dt.year,
    month: dt.month,
    day: dt.day,
  };
}

function today(zone: Zone): CalendarDate {
  return fromDateTime(DateTime.now().setZone(zone));
}
