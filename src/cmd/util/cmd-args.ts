
import { parseArgs, type ParseArgsConfig } from 'node:util';
import { DateTime } from 'luxon';
import { smConfig } from '../../config';
import { CalendarDate } from '../../lib/models/calendar-date';
import type { GeoCoord } from '../../lib/models/geo-coord';
import { SmError, sm_err_codes } from '../../lib/models/error/sm-error';

const flag_opts = {
  lat: { type: 'string' },
  lon: { type: 'string' },
  date: { type: 'string' },
  tz: { type: 'string' },
  at: { type: 'string' },
} as const satisfies ParseArgsConfig['options'];

export type SmFlags = {
  [K in keyof typeof flag_opts]?: string;
} & {};

export type SunQuery = {
  coord: GeoCoord;
  date?: CalendarDate;
  timeZone?: string;
  at?: DateTime;
} & {};

export const cmdArgs = {
  parseFlags: parseFlags,
  getSunQuery: getSunQuery,
  usage: usage,
} as const;

/*
  negative values need the = form, e.g. --lon=-0.1278
_*/
function parseFlags(args: string[]): SmFlags {
  let flags: SmFlags;
  try {
    flags = parseArgs({
      args,
      options: flag_opts,
    }).values;
  } catch(e) {
    if(!(e instanceof Error)) {
      throw e;
    }
    throw new SmError(e.message, sm_err_codes.invalid_flag, { cause: e });
  }
  return flags;
}

function getSunQuery(flags: SmFlags): SunQuery {
  let siteCfg = smConfig.getSiteConfig({
    sm_latitude: flags.lat,
    sm_longitude: flags.lon,
    sm_time_zone: flags.tz,
  });
  return {
    coord: siteCfg.coord,
    timeZone: siteCfg.timeZone,
    date: (flags.date === undefined)
      ? undefined
      : CalendarDate.parse(flags.date),
    at: (flags.at === undefined)
      ? undefined
      : parseInstant(flags.at),
  };
}

function parseInstant(isoStr: string): DateTime {
  let dt = DateTime.fromISO(isoStr, { setZone: true });
  if(!dt.isValid) {
    throw new SmError(`Invalid --at '${isoStr}': ${dt.invalidExplanation ?? dt.invalidReason}`, sm_err_codes.invalid_flag);
  }
  return dt;
}

function usage(): string[] {
  return [
    'flags:',
    '  --lat <deg>           latitude, default $sm_latitude',
    '  --lon <deg>           longitude, default $sm_longitude (use --lon=-0.1 for west)',
    '  --tz <zone>           IANA zone for output, default $sm_time_zone or system',
    '  --date <yyyy-MM-dd>   sun: reference date, default today',
    '  --at <iso instant>    mode: reference instant, default now',
  ];
}
