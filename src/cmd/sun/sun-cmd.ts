
import type { DateTime, Zone } from 'luxon';
import type { CmdCtx } from '../cmd-ctx';
import { cmdArgs } from '../util/cmd-args';
import { CalendarDate } from '../../lib/models/calendar-date';
import type { SunEventKind } from '../../lib/models/sun-event';
import { NoSuchEventError } from '../../lib/models/error/no-such-event-error';
import { suntime } from '../../lib/solar/suntime';
import { dtUtil } from '../../lib/util/dt-util';

/*
  print today's (or --date) sunrise and sunset
_*/
export function sunCmdMain(ctx: CmdCtx, args: string[]) {
  let flags = cmdArgs.parseFlags(args);
  let sunQuery = cmdArgs.getSunQuery(flags);
  let tz: Zone;
  let date: CalendarDate;
  let outLines: string[];
  tz = dtUtil.resolveZone(sunQuery.timeZone);
  date = sunQuery.date ?? CalendarDate.today(tz);
  outLines = [
    fmtSunTime(ctx, 'sunrise', () => {
      return suntime.getSunrise(sunQuery.coord.latitude, sunQuery.coord.longitude, date, tz);
    }),
    fmtSunTime(ctx, 'sunset', () => {
      return suntime.getSunset(sunQuery.coord.latitude, sunQuery.coord.longitude, date, tz);
    }),
  ];
  ctx.logger.info({
    cmd: 'sun',
    coord: sunQuery.coord,
    date,
    zone: tz.name,
  }, outLines.join(', '));
  ctx.write(`${outLines.join('\n')}\n`);
}

function fmtSunTime(ctx: CmdCtx, kind: SunEventKind, getTimeFn: () => DateTime): string {
  let sunTime: DateTime;
  try {
    sunTime = getTimeFn();
  } catch(e) {
    if(!(e instanceof NoSuchEventError)) {
      throw e;
    }
    ctx.logger.debug({
      kind,
      code: e.code,
    }, e.message);
    return `${kind}: none (${e.reason})`;
  }
  return `${kind}: ${dtUtil.tzIso(sunTime)}`;
}
