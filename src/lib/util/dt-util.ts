
import { Info, Settings, type DateTime, type Zone } from 'luxon';
import { SmError, sm_err_codes } from '../models/error/sm-error';

export type ZoneLike = string | Zone;

const tz_iso_fmt = 'yyyy-MM-dd HH:mm:ss.SSSZZ';

export const dtUtil = {
  tzIso: tzIso,
  resolveZone: resolveZone,
  isValidZone: isValidZone,
} as const;

/*
  e.g. 2026-02-21 15:01:18.507+00:00, offset of the DateTime's own zone
_*/
function tzIso(dt: DateTime): string {
  return dt.toFormat(tz_iso_fmt);
}

/*
  Omitted zone means the system zone as it is right now, not at startup.
_*/
function resolveZone(zone?: ZoneLike): Zone {
  let resolved: Zone;
  resolved = (zone === undefined)
    ? Settings.defaultZone
    : Info.normalizeZone(zone)
  ;
  if(!resolved.isValid) {
    throw new SmError(`Invalid time zone: ${zoneName(zone)}`, sm_err_codes.invalid_zone);
  }
  return resolved;
}

function isValidZone(zone: ZoneLike): boolean {
  return Info.normalizeZone(zone).isValid;
}

function zoneName(zone?: ZoneLike): string {
  if(zone === undefined) {
    return 'system';
  }
  return (typeof zone === 'string') ? zone : zone.name;
}
