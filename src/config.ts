
import 'dotenv/config';
import { GeoCoord } from './lib/models/geo-coord';
import { SmError, sm_err_codes } from './lib/models/error/sm-error';
import { dtUtil } from './lib/util/dt-util';

const site_required_keys = [
  'sm_latitude',
  'sm_longitude',
] as const;
type SiteConfigKey = typeof site_required_keys[number];

const time_zone_key = 'sm_time_zone';

export type SiteConfig = {
  coord: GeoCoord;
  /* IANA name, system zone when absent */
  timeZone?: string;
} & {};

export type SiteConfigOverrides = Partial<Record<SiteConfigKey | typeof time_zone_key, string>>;

const DEV_ENV_STR = 'dev';

export const smConfig = {
  getSiteConfig,
  isDevEnv: isDevEnv,
  getEnvironment,
} as const;

function isDevEnv() {
  return getEnvironment() === DEV_ENV_STR;
}

function getEnvironment() {
  return process.env.ENVIRONMENT;
}

/*
  overrides (e.g. cli flags) win over env, key by key
_*/
function getSiteConfig(overrides: SiteConfigOverrides = {}): SiteConfig {
  let rawCfg: Partial<Record<SiteConfigKey, string>>;
  let missingKeys: SiteConfigKey[];
  let timeZone: string | undefined;
  missingKeys = [];
  rawCfg = {};
  for(let i = 0; i < site_required_keys.length; ++i) {
    let currKey = site_required_keys[i];
    let val = overrides[currKey] ?? process.env[currKey];
    if(val === undefined || val.trim() === '') {
      missingKeys.push(currKey);
    }
    rawCfg[currKey] = val;
  }
  if(missingKeys.length > 0) {
    throw new SmError(`Missing required key: ${missingKeys.join(', ')}`, sm_err_codes.missing_config);
  }
  timeZone = overrides[time_zone_key] ?? process.env[time_zone_key];
  if(timeZone === '') {
    timeZone = undefined;
  }
  if(timeZone !== undefined && !dtUtil.isValidZone(timeZone)) {
    throw new SmError(`Invalid time zone: ${timeZone}`, sm_err_codes.invalid_zone);
  }
  return {
    coord: GeoCoord.parse({
      latitude: Number(rawCfg.sm_latitude),
      longitude: Number(rawCfg.sm_longitude),
    }),
    timeZone,
  };
}
