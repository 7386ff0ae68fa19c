
import { type Static, Type } from '@sinclair/typebox';
import { tbUtil } from '../util/tb-util';

const GeoCoordTSchema = Type.Object({
  latitude: Type.Number({ minimum: -90, maximum: 90 }),
  longitude: Type.Number({ minimum: -180, maximum: 180 }),
});

export type GeoCoord = Static<typeof GeoCoordTSchema>;

const geoCoordDecodeFn = tbUtil.getSchemaDecodeFn(GeoCoordTSchema);

export const GeoCoord = {
  tschema: GeoCoordTSchema,
  parse: geoCoordParse,
} as const;

/*
  Only input coming from outside (flags, env) goes through here.
  The calculator itself takes plain numbers and does not range check.
_*/
function geoCoordParse(rawVal: unknown): GeoCoord {
  return geoCoordDecodeFn(rawVal);
}
