
/* typebox utils */

import type { Static, TSchema } from '@sinclair/typebox';
import { TransformDecodeCheckError, Value } from '@sinclair/typebox/value';
import { TypeCompiler } from '@sinclair/typebox/compiler';

export const tbUtil = {
  getSchemaDecodeFn: getSchemaDecodeFn,
  decodeWithSchema: decodeWithSchema,
} as const;

function decodeWithSchema<S extends TSchema>(tschema: S, rawVal: unknown): Static<S> {
  let decoded: Static<S>;
  try {
    decoded = Value.Decode(tschema, rawVal);
  } catch(e) {
    throw toDecodeError(e);
  }
  return decoded;
}

function getSchemaDecodeFn<S extends TSchema>(tschema: S): (rawVal: unknown) => Static<S> {
  let cSchema = TypeCompiler.Compile(tschema);
  return function schemaDecodeFn(rawVal: unknown) {
    let decoded: Static<S>;
    try {
      decoded = cSchema.Decode(rawVal);
    } catch(e) {
      throw toDecodeError(e);
    }
    return decoded;
  };
}

function toDecodeError(e: unknown): unknown {
  if(!(e instanceof TransformDecodeCheckError)) {
    return e;
  }
  return new Error(`${e.error.message}, path: ${e.error.path}`, { cause: e });
}
