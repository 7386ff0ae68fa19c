
import { prim } from '../../util/validate-primitives';

const default_err_code = 'SM_0.1';

export const sm_err_codes = {
  default: default_err_code,
  missing_config: 'CFG_0.1',
  invalid_flag: 'CLI_0.1',
  invalid_zone: 'SUN_0.3',
  invalid_date: 'DT_0.1',
} as const;

/*
  General coded error for config and input problems.
  Polar day/night is not an error of this kind, see NoSuchEventError
_*/
export class SmError extends Error {
  public readonly code: string;
  public readonly smMsg: string;
  constructor(message?: string, code?: string)
  constructor(message?: string, options?: ErrorOptions)
  constructor(message?: string, code?: string, options?: ErrorOptions)
  constructor(message?: string, code?: string | ErrorOptions, options?: ErrorOptions) {
    let errCode: string;
    if(prim.isObject(code)) {
      options = code;
      errCode = default_err_code;
    } else if(prim.isString(code)) {
      errCode = code;
    } else {
      errCode = default_err_code;
    }
    super(message, options);
    this.name = 'SmError';
    Object.setPrototypeOf(this, SmError.prototype);
    this.code = errCode;
    this.smMsg = this.message;
    /* for logging: include code and message _*/
    this.message = `${this.code}: ${this.smMsg}`;
  }
}
