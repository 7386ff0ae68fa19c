
import type { NoSuchEventReason } from '../sun-event';

const reason_codes: Record<NoSuchEventReason, string> = {
  never_rises: 'SUN_0.1',
  never_sets: 'SUN_0.2',
};

const reason_msgs: Record<NoSuchEventReason, string> = {
  never_rises: 'The sun never rises on this location (on the specified date)',
  never_sets: 'The sun never sets on this location (on the specified date)',
};

/*
  Thrown by getSunrise() / getSunset() when the hour angle has no solution.
  A domain outcome, callers decide what to fall back to.
_*/
export class NoSuchEventError extends Error {
  public readonly code: string;
  public readonly reason: NoSuchEventReason;
  constructor(reason: NoSuchEventReason) {
    let code = reason_codes[reason];
    super(`${code}: ${reason_msgs[reason]}`);
    this.name = 'NoSuchEventError';
    Object.setPrototypeOf(this, NoSuchEventError.prototype);
    this.code = code;
    this.reason = reason;
  }
}
