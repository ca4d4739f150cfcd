import { Injectable } from '@nestjs/common';

/**
 * Source of "now" for token expiry and entitlement checks.
 */
export abstract class Clock {
  abstract now(): Date;
}

@Injectable()
export class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }
}
