import { Injectable } from '@nestjs/common';

/**
 * Source of "now" for past-time rules and slot searches. Tests bind a
 * fixed clock in its place.
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
