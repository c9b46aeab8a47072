import { Injectable } from '@nestjs/common';

/** Millisecond time source; injected so combo windows can be tested without waiting. */
export interface Clock {
  now(): number;
}

export const CLOCK = Symbol('CLOCK');

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}
