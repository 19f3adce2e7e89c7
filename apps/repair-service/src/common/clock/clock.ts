import { Injectable } from '@nestjs/common';
import { formatDateToISO, generateUUID } from '@repairflow/shared';

export const CLOCK = Symbol('CLOCK');
export const ID_GENERATOR = Symbol('ID_GENERATOR');

export interface Clock {
  /** ISO-8601 timestamp, strictly increasing across calls */
  now(): string;
}

export interface IdGenerator {
  nextId(): string;
}

@Injectable()
export class SystemClock implements Clock {
  private lastMillis = 0;

  now(): string {
    const millis = Math.max(Date.now(), this.lastMillis + 1);
    this.lastMillis = millis;
    return formatDateToISO(new Date(millis));
  }
}

@Injectable()
export class UuidGenerator implements IdGenerator {
  nextId(): string {
    return generateUUID();
  }
}
