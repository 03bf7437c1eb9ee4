import { Provider } from '@nestjs/common';

export const CLOCK = Symbol('CLOCK');

/** Fuente de "ahora". Se sustituye en los tests por un reloj fijo. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const clockProvider: Provider = {
  provide: CLOCK,
  useValue: systemClock,
};
