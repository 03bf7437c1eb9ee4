import { BadRequestException, NotFoundException } from '@nestjs/common';

export class InvalidDateError extends BadRequestException {
  constructor(readonly value: string) {
    super(`Invalid date "${value}". Use YYYY-MM-DD`);
  }
}

/** La búsqueda agotó el horizonte sin encontrar sesión. No es un fallo del sistema. */
export class NoUpcomingEventError extends NotFoundException {
  constructor(horizonDays: number) {
    super(`No upcoming market events found in next ${horizonDays} days`);
  }
}
