import { ServiceUnavailableException } from '@nestjs/common';

/**
 * El almacén del calendario no se pudo leer o escribir. Nunca se convierte en
 * datos por defecto: los valores estimados solo aplican cuando el almacén
 * responde que no hay registro para la fecha.
 */
export class CalendarStoreUnavailableError extends ServiceUnavailableException {
  constructor(operation: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Calendar store unavailable (${operation})${reason}`, { cause });
  }
}
