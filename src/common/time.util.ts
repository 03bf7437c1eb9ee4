import { DateTime } from 'luxon';

/** Zona horaria del NYSE / NASDAQ. */
export const EXCHANGE_TIME_ZONE = 'America/New_York';

/** Fecha de calendario en formato YYYY-MM-DD. */
export type IsoDate = string;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const LOCAL_TIME_PATTERN = /^\d{2}:\d{2}:\d{2}$/;

// Devuelve null si la cadena no es una fecha de calendario real (ej. 2025-02-30)
export function parseIsoDate(value: string): DateTime<true> | null {
  if (!ISO_DATE_PATTERN.test(value)) {
    return null;
  }
  const parsed = DateTime.fromFormat(value, 'yyyy-MM-dd', { zone: 'utc' });
  return parsed.isValid ? parsed : null;
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

function requireIsoDate(value: IsoDate): DateTime<true> {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new RangeError(`Fecha inválida: ${value}`);
  }
  return parsed;
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return requireIsoDate(date).plus({ days }).toISODate();
}

/** Sábado o domingo. */
export function isWeekend(date: IsoDate): boolean {
  return requireIsoDate(date).weekday >= 6;
}

/**
 * Fecha UTC de un instante. Es la fecha que se usa como "hoy" en todo el
 * servicio.
 */
export function utcDateOf(instant: Date): IsoDate {
  const dt = DateTime.fromJSDate(instant, { zone: 'utc' });
  if (!dt.isValid) {
    throw new RangeError('Instante inválido');
  }
  return dt.toISODate();
}

/**
 * Convierte una hora de pared del exchange (HH:MM:SS, hora del Este) en la
 * fecha dada a un instante UTC. El offset sale de las reglas de la zona
 * (EST -05:00 / EDT -04:00), nunca de un valor fijo.
 */
export function exchangeTimeToUtc(date: IsoDate, localTime: string): DateTime<true> {
  if (!LOCAL_TIME_PATTERN.test(localTime)) {
    throw new RangeError(`Hora local inválida: ${localTime}`);
  }
  const local = DateTime.fromISO(`${date}T${localTime}`, { zone: EXCHANGE_TIME_ZONE });
  if (!local.isValid) {
    throw new RangeError(`Hora local inválida: ${date} ${localTime}`);
  }
  return local.toUTC();
}

// ISO-8601 en UTC sin milisegundos: 2025-11-28T14:30:00Z
export function toUtcIso(instant: DateTime<true>): string {
  return instant.toUTC().toISO({ suppressMilliseconds: true });
}
