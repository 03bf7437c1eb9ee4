import { IsoDate } from '../common/time.util';

export interface OpenTradingDay {
  date: IsoDate;
  isOpen: true;
  openTimeLocal: string; // "09:30:00" hora del Este
  closeTimeLocal: string; // "16:00:00" o "13:00:00" en cierre anticipado
  isEarlyClose: boolean;
  holidayName: null;
  notes: string;
}

export interface ClosedTradingDay {
  date: IsoDate;
  isOpen: false;
  openTimeLocal: null;
  closeTimeLocal: null;
  isEarlyClose: false;
  holidayName: string | null; // null en fines de semana
  notes: string;
}

export type TradingDay = OpenTradingDay | ClosedTradingDay;

export interface HolidayEntry {
  date: IsoDate;
  name: string;
}

export interface EarlyCloseEntry {
  date: IsoDate;
  notes: string;
}

export interface CalendarTables {
  version: string;
  holidays: HolidayEntry[];
  earlyCloses: EarlyCloseEntry[];
}

export type CalendarRunStatus = 'success' | 'failed';

export interface CalendarRunInput {
  status: CalendarRunStatus;
  source: string;
  payload: Record<string, unknown> | null;
}

export interface CalendarRun extends CalendarRunInput {
  id: number;
  ranAt: Date;
}

/** Resultado de consultar una fuente externa (NYSE, NASDAQ). Solo procedencia. */
export interface EnrichmentResult {
  source: string;
  url: string;
  success: boolean;
  httpStatus?: number;
  bytes?: number;
  error?: string;
  fetchedAt: string;
}

export type RefreshTrigger = 'startup' | 'scheduled' | 'manual';

export interface CalendarRefreshResult {
  status: CalendarRunStatus;
  trigger: RefreshTrigger;
  startDate: IsoDate;
  endDate: IsoDate;
  daysGenerated: number;
  sources: EnrichmentResult[];
  durationMs: number;
  error?: string;
}
