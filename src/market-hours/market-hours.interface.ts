import { IsoDate } from '../common/time.util';

export enum MarketStatus {
  OPEN = 'OPEN',
  CLOSED = 'CLOSED',
  EARLY_CLOSE = 'EARLY_CLOSE',
}

export interface ResolvedHours {
  date: IsoDate;
  openTimeUtc: string | null; // ISO-8601 UTC, null si no hay sesión
  closeTimeUtc: string | null;
  isOpen: boolean;
  isEarlyClose: boolean;
  notes: string;
  status: MarketStatus;
}

export interface WeekSchedule {
  startDate: IsoDate;
  endDate: IsoDate;
  days: ResolvedHours[];
}

export type MarketEventType = 'open' | 'close';

export interface NextEvent {
  eventType: MarketEventType;
  eventTimeUtc: string;
  timeUntilSeconds: number;
  nextDate: IsoDate;
  isEarlyClose: boolean;
  notes: string;
}

export interface OpenNowCheck {
  isOpen: boolean;
  reason: string;
}

export interface OpenNowResponse {
  isOpen: boolean;
  message: string;
  timestamp: string;
}
