import { Inject, Injectable, Logger } from '@nestjs/common';
import { CALENDAR_STORE, MARKET_OPEN_LOCAL, REGULAR_CLOSE_LOCAL, WEEKEND_NOTES } from '../calendar/calendar.constants';
import { TradingDay } from '../calendar/calendar.interface';
import { CalendarStore } from '../calendar/calendar.store';
import { Clock, CLOCK } from '../common/clock';
import { addDays, isIsoDate, isWeekend, IsoDate, toUtcIso, utcDateOf } from '../common/time.util';
import { InvalidDateError, NoUpcomingEventError } from './market-hours.errors';
import {
  MarketStatus,
  NextEvent,
  OpenNowCheck,
  OpenNowResponse,
  ResolvedHours,
  WeekSchedule,
} from './market-hours.interface';
import { NEXT_EVENT_HORIZON_DAYS, NextEventService } from './next-event.service';
import { sessionBounds } from './session-bounds';

export const ESTIMATED_HOURS_NOTES = 'Regular trading hours (estimated)';
export const MARKET_CLOSED_NOTES = 'Market closed';
export const WEEK_LENGTH_DAYS = 7;

@Injectable()
export class MarketHoursService {
  private readonly logger = new Logger(MarketHoursService.name);

  constructor(
    @Inject(CALENDAR_STORE) private readonly store: CalendarStore,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly nextEventService: NextEventService,
  ) {}

  /**
   * Horario de una fecha y estado del mercado respecto a `now`.
   *
   * Si el calendario aún no tiene la fecha se usa un día estimado (fin de
   * semana cerrado, laborable 09:30-16:00 ET) que no se guarda; un día cerrado
   * sin registro lleva la nota genérica "Market closed". Un error del almacén
   * se propaga tal cual.
   */
  async resolve(targetDate: IsoDate, now: Date): Promise<ResolvedHours> {
    const stored = await this.store.get(targetDate);
    const day = stored ?? this.estimateDay(targetDate);

    if (!day.isOpen) {
      let notes = day.notes;
      if (day.holidayName) {
        notes = `Market closed for ${day.holidayName}`;
      } else if (stored === null) {
        notes = MARKET_CLOSED_NOTES;
      }

      return {
        date: targetDate,
        openTimeUtc: null,
        closeTimeUtc: null,
        isOpen: false,
        isEarlyClose: false,
        notes,
        status: MarketStatus.CLOSED,
      };
    }

    const { openUtc, closeUtc } = sessionBounds(day);
    const instant = now.getTime();

    let status: MarketStatus;
    if (utcDateOf(now) !== targetDate) {
      status = MarketStatus.CLOSED;
    } else if (instant < openUtc.toMillis() || instant > closeUtc.toMillis()) {
      status = MarketStatus.CLOSED;
    } else {
      status = day.isEarlyClose ? MarketStatus.EARLY_CLOSE : MarketStatus.OPEN;
    }

    return {
      date: targetDate,
      openTimeUtc: toUtcIso(openUtc),
      closeTimeUtc: toUtcIso(closeUtc),
      isOpen: true,
      isEarlyClose: day.isEarlyClose,
      notes: day.notes,
      status,
    };
  }

  /**
   * ¿Está abierto en este instante? A diferencia de resolve() no estima:
   * sin registro para la fecha el mercado se considera cerrado.
   */
  async isOpenAt(instant: Date): Promise<OpenNowCheck> {
    const day = await this.store.get(utcDateOf(instant));

    if (day === null || !day.isOpen) {
      return { isOpen: false, reason: MARKET_CLOSED_NOTES };
    }

    const { openUtc, closeUtc } = sessionBounds(day);
    const time = instant.getTime();

    if (openUtc.toMillis() <= time && time <= closeUtc.toMillis()) {
      return { isOpen: true, reason: 'Market open' };
    }
    return { isOpen: false, reason: 'Outside trading hours' };
  }

  async weekSchedule(startDate: IsoDate, now: Date): Promise<ResolvedHours[]> {
    const dates = Array.from({ length: WEEK_LENGTH_DAYS }, (_, offset) => addDays(startDate, offset));
    return Promise.all(dates.map((date) => this.resolve(date, now)));
  }

  async getToday(): Promise<ResolvedHours> {
    const now = this.clock.now();
    return this.resolve(utcDateOf(now), now);
  }

  async getForDate(date: string): Promise<ResolvedHours> {
    if (!isIsoDate(date)) {
      throw new InvalidDateError(date);
    }
    return this.resolve(date, this.clock.now());
  }

  async getWeek(startDate?: string): Promise<WeekSchedule> {
    const now = this.clock.now();
    const start = startDate ?? utcDateOf(now);
    if (!isIsoDate(start)) {
      throw new InvalidDateError(start);
    }

    const days = await this.weekSchedule(start, now);
    return {
      startDate: start,
      endDate: addDays(start, WEEK_LENGTH_DAYS - 1),
      days,
    };
  }

  async getNextEvent(): Promise<NextEvent> {
    const event = await this.nextEventService.findNext(this.clock.now());
    if (!event) {
      this.logger.warn(`No hay sesiones en los próximos ${NEXT_EVENT_HORIZON_DAYS} días, ¿se ejecutó el refresco?`);
      throw new NoUpcomingEventError(NEXT_EVENT_HORIZON_DAYS);
    }
    return event;
  }

  async isOpenNow(): Promise<OpenNowResponse> {
    const now = this.clock.now();
    const { isOpen, reason } = await this.isOpenAt(now);
    return {
      isOpen,
      message: reason,
      timestamp: now.toISOString(),
    };
  }

  private estimateDay(date: IsoDate): TradingDay {
    if (isWeekend(date)) {
      return {
        date,
        isOpen: false,
        openTimeLocal: null,
        closeTimeLocal: null,
        isEarlyClose: false,
        holidayName: null,
        notes: WEEKEND_NOTES,
      };
    }
    return {
      date,
      isOpen: true,
      openTimeLocal: MARKET_OPEN_LOCAL,
      closeTimeLocal: REGULAR_CLOSE_LOCAL,
      isEarlyClose: false,
      holidayName: null,
      notes: ESTIMATED_HOURS_NOTES,
    };
  }
}
