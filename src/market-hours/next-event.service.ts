import { Inject, Injectable } from '@nestjs/common';
import { DateTime } from 'luxon';
import { CALENDAR_STORE } from '../calendar/calendar.constants';
import { OpenTradingDay, TradingDay } from '../calendar/calendar.interface';
import { CalendarStore } from '../calendar/calendar.store';
import { addDays, toUtcIso, utcDateOf } from '../common/time.util';
import { MarketEventType, NextEvent } from './market-hours.interface';
import { sessionBounds } from './session-bounds';

/** Días hacia delante que se revisan antes de rendirse. */
export const NEXT_EVENT_HORIZON_DAYS = 30;

function isOpenDay(day: TradingDay): day is OpenTradingDay {
  return day.isOpen;
}

@Injectable()
export class NextEventService {
  constructor(@Inject(CALENDAR_STORE) private readonly store: CalendarStore) {}

  /**
   * Próxima apertura o cierre a partir de `now`. Solo usa registros
   * almacenados (sin días estimados). null si no hay sesión en el horizonte.
   */
  async findNext(now: Date): Promise<NextEvent | null> {
    const today = utcDateOf(now);
    const todayRecord = await this.store.get(today);

    if (todayRecord !== null && todayRecord.isOpen) {
      const { openUtc, closeUtc } = sessionBounds(todayRecord);

      if (now.getTime() < openUtc.toMillis()) {
        return this.buildEvent('open', openUtc, now, todayRecord);
      }
      if (now.getTime() < closeUtc.toMillis()) {
        return this.buildEvent('close', closeUtc, now, todayRecord);
      }
    }

    // El cierre de hoy ya pasó (o hoy no hay sesión): buscar la próxima apertura
    const upcoming = await this.store.getRange(addDays(today, 1), addDays(today, NEXT_EVENT_HORIZON_DAYS));
    const nextTradingDay = upcoming.find(isOpenDay);

    if (!nextTradingDay) {
      return null;
    }

    const { openUtc } = sessionBounds(nextTradingDay);
    return this.buildEvent('open', openUtc, now, nextTradingDay);
  }

  private buildEvent(eventType: MarketEventType, eventTime: DateTime<true>, now: Date, day: OpenTradingDay): NextEvent {
    return {
      eventType,
      eventTimeUtc: toUtcIso(eventTime),
      timeUntilSeconds: Math.floor((eventTime.toMillis() - now.getTime()) / 1000),
      nextDate: day.date,
      isEarlyClose: day.isEarlyClose,
      notes: day.notes,
    };
  }
}
