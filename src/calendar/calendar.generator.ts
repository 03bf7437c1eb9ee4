import { Inject, Injectable } from '@nestjs/common';
import { addDays, isWeekend, IsoDate } from '../common/time.util';
import {
  CALENDAR_TABLES,
  EARLY_CLOSE_LOCAL,
  MARKET_OPEN_LOCAL,
  REGULAR_CLOSE_LOCAL,
  REGULAR_HOURS_NOTES,
  WEEKEND_NOTES,
} from './calendar.constants';
import { CalendarTables, TradingDay } from './calendar.interface';

@Injectable()
export class CalendarGeneratorService {
  private readonly holidays: Map<IsoDate, string>;
  private readonly earlyCloses: Map<IsoDate, string>;

  constructor(@Inject(CALENDAR_TABLES) private readonly tables: CalendarTables) {
    this.holidays = new Map(tables.holidays.map((entry) => [entry.date, entry.name]));
    this.earlyCloses = new Map(tables.earlyCloses.map((entry) => [entry.date, entry.notes]));
  }

  get tablesVersion(): string {
    return this.tables.version;
  }

  /**
   * Un registro por fecha en [startDate, endDate], en orden. Rango vacío si
   * startDate > endDate.
   */
  generate(startDate: IsoDate, endDate: IsoDate): TradingDay[] {
    const days: TradingDay[] = [];
    for (let current = startDate; current <= endDate; current = addDays(current, 1)) {
      days.push(this.buildDay(current));
    }
    return days;
  }

  // Prioridad: fin de semana > festivo > cierre anticipado > sesión regular
  buildDay(date: IsoDate): TradingDay {
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

    const holidayName = this.holidays.get(date);
    if (holidayName !== undefined) {
      return {
        date,
        isOpen: false,
        openTimeLocal: null,
        closeTimeLocal: null,
        isEarlyClose: false,
        holidayName,
        notes: `Market closed for ${holidayName}`,
      };
    }

    const earlyCloseNotes = this.earlyCloses.get(date);
    if (earlyCloseNotes !== undefined) {
      return {
        date,
        isOpen: true,
        openTimeLocal: MARKET_OPEN_LOCAL,
        closeTimeLocal: EARLY_CLOSE_LOCAL,
        isEarlyClose: true,
        holidayName: null,
        notes: earlyCloseNotes,
      };
    }

    return {
      date,
      isOpen: true,
      openTimeLocal: MARKET_OPEN_LOCAL,
      closeTimeLocal: REGULAR_CLOSE_LOCAL,
      isEarlyClose: false,
      holidayName: null,
      notes: REGULAR_HOURS_NOTES,
    };
  }
}
