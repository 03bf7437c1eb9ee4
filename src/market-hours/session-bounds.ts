import { DateTime } from 'luxon';
import { exchangeTimeToUtc } from '../common/time.util';
import { OpenTradingDay } from '../calendar/calendar.interface';

export interface SessionBounds {
  openUtc: DateTime<true>;
  closeUtc: DateTime<true>;
}

// Apertura y cierre del día en UTC según el offset del Este vigente esa fecha
export function sessionBounds(day: OpenTradingDay): SessionBounds {
  return {
    openUtc: exchangeTimeToUtc(day.date, day.openTimeLocal),
    closeUtc: exchangeTimeToUtc(day.date, day.closeTimeLocal),
  };
}
