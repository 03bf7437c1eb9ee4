// Sesión regular NYSE / NASDAQ, hora del Este
export const MARKET_OPEN_LOCAL = '09:30:00';
export const REGULAR_CLOSE_LOCAL = '16:00:00';
export const EARLY_CLOSE_LOCAL = '13:00:00';

export const WEEKEND_NOTES = 'Weekend';
export const REGULAR_HOURS_NOTES = 'Regular trading hours';

export const CALENDAR_STORE = Symbol('CALENDAR_STORE');
export const CALENDAR_TABLES = Symbol('CALENDAR_TABLES');
