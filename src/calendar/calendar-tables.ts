import { Provider } from '@nestjs/common';
import { plainToInstance, Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsString, Matches, ValidateNested, validateSync } from 'class-validator';
import { isIsoDate } from '../common/time.util';
import { CALENDAR_TABLES } from './calendar.constants';
import { CalendarTables } from './calendar.interface';
import rawTables from './data/market-calendar.json';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

class HolidayEntryDto {
  @Matches(ISO_DATE)
  date!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;
}

class EarlyCloseEntryDto {
  @Matches(ISO_DATE)
  date!: string;

  @IsString()
  @IsNotEmpty()
  notes!: string;
}

class CalendarTablesDto {
  @IsString()
  @IsNotEmpty()
  version!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HolidayEntryDto)
  holidays!: HolidayEntryDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EarlyCloseEntryDto)
  earlyCloses!: EarlyCloseEntryDto[];
}

/**
 * Valida las tablas de festivos y cierres anticipados. Un fichero mal formado
 * debe romper el arranque, no producir un calendario incorrecto.
 */
export function loadCalendarTables(raw: unknown): CalendarTables {
  const tables = plainToInstance(CalendarTablesDto, raw);
  const errors = validateSync(tables);
  if (errors.length > 0) {
    const details = errors.map((error) => error.toString()).join('; ');
    throw new Error(`Tablas de calendario inválidas: ${details}`);
  }

  const seen = new Set<string>();
  for (const { date } of [...tables.holidays, ...tables.earlyCloses]) {
    if (!isIsoDate(date)) {
      throw new Error(`Tablas de calendario inválidas: ${date} no es una fecha real`);
    }
    if (seen.has(date)) {
      throw new Error(`Tablas de calendario inválidas: ${date} aparece más de una vez`);
    }
    seen.add(date);
  }

  return {
    version: tables.version,
    holidays: tables.holidays.map(({ date, name }) => ({ date, name })),
    earlyCloses: tables.earlyCloses.map(({ date, notes }) => ({ date, notes })),
  };
}

export const calendarTablesProvider: Provider = {
  provide: CALENDAR_TABLES,
  useFactory: () => loadCalendarTables(rawTables),
};
