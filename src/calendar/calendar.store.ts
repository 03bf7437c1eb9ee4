import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, Repository } from 'typeorm';
import { Clock, CLOCK } from '../common/clock';
import { IsoDate } from '../common/time.util';
import { CalendarRunEntity } from './calendar-run.entity';
import { CalendarStoreUnavailableError } from './calendar.errors';
import { CalendarRun, CalendarRunInput, TradingDay } from './calendar.interface';
import { TradingDayEntity } from './trading-day.entity';

/**
 * Almacén del calendario de sesiones. Único dueño persistente de los
 * TradingDay; el resto del servicio solo lee.
 */
export interface CalendarStore {
  get(date: IsoDate): Promise<TradingDay | null>;
  /** Ordenado por fecha, ambos extremos incluidos. */
  getRange(startDate: IsoDate, endDate: IsoDate): Promise<TradingDay[]>;
  /** Upsert por fecha; created_at se conserva y updated_at avanza. */
  putBatch(days: TradingDay[]): Promise<void>;
  recordRun(run: CalendarRunInput): Promise<void>;
  getLastRun(): Promise<CalendarRun | null>;
}

// Columnas que se sobrescriben en conflicto. created_at queda fuera.
const UPSERT_COLUMNS = [
  'open_time_local',
  'close_time_local',
  'is_open',
  'is_early_close',
  'holiday_name',
  'notes',
  'updated_at',
];

const UPSERT_CHUNK_SIZE = 200;

export function toTradingDay(row: TradingDayEntity): TradingDay {
  if (!row.is_open) {
    return {
      date: row.date,
      isOpen: false,
      openTimeLocal: null,
      closeTimeLocal: null,
      isEarlyClose: false,
      holidayName: row.holiday_name,
      notes: row.notes,
    };
  }

  if (row.open_time_local === null || row.close_time_local === null) {
    throw new CalendarStoreUnavailableError(`registro inconsistente para ${row.date}: abierto sin horario`);
  }

  return {
    date: row.date,
    isOpen: true,
    openTimeLocal: row.open_time_local,
    closeTimeLocal: row.close_time_local,
    isEarlyClose: row.is_early_close,
    holidayName: null,
    notes: row.notes,
  };
}

@Injectable()
export class TypeOrmCalendarStore implements CalendarStore {
  private readonly logger = new Logger(TypeOrmCalendarStore.name);

  constructor(
    @InjectRepository(TradingDayEntity)
    private readonly tradingDayRepository: Repository<TradingDayEntity>,
    @InjectRepository(CalendarRunEntity)
    private readonly calendarRunRepository: Repository<CalendarRunEntity>,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  async get(date: IsoDate): Promise<TradingDay | null> {
    return this.withStore(`get ${date}`, async () => {
      const row = await this.tradingDayRepository.findOne({ where: { date } });
      return row ? toTradingDay(row) : null;
    });
  }

  async getRange(startDate: IsoDate, endDate: IsoDate): Promise<TradingDay[]> {
    return this.withStore(`getRange ${startDate}..${endDate}`, async () => {
      const rows = await this.tradingDayRepository.find({
        where: { date: Between(startDate, endDate) },
        order: { date: 'ASC' },
      });
      return rows.map(toTradingDay);
    });
  }

  /**
   * Reemplazo completo del rango en una sola transacción: los lectores ven el
   * calendario anterior o el nuevo, nunca una mezcla para una misma fecha.
   */
  async putBatch(days: TradingDay[]): Promise<void> {
    if (days.length === 0) {
      return;
    }

    const now = this.clock.now();
    const rows = days.map((day) =>
      this.tradingDayRepository.create({
        date: day.date,
        open_time_local: day.openTimeLocal,
        close_time_local: day.closeTimeLocal,
        is_open: day.isOpen,
        is_early_close: day.isEarlyClose,
        holiday_name: day.holidayName,
        notes: day.notes,
        created_at: now,
        updated_at: now,
      }),
    );

    await this.withStore(`putBatch ${days.length} días`, () =>
      this.tradingDayRepository.manager.transaction(async (manager) => {
        for (let i = 0; i < rows.length; i += UPSERT_CHUNK_SIZE) {
          await manager
            .createQueryBuilder()
            .insert()
            .into(TradingDayEntity)
            .values(rows.slice(i, i + UPSERT_CHUNK_SIZE))
            .orUpdate(UPSERT_COLUMNS, ['date'])
            .execute();
        }
      }),
    );

    this.logger.log(`💾 ${days.length} días guardados (${days[0].date} → ${days[days.length - 1].date})`);
  }

  async recordRun(run: CalendarRunInput): Promise<void> {
    await this.withStore('recordRun', () =>
      this.calendarRunRepository.save(
        this.calendarRunRepository.create({
          ran_at: this.clock.now(),
          status: run.status,
          source: run.source,
          payload: run.payload,
        }),
      ),
    );
  }

  async getLastRun(): Promise<CalendarRun | null> {
    return this.withStore('getLastRun', async () => {
      const [row] = await this.calendarRunRepository.find({
        order: { ran_at: 'DESC', id: 'DESC' },
        take: 1,
      });
      if (!row) {
        return null;
      }
      return {
        id: row.id,
        ranAt: row.ran_at,
        status: row.status === 'success' ? 'success' : 'failed',
        source: row.source,
        payload: row.payload,
      };
    });
  }

  private async withStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CalendarStoreUnavailableError) {
        throw error;
      }
      this.logger.error(`❌ Error en el almacén (${operation}): ${error instanceof Error ? error.message : String(error)}`);
      throw new CalendarStoreUnavailableError(operation, error);
    }
  }
}
