import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { FixedClock, InMemoryCalendarStore } from '../../test/in-memory-calendar.store';
import configuration, { AppConfig } from '../config/configuration';
import { CalendarEnrichmentService } from './calendar-enrichment.service';
import { CalendarRefreshService } from './calendar-refresh.service';
import { CalendarStoreUnavailableError } from './calendar.errors';
import { CalendarGeneratorService } from './calendar.generator';
import { EnrichmentResult } from './calendar.interface';
import { loadCalendarTables } from './calendar-tables';
import rawTables from './data/market-calendar.json';

const okSources: EnrichmentResult[] = [
  { source: 'NYSE', url: 'https://nyse.test', success: true, httpStatus: 200, bytes: 10, fetchedAt: '2025-06-15T10:00:00.000Z' },
];

const failedSources: EnrichmentResult[] = [
  { source: 'NYSE', url: 'https://nyse.test', success: false, error: 'timeout', fetchedAt: '2025-06-15T10:00:00.000Z' },
  { source: 'NASDAQ', url: 'https://nasdaq.test', success: false, error: 'timeout', fetchedAt: '2025-06-15T10:00:00.000Z' },
];

describe('CalendarRefreshService', () => {
  let store: InMemoryCalendarStore;
  let clock: FixedClock;
  let enrichment: CalendarEnrichmentService;
  let fetchSources: jest.SpiedFunction<CalendarEnrichmentService['fetchSources']>;

  function createService(env: NodeJS.ProcessEnv = {}) {
    const configService = new ConfigService<AppConfig, true>({ ...configuration(env) });
    enrichment = new CalendarEnrichmentService(configService, clock);
    fetchSources = jest.spyOn(enrichment, 'fetchSources').mockResolvedValue(okSources);

    return new CalendarRefreshService(
      new CalendarGeneratorService(loadCalendarTables(rawTables)),
      enrichment,
      new SchedulerRegistry(),
      configService,
      store,
      clock,
    );
  }

  beforeEach(() => {
    store = new InMemoryCalendarStore();
    clock = new FixedClock(new Date('2025-06-15T10:00:00Z'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes 30 days back through 730 days ahead and records a successful run', async () => {
    const service = createService();

    const result = await service.runRefresh('manual');

    expect(result).toMatchObject({
      status: 'success',
      trigger: 'manual',
      startDate: '2025-05-16',
      endDate: '2027-06-15',
      daysGenerated: 761,
      sources: okSources,
    });
    expect(store.days.size).toBe(761);
    expect(store.days.get('2025-07-04')).toMatchObject({ isOpen: false, holidayName: 'Independence Day' });
    expect(store.runs).toHaveLength(1);
    expect(store.runs[0]).toMatchObject({
      status: 'success',
      source: 'NYSE+NASDAQ+Fallback',
      payload: {
        trigger: 'manual',
        startDate: '2025-05-16',
        endDate: '2027-06-15',
        daysGenerated: 761,
        tablesVersion: '2024-2028.1',
        sources: okSources,
      },
    });
  });

  it('still writes the calendar when every enrichment source fails', async () => {
    const service = createService({ CALENDAR_LOOKBACK_DAYS: '0', CALENDAR_LOOKAHEAD_DAYS: '6' });
    fetchSources.mockResolvedValue(failedSources);

    const result = await service.runRefresh('scheduled');

    expect(result.status).toBe('success');
    expect(result.sources).toEqual(failedSources);
    expect(store.days.size).toBe(7);
    expect(store.runs[0].status).toBe('success');
  });

  it('skips enrichment when it is disabled', async () => {
    const service = createService({ CALENDAR_ENRICHMENT_ENABLED: 'false', CALENDAR_LOOKAHEAD_DAYS: '1' });

    const result = await service.runRefresh('manual');

    expect(fetchSources).not.toHaveBeenCalled();
    expect(result.sources).toEqual([]);
    expect(result.daysGenerated).toBe(32);
  });

  it('records a failed run when the store rejects the batch', async () => {
    const service = createService({ CALENDAR_LOOKBACK_DAYS: '0', CALENDAR_LOOKAHEAD_DAYS: '0' });
    jest.spyOn(store, 'putBatch').mockRejectedValue(new CalendarStoreUnavailableError('putBatch 1 días'));

    const result = await service.runRefresh('manual');

    expect(result).toMatchObject({ status: 'failed', daysGenerated: 1 });
    expect(result.error).toBe('Calendar store unavailable (putBatch 1 días)');
    expect(store.runs).toEqual([
      expect.objectContaining({
        status: 'failed',
        source: 'error',
        payload: { trigger: 'manual', error: 'Calendar store unavailable (putBatch 1 días)' },
      }),
    ]);
    expect(service.getStatus().lastResult).toBe(result);
  });

  it('returns the failure even when it cannot be recorded', async () => {
    const service = createService({ CALENDAR_LOOKBACK_DAYS: '0', CALENDAR_LOOKAHEAD_DAYS: '0' });
    jest.spyOn(store, 'putBatch').mockRejectedValue(new Error('connection refused'));
    jest.spyOn(store, 'recordRun').mockRejectedValue(new Error('connection refused'));

    await expect(service.runRefresh('manual')).resolves.toMatchObject({
      status: 'failed',
      error: 'connection refused',
    });
  });

  it('joins an in-flight run instead of starting a second one', async () => {
    const service = createService({ CALENDAR_LOOKBACK_DAYS: '0', CALENDAR_LOOKAHEAD_DAYS: '3' });

    const first = service.runRefresh('scheduled');
    const second = service.runRefresh('manual');

    expect(second).toBe(first);
    expect(service.getStatus().isRunning).toBe(true);
    await first;

    expect(store.putBatchCalls).toBe(1);
    expect(service.getStatus().isRunning).toBe(false);

    await service.runRefresh('manual');
    expect(store.putBatchCalls).toBe(2);
  });

  it('does not run the daily job while paused', async () => {
    const service = createService();

    service.pause();
    await service.refreshDaily();

    expect(store.putBatchCalls).toBe(0);
    expect(service.getStatus()).toMatchObject({ isPaused: true, nextRun: null });
  });

  it('reports the next 06:00 UTC run', () => {
    const service = createService();

    expect(service.getStatus().nextRun).toEqual(new Date('2025-06-16T06:00:00Z'));

    clock.set('2025-06-15T05:59:00Z');
    expect(service.getStatus().nextRun).toEqual(new Date('2025-06-15T06:00:00Z'));
  });

  it('runs the daily job only at the configured hour', async () => {
    const service = createService({
      CALENDAR_REFRESH_HOUR: '14',
      CALENDAR_LOOKBACK_DAYS: '0',
      CALENDAR_LOOKAHEAD_DAYS: '0',
    });

    await service.refreshDaily();
    expect(store.putBatchCalls).toBe(0);

    clock.set('2025-06-15T14:00:00Z');
    await service.refreshDaily();

    expect(store.putBatchCalls).toBe(1);
    expect(store.runs[0].payload).toMatchObject({ trigger: 'scheduled' });
  });

  it('reports the schedule for a configured refresh hour', () => {
    const service = createService({ CALENDAR_REFRESH_HOUR: '14' });

    expect(service.getStatus()).toMatchObject({
      cronExpression: '0 0 14 * * *',
      nextRun: new Date('2025-06-15T14:00:00Z'),
    });
  });

  it('refreshes on startup when enabled', async () => {
    const service = createService({ CALENDAR_LOOKBACK_DAYS: '0', CALENDAR_LOOKAHEAD_DAYS: '0' });

    await service.onApplicationBootstrap();

    expect(store.runs[0].payload).toMatchObject({ trigger: 'startup' });
  });

  it('neither refreshes nor schedules when disabled', async () => {
    const service = createService({ CALENDAR_REFRESH_ENABLED: 'false' });

    await service.onApplicationBootstrap();

    expect(store.putBatchCalls).toBe(0);
    expect(service.getStatus().isPaused).toBe(true);
  });
});
