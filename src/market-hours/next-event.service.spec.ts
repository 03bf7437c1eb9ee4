import { InMemoryCalendarStore, openDay } from '../../test/in-memory-calendar.store';
import { CalendarGeneratorService } from '../calendar/calendar.generator';
import { loadCalendarTables } from '../calendar/calendar-tables';
import rawTables from '../calendar/data/market-calendar.json';
import { NextEventService } from './next-event.service';

describe('NextEventService', () => {
  let store: InMemoryCalendarStore;
  let service: NextEventService;

  beforeEach(() => {
    const generator = new CalendarGeneratorService(loadCalendarTables(rawTables));
    store = new InMemoryCalendarStore(generator.generate('2025-06-01', '2025-08-31'));
    service = new NextEventService(store);
  });

  it("returns today's open before the session starts", async () => {
    await expect(service.findNext(new Date('2025-07-02T12:00:00Z'))).resolves.toEqual({
      eventType: 'open',
      eventTimeUtc: '2025-07-02T13:30:00Z',
      timeUntilSeconds: 5400,
      nextDate: '2025-07-02',
      isEarlyClose: false,
      notes: 'Regular trading hours',
    });
  });

  it("returns today's close once the session has opened", async () => {
    await expect(service.findNext(new Date('2025-07-02T13:30:00Z'))).resolves.toEqual({
      eventType: 'close',
      eventTimeUtc: '2025-07-02T20:00:00Z',
      timeUntilSeconds: 23400,
      nextDate: '2025-07-02',
      isEarlyClose: false,
      notes: 'Regular trading hours',
    });
  });

  it("moves to the next trading day's open at the exact close", async () => {
    await expect(service.findNext(new Date('2025-07-02T20:00:00Z'))).resolves.toEqual({
      eventType: 'open',
      eventTimeUtc: '2025-07-03T13:30:00Z',
      timeUntilSeconds: 63000,
      nextDate: '2025-07-03',
      isEarlyClose: true,
      notes: 'Day before Independence Day',
    });
  });

  it('skips the holiday and the weekend after an early close', async () => {
    await expect(service.findNext(new Date('2025-07-03T18:00:00Z'))).resolves.toMatchObject({
      eventType: 'open',
      eventTimeUtc: '2025-07-07T13:30:00Z',
      timeUntilSeconds: 329400,
      nextDate: '2025-07-07',
    });
  });

  it('floors the remaining time to whole seconds', async () => {
    const event = await service.findNext(new Date('2025-07-02T13:29:59.500Z'));

    expect(event).toMatchObject({ eventType: 'open', timeUntilSeconds: 0 });
  });

  it('searches forward when today has no record', async () => {
    const sparse = new InMemoryCalendarStore([openDay('2025-07-01')]);

    await expect(new NextEventService(sparse).findNext(new Date('2025-06-01T12:00:00Z'))).resolves.toMatchObject({
      eventType: 'open',
      nextDate: '2025-07-01',
    });
  });

  it('gives up after 30 days', async () => {
    const sparse = new InMemoryCalendarStore([openDay('2025-07-02')]);

    await expect(new NextEventService(sparse).findNext(new Date('2025-06-01T12:00:00Z'))).resolves.toBeNull();
  });

  it('never returns an event in the past', async () => {
    const start = Date.parse('2025-06-28T00:00:00Z');

    for (let minutes = 0; minutes < 8 * 24 * 60; minutes += 17) {
      const now = new Date(start + minutes * 60 * 1000);
      const event = await service.findNext(now);

      expect(event).not.toBeNull();
      expect(event?.timeUntilSeconds).toBeGreaterThanOrEqual(0);
      expect(Date.parse(event?.eventTimeUtc ?? '')).toBeGreaterThanOrEqual(now.getTime());
    }
  });
});
