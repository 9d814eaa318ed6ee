import { describe, it, expect, vi } from 'vitest';
import { normalizeTitle, type Rating, type Showtime } from '@luxinema/shared';
import { parseShowtime } from '../scraper/parser.js';
import {
  buildScheduleEntries,
  formatScheduleEntry,
  renderSchedule,
  RATING_UNAVAILABLE,
} from '../render/renderer.js';

const DATE = new Date(2026, 9, 19);

function showtimes(...entries: Array<[string, string, string?]>): Showtime[] {
  return entries.map(([time, title, hall]) => parseShowtime({ time, title, hall }, DATE));
}

function createResolve(scores: Record<string, number>, imdbIds: Record<string, string> = {}) {
  return vi.fn(async (title: string): Promise<Rating> => ({
    key: normalizeTitle(title),
    title,
    score: scores[title] ?? null,
    imdbId: imdbIds[title] ?? null,
    plot: null,
    fetchedAt: '2026-10-19T08:00:00.000Z',
  }));
}

describe('renderSchedule', () => {
  it('should emit one line per showtime in input order with one resolve per title', async () => {
    const resolve = createResolve({ Dune: 8.6, Arrival: 7.9 });

    const { lines, entries } = await renderSchedule(
      showtimes(['10:00', 'Dune'], ['13:00', 'Dune'], ['15:00', 'Arrival']),
      resolve
    );

    expect(lines).toEqual([
      '10:00  Dune  ★ 8.6',
      '13:00  Dune  ★ 8.6',
      '15:00  Arrival  ★ 7.9',
    ]);
    expect(entries).toHaveLength(3);
    expect(resolve).toHaveBeenCalledTimes(2);
    expect(resolve.mock.calls).toEqual([['Dune'], ['Arrival']]);
  });

  it('should sort by rating when requested', async () => {
    const resolve = createResolve({ Dune: 8.6, Arrival: 7.9 });

    const { lines } = await renderSchedule(
      showtimes(['10:00', 'Arrival'], ['12:00', 'Unknown Movie XYZ'], ['13:00', 'Dune'], ['21:00', 'Dune']),
      resolve,
      { sortBy: 'rating' }
    );

    expect(lines).toEqual([
      '13:00  Dune  ★ 8.6',
      '21:00  Dune  ★ 8.6',
      '10:00  Arrival  ★ 7.9',
      `12:00  Unknown Movie XYZ  ${RATING_UNAVAILABLE}`,
    ]);
  });

  it('should append the IMDb url when requested', async () => {
    const resolve = createResolve({ Dune: 8.6 }, { Dune: 'tt0000001' });

    const { lines } = await renderSchedule(showtimes(['10:00', 'Dune'], ['12:00', 'Arrival']), resolve, {
      showUrl: true,
    });

    expect(lines).toEqual([
      '10:00  Dune  ★ 8.6  https://imdb.com/title/tt0000001',
      '12:00  Arrival  rating unavailable',
    ]);
  });

  it('should append the plot when requested', async () => {
    const resolve = vi.fn(async (title: string): Promise<Rating> => ({
      key: normalizeTitle(title),
      title,
      score: title === 'Dune' ? 8.6 : null,
      imdbId: title === 'Dune' ? 'tt0000001' : null,
      plot: title === 'Dune' ? 'A desert planet.' : null,
      fetchedAt: '2026-10-19T08:00:00.000Z',
    }));

    const { lines } = await renderSchedule(showtimes(['10:00', 'Dune'], ['12:00', 'Arrival']), resolve, {
      showUrl: true,
      showPlot: true,
    });

    expect(lines).toEqual([
      '10:00  Dune  ★ 8.6  https://imdb.com/title/tt0000001  A desert planet.',
      '12:00  Arrival  rating unavailable',
    ]);
  });
});

describe('buildScheduleEntries', () => {
  it('should share one rating between titles with the same key', async () => {
    const resolve = createResolve({ Dune: 8.6 });

    const entries = await buildScheduleEntries(showtimes(['10:00', 'Dune'], ['13:00', 'DUNE ']), resolve);

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(entries[1]?.showtime.title).toBe('DUNE');
    expect(entries[1]?.rating).toBe(entries[0]?.rating);
  });

  it('should return nothing for an empty schedule', async () => {
    const resolve = createResolve({});
    await expect(buildScheduleEntries([], resolve)).resolves.toEqual([]);
    expect(resolve).not.toHaveBeenCalled();
  });
});

describe('formatScheduleEntry', () => {
  it('should include the hall when present', () => {
    const [showtime] = showtimes(['20:00', 'Arrival', 'Zaal 2']);
    if (!showtime) throw new Error('missing showtime');

    const line = formatScheduleEntry({
      showtime,
      rating: {
        key: 'arrival',
        title: 'Arrival',
        score: 8,
        imdbId: null,
        plot: null,
        fetchedAt: '2026-10-19T08:00:00.000Z',
      },
    });

    expect(line).toBe('20:00  Arrival [Zaal 2]  ★ 8.0');
  });
});
