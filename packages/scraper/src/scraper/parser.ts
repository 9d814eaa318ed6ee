import {
  ParseError,
  cleanDisplayTitle,
  normalizeTitle,
  ok,
  err,
  type RawScheduleEntry,
  type Result,
  type Showtime,
} from '@luxinema/shared';

/**
 * Formats a date as YYYYMMDD for URL construction
 */
export function formatDateYYYYMMDD(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Formats a date as YYYY-MM-DD (local calendar date)
 */
export function formatDateISO(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parses time string (HH:MM or HH.MM) to hours and minutes
 */
export function parseTime(timeStr: string): { hours: number; minutes: number } | null {
  const match = timeStr.trim().match(/^(\d{1,2})[:.](\d{2})$/);
  if (!match || !match[1] || !match[2]) {
    return null;
  }
  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return { hours, minutes };
}

/**
 * Formats hours and minutes as HH:MM
 */
export function formatTime(time: { hours: number; minutes: number }): string {
  return `${String(time.hours).padStart(2, '0')}:${String(time.minutes).padStart(2, '0')}`;
}

/**
 * 生エントリを Showtime に変換する
 * @throws ParseError タイトルまたは時刻が欠けている・不正な場合
 */
export function parseShowtime(raw: RawScheduleEntry, date: Date): Showtime {
  const title = cleanDisplayTitle(raw.title ?? '');
  if (title.length === 0) {
    throw new ParseError('title is missing', 'title');
  }

  if (raw.time === undefined || raw.time.trim().length === 0) {
    throw new ParseError(`time is missing for "${title}"`, 'time');
  }
  const time = parseTime(raw.time);
  if (!time) {
    throw new ParseError(`invalid time "${raw.time}" for "${title}"`, 'time');
  }

  const hall = raw.hall?.trim();

  return Object.freeze({
    title,
    key: normalizeTitle(title),
    startTime: formatTime(time),
    date: formatDateISO(date),
    hall: hall ? hall : null,
  });
}

/**
 * parseShowtime の例外を Result に変換する
 */
export function tryParseShowtime(
  raw: RawScheduleEntry,
  date: Date
): Result<Showtime, ParseError> {
  try {
    return ok(parseShowtime(raw, date));
  } catch (error) {
    if (error instanceof ParseError) {
      return err(error);
    }
    throw error;
  }
}
