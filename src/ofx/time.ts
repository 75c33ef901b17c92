import { formatInTimeZone, getTimezoneOffset } from 'date-fns-tz';
import { ZoneOptions } from '../types';
import { AppError, ErrorType } from '../utils/errors';

export const OFX_DATE_PATTERN = 'yyyyMMddHHmmss';

const MILLIS_PER_HOUR = 1000 * 60 * 60;

export function localTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

function resolveLocale(options: ZoneOptions): string | undefined {
  if (options.locale !== undefined && !isValidLocale(options.locale)) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `Unknown locale: ${options.locale}`,
      context: { locale: options.locale },
    });
  }
  return options.locale;
}

function resolveTimeZone(options: ZoneOptions): string {
  const timeZone = options.timeZone ?? localTimeZone();
  if (!isValidTimeZone(timeZone)) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `Unknown time zone: ${timeZone}`,
      context: { timeZone },
    });
  }
  return timeZone;
}

// Intl rejects offset strings such as "+05:00" that date-fns-tz accepts
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat(undefined, { timeZone });
  } catch {
    return false;
  }
  return !Number.isNaN(getTimezoneOffset(timeZone, new Date(0)));
}

export function isValidLocale(locale: string): boolean {
  try {
    return Intl.getCanonicalLocales(locale).length > 0;
  } catch {
    return false;
  }
}

/**
 * Current standard (non-daylight) offset of the zone, plus a date that falls in standard time.
 * Taken in the reference date's year, not the formatted instant's, so every timestamp of a run
 * carries the same suffix. Daylight time only adds, so the smaller of January and July wins.
 */
function standardTime(timeZone: string, reference: Date): { rawOffset: number; date: Date } {
  const year = reference.getUTCFullYear();
  const january = new Date(Date.UTC(year, 0, 1));
  const july = new Date(Date.UTC(year, 6, 1));
  const januaryOffset = getTimezoneOffset(timeZone, january);
  const julyOffset = getTimezoneOffset(timeZone, july);
  return januaryOffset <= julyOffset
    ? { rawOffset: januaryOffset, date: january }
    : { rawOffset: julyOffset, date: july };
}

function shortZoneName(timeZone: string, date: Date, locale?: string): string {
  const part = new Intl.DateTimeFormat(locale, { timeZone, timeZoneName: 'short' })
    .formatToParts(date)
    .find(p => p.type === 'timeZoneName');
  return part?.value ?? timeZone;
}

/**
 * Formats an instant as YYYYMMDDHHMMSS using the wall clock of the zone
 */
export function formatTimestamp(instant: Date | number, options: ZoneOptions = {}): string {
  return formatInTimeZone(instant, resolveTimeZone(options), OFX_DATE_PATTERN);
}

/**
 * Formats an instant as YYYYMMDDHHMMSS[<sign><hours>:<zone>], e.g. 20240115023005[-8:PST].
 *
 * The hours come from the zone's raw offset, truncated. Only strictly positive offsets get a
 * "+"; zero renders as "0" and negative offsets carry their own "-". This is not ISO 8601.
 * The raw offset is the zone's as of `reference`, whatever the instant's own date.
 */
export function formatTimestampWithOffset(
  instant: Date | number,
  options: ZoneOptions = {},
  reference: Date = new Date()
): string {
  const timeZone = resolveTimeZone(options);
  const locale = resolveLocale(options);
  const date = typeof instant === 'number' ? new Date(instant) : instant;
  const { rawOffset, date: standardDate } = standardTime(timeZone, reference);

  const hours = Math.trunc(rawOffset / MILLIS_PER_HOUR) % 24;
  const sign = rawOffset > 0 ? '+' : '';
  const zone = shortZoneName(timeZone, standardDate, locale);

  return `${formatInTimeZone(date, timeZone, OFX_DATE_PATTERN)}[${sign}${hours}:${zone}]`;
}

export function now(options: ZoneOptions = {}, clock: () => Date = () => new Date()): string {
  const instant = clock();
  return formatTimestampWithOffset(instant, options, instant);
}
