import { format, getUnixTime } from 'date-fns';

export const humanDateFormat = 'yyyy-MM-dd HH:mm:ss';

/**
 * Local-time rendering used for console output and the `timestamp_human` field.
 */
export function humanDate(date?: Date): string | undefined {
  return date ? format(date, humanDateFormat) : undefined;
}

export function unixTime(date?: Date): number | undefined {
  return date ? getUnixTime(date) : undefined;
}

/**
 * A compact, sortable stamp for filenames: `20240131_235901`.
 */
export function fileStamp(date: Date = new Date()): string {
  return format(date, 'yyyyMMdd_HHmmss');
}
