import { DateTime } from 'luxon';

export const DISPLAY_FORMAT = 'yyyy-MM-dd HH:mm:ss ZZZZ';

/**
 * Out-of-range timestamps come back as an invalid DateTime, not a throw.
 */
export function fromUnixSeconds(seconds: number, zone: string): DateTime {
  return DateTime.fromMillis(seconds * 1000, { zone });
}

export function formatDateTime(value: DateTime): string {
  return value.toFormat(DISPLAY_FORMAT);
}

export function formatDate(value: Date, zone: string): string {
  return formatDateTime(DateTime.fromJSDate(value, { zone }));
}
