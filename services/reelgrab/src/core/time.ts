/** Quota days and storage folders are UTC calendar days. */
export function calendarDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function fileStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

/** pg hands back `Date` for timestamptz columns; records carry ISO strings. */
export function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}
