const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** `YYYY-MM-DD` in local time. */
export function formatSessionDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** `YYYY-MM-DD@HHhMMmSSs` in local time. */
export function formatSessionTimestamp(date: Date): string {
  return `${formatSessionDate(date)}@${pad(date.getHours())}h${pad(date.getMinutes())}m${pad(date.getSeconds())}s`;
}

/**
 * `YYYY-MM-DD@HHhMMmSSs_merged`, with `_<n>` appended for the n-th recording
 * that started within the same second.
 */
export function mergedRecordingName(baseCreationTime: Date, ordinal = 1): string {
  const name = `${formatSessionTimestamp(baseCreationTime)}_merged`;
  return ordinal > 1 ? `${name}_${ordinal}` : name;
}

const MERGED_NAME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})@(\d{2})h(\d{2})m(\d{2})s_merged(?:_(\d+))?$/;

/**
 * Reads the start time back from a merged recording's name (without
 * extension). Returns null for any other name.
 */
export function parseMergedRecordingName(name: string): Date | null {
  const match = MERGED_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  return new Date(year, month - 1, day, hours, minutes, seconds);
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
