const TIMESTAMP_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

function assertValidDateParts(year: number, monthIndex: number, day: number): void {
  if (monthIndex < 0 || monthIndex > 11) {
    throw new Error("Mes inválido");
  }
  if (day < 1 || day > 31) {
    throw new Error("Día inválido");
  }
  const probe = new Date(0);
  probe.setUTCFullYear(year, monthIndex, day);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== monthIndex ||
    probe.getUTCDate() !== day
  ) {
    throw new Error("Fecha inválida");
  }
}

function assertValidTimeParts(hours: number, minutes: number, seconds: number): void {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new Error("Hora inválida");
  }
}

/** Drops the milliseconds, which the ledger file does not keep. */
export function truncateToSeconds(date: Date): Date {
  const time = date.getTime();
  if (!Number.isFinite(time)) {
    throw new Error("Fecha inválida");
  }
  return new Date(time - (((time % 1000) + 1000) % 1000));
}

/** `yyyyMMdd` in local time, for daily file names. */
export function formatDateKey(date: Date): string {
  return `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * Formats a date as `dd/MM/yyyy HH:mm:ss` in local time.
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new Error("Fecha inválida");
  }
  return (
    `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${pad(date.getFullYear(), 4)} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parses a `dd/MM/yyyy HH:mm:ss` local-time timestamp.
 */
export function parseTimestamp(value: string): Date {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error("Formato de fecha inválido (dd/MM/yyyy HH:mm:ss)");
  }
  const [, dayStr, monthStr, yearStr, hoursStr, minutesStr, secondsStr] = match;
  const day = Number(dayStr);
  const monthIndex = Number(monthStr) - 1;
  const year = Number(yearStr);
  const hours = Number(hoursStr);
  const minutes = Number(minutesStr);
  const seconds = Number(secondsStr);

  assertValidDateParts(year, monthIndex, day);
  assertValidTimeParts(hours, minutes, seconds);

  // The Date constructor would read years 0-99 as 1900-1999.
  const date = new Date(0);
  date.setFullYear(year, monthIndex, day);
  date.setHours(hours, minutes, seconds, 0);
  return date;
}
