import { ValidationError } from '../domain/errors';
import { SendWindow } from '../domain/types';

const MINUTE_MS = 60_000;
const DAY_MINUTES = 24 * 60;

export function validateSendWindow(window: SendWindow): void {
  if (window.weekdays.length === 0 || window.weekdays.some((day) => !Number.isInteger(day) || day < 0 || day > 6)) {
    throw new ValidationError(`send_window_invalid_weekdays:${window.id}`);
  }
  if (window.startMinute < 0 || window.endMinute > DAY_MINUTES || window.startMinute >= window.endMinute) {
    throw new ValidationError(`send_window_invalid_hours:${window.id}`);
  }
}

/**
 * Returns `at` when it already falls inside the window, otherwise the next
 * instant the window opens. Window hours are local to `utcOffsetMinutes`.
 */
export function nextWindowOpen(at: Date, window: SendWindow): Date {
  const offsetMs = window.utcOffsetMinutes * MINUTE_MS;
  const local = new Date(at.getTime() + offsetMs);
  const minuteOfDay = local.getUTCHours() * 60 + local.getUTCMinutes();
  const weekday = local.getUTCDay();

  if (window.weekdays.includes(weekday) && minuteOfDay >= window.startMinute && minuteOfDay < window.endMinute) {
    return at;
  }

  const localMidnight = Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate());
  for (let dayOffset = 0; dayOffset <= 7; dayOffset++) {
    const day = (weekday + dayOffset) % 7;
    if (!window.weekdays.includes(day)) {
      continue;
    }
    if (dayOffset === 0 && minuteOfDay >= window.startMinute) {
      continue;
    }

    const openLocal = localMidnight + dayOffset * DAY_MINUTES * MINUTE_MS + window.startMinute * MINUTE_MS;
    return new Date(openLocal - offsetMs);
  }

  throw new ValidationError(`send_window_never_opens:${window.id}`);
}

export function parseClock(value: string): number {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new ValidationError(`invalid_clock:${value}`);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 24 || minutes > 59 || (hours === 24 && minutes > 0)) {
    throw new ValidationError(`invalid_clock:${value}`);
  }
  return hours * 60 + minutes;
}
