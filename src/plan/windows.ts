import type { EpochSeconds } from '../types/ids.js';
import { DateWindow } from '../types/plan.js';

const DAY = 86_400;

/** Window length in days; `all` has none. */
export const WINDOW_DAYS: Record<DateWindow, number | null> = {
  [DateWindow.ALL]: null,
  [DateWindow.WEEK]: 7,
  [DateWindow.MONTH]: 31,
  [DateWindow.QUARTER]: 93,
  [DateWindow.YEAR]: 366
};

export const WINDOW_PAGES: Record<DateWindow, string> = {
  [DateWindow.ALL]: 'date.html',
  [DateWindow.WEEK]: 'date_1.html',
  [DateWindow.MONTH]: 'date_2.html',
  [DateWindow.QUARTER]: 'date_3.html',
  [DateWindow.YEAR]: 'date_4.html'
};

export const ALL_WINDOWS: DateWindow[] = [
  DateWindow.ALL,
  DateWindow.WEEK,
  DateWindow.MONTH,
  DateWindow.QUARTER,
  DateWindow.YEAR
];

export function windowSeconds(window: DateWindow): number | null {
  const days = WINDOW_DAYS[window];
  return days === null ? null : days * DAY;
}

export function inWindow(window: DateWindow, date: EpochSeconds, now: EpochSeconds): boolean {
  const length = windowSeconds(window);
  return length === null || date > now - length;
}
