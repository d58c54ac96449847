const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const DAY_MS = 24 * 60 * 60 * 1000;

function monthIndex(name: string): number | null {
  const lower = name.toLowerCase();
  if (lower === "sept") return 9;
  const index = MONTHS.findIndex((month) => month === lower || (lower.length === 3 && month.startsWith(lower)));
  return index === -1 ? null : index + 1;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function toIsoDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

function calendarDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 31 February into March; reject instead.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return toIsoDate(date);
}

export function shiftIsoDate(isoDate: string, days: number): string {
  return toIsoDate(new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS));
}

/**
 * Parses the date phrasings a model tends to produce into YYYY-MM-DD.
 * Relative terms resolve against the UTC calendar date of `now`.
 * Returns null when the input is not a real calendar date.
 */
export function parseDateInput(raw: string, now: Date = new Date()): string | null {
  const text = raw.trim().toLowerCase();
  if (!text) return null;

  if (text === "today" || text === "current" || text === "now") return toIsoDate(now);
  if (text === "yesterday") return toIsoDate(new Date(now.getTime() - DAY_MS));
  if (text === "tomorrow") return toIsoDate(new Date(now.getTime() + DAY_MS));

  let match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text);
  if (match) return calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  if (match) return calendarDate(Number(match[3]), Number(match[2]), Number(match[1]));

  match = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/.exec(text);
  if (match) {
    const month = monthIndex(match[2]);
    return month === null ? null : calendarDate(Number(match[3]), month, Number(match[1]));
  }

  match = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/.exec(text);
  if (match) {
    const month = monthIndex(match[1]);
    return month === null ? null : calendarDate(Number(match[3]), month, Number(match[2]));
  }

  return null;
}
