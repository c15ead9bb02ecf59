import { load } from "cheerio";

// Genitive month names as they appear in review dates ("12 березня 2024").
export const UKRAINIAN_MONTHS: Readonly<Record<string, number>> = {
  "січня": 1,
  "лютого": 2,
  "березня": 3,
  "квітня": 4,
  "травня": 5,
  "червня": 6,
  "липня": 7,
  "серпня": 8,
  "вересня": 9,
  "жовтня": 10,
  "листопада": 11,
  "грудня": 12
};

const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const DATE_TIME_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

export function cleanText(value: string | null | undefined): string {
  if (!value) {
    return "";
  }
  return load(value, null, false).root().text().trim();
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

// Local (naive) calendar time to Unix seconds; null when a field overflows its range.
export function localTimestamp(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): number | null {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return Math.floor(date.getTime() / 1000);
}

export function parseDateToTimestamp(input: string | null | undefined): number | null {
  const match = input?.trim().match(DATE_PATTERN);
  if (!match) {
    return null;
  }
  return localTimestamp(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function parseDateTimeToTimestamp(input: string | null | undefined): number | null {
  const match = input?.trim().match(DATE_TIME_PATTERN);
  if (!match) {
    return null;
  }
  return localTimestamp(
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
    Number(match[4]),
    Number(match[5]),
    Number(match[6])
  );
}

export function parseUkrainianDate(input: string | null | undefined): number | null {
  const parts = (input ?? "").trim().split(/\s+/);
  if (parts.length !== 3) {
    return null;
  }
  const [dayText, monthText, yearText] = parts;
  const month = UKRAINIAN_MONTHS[monthText.toLowerCase()];
  if (!month || !/^\d+$/.test(dayText) || !/^\d+$/.test(yearText)) {
    return null;
  }
  return localTimestamp(Number(yearText), month, Number(dayText));
}

export function isAfterCutoff(createdAt: number, cutoff: number | null): boolean {
  return cutoff !== null && createdAt > cutoff;
}
