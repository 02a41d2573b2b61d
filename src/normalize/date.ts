const MONTHS: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12
};

const MONTH_NAMES =
  "January|February|March|April|May|June|July|August|September|October|November|December|Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sept|Sep|Oct|Nov|Dec";
const TIME = String.raw`(?:[T\s]+(\d{1,2}):(\d{2})(?::(\d{2}))?)?`;

const ISO_PATTERN = new RegExp(String.raw`\b(\d{4})-(\d{2})-(\d{2})` + TIME);
const MONTH_FIRST_PATTERN = new RegExp(
  String.raw`\b(${MONTH_NAMES})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})` + TIME,
  "i"
);
const DAY_FIRST_PATTERN = new RegExp(
  String.raw`\b(\d{1,2})[\s-](${MONTH_NAMES})\.?[\s-](\d{4})` + TIME,
  "i"
);
const NUMERIC_PATTERN = new RegExp(String.raw`\b(\d{1,2})[\/\-](\d{1,2})[\/\-](\d{4})\b` + TIME);
const COMPACT_PATTERN = /(?:^|[^\d])(\d{4})(\d{2})(\d{2})(?:[^\d]|$)/;

function toDate(
  year: number,
  month: number,
  day: number,
  hours = "0",
  minutes = "0",
  seconds = "0"
): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day, Number(hours), Number(minutes), Number(seconds)));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

function monthNumber(name: string): number {
  return MONTHS[name.toLowerCase()] ?? 0;
}

type DateReader = (text: string) => Date | null;

const READERS: readonly DateReader[] = [
  (text) => {
    const m = text.match(ISO_PATTERN);
    return m ? toDate(Number(m[1]), Number(m[2]), Number(m[3]), m[4], m[5], m[6]) : null;
  },
  (text) => {
    const m = text.match(MONTH_FIRST_PATTERN);
    return m ? toDate(Number(m[3]), monthNumber(m[1]), Number(m[2]), m[4], m[5], m[6]) : null;
  },
  (text) => {
    const m = text.match(DAY_FIRST_PATTERN);
    return m ? toDate(Number(m[3]), monthNumber(m[2]), Number(m[1]), m[4], m[5], m[6]) : null;
  },
  (text) => {
    const m = text.match(NUMERIC_PATTERN);
    return m ? toDate(Number(m[3]), Number(m[1]), Number(m[2]), m[4], m[5], m[6]) : null;
  },
  (text) => {
    const m = text.match(COMPACT_PATTERN);
    return m ? toDate(Number(m[1]), Number(m[2]), Number(m[3])) : null;
  }
];

/**
 * Finds the first date in free text. Timestamps without a zone are read as
 * UTC. Only the shapes above count as dates: a bare number is never one.
 */
export function parseDateText(text: string): Date | null {
  for (const read of READERS) {
    const date = read(text);
    if (date) return date;
  }
  return null;
}

export function formatVersionDate(date: Date): string {
  const year = String(date.getUTCFullYear());
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}.${month}.${day}`;
}

/** "2024-01-15" and "Mon, 15 Jan 2024 08:00:00 GMT" both become "2024.01.15". */
export function normalizeVersionDate(text: string): string | null {
  const date = parseDateText(text);
  return date ? formatVersionDate(date) : null;
}
