import type { DateFormat } from './types';

export interface DateParts {
  year: number;
  month?: number;
  day?: number;
}

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

function monthFromName(name: string): number | undefined {
  const key = name.toLowerCase();
  return MONTHS[key] ?? MONTHS[key.slice(0, 3)];
}

function valid(parts: DateParts): DateParts | null {
  const { year, month, day } = parts;
  if (year < 1900 || year > 2100) return null;
  if (month !== undefined && (month < 1 || month > 12)) return null;
  if (day !== undefined && (day < 1 || day > 31)) return null;
  return parts;
}

/**
 * Parse the loosely formatted dates resumes carry: `2019`, `2019-09`,
 * `2019-09-01`, `09/2019`, `09/01/2019` (month first), `Sep 2019`,
 * `September 1, 2019`. Returns null for anything else, including
 * "Present"/"Current".
 */
export function parseProfileDate(input: string): DateParts | null {
  const s = input.trim();
  let m: RegExpMatchArray | null;

  if ((m = s.match(/^(\d{4})$/))) {
    return valid({ year: Number(m[1]) });
  }
  if ((m = s.match(/^(\d{4})-(\d{1,2})$/))) {
    return valid({ year: Number(m[1]), month: Number(m[2]) });
  }
  if ((m = s.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:T.*)?$/))) {
    return valid({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) });
  }
  if ((m = s.match(/^(\d{1,2})\/(\d{4})$/))) {
    return valid({ year: Number(m[2]), month: Number(m[1]) });
  }
  if ((m = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/))) {
    return valid({ year: Number(m[3]), month: Number(m[1]), day: Number(m[2]) });
  }
  if ((m = s.match(/^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/))) {
    const month = monthFromName(m[1]);
    if (month === undefined) return null;
    return valid({ year: Number(m[3]), month, day: Number(m[2]) });
  }
  if ((m = s.match(/^([A-Za-z]+)\.?,?\s+(\d{4})$/))) {
    const month = monthFromName(m[1]);
    if (month === undefined) return null;
    return valid({ year: Number(m[2]), month });
  }
  return null;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Render parts in `format`; a missing month or day becomes 01. */
export function formatDate(parts: DateParts, format: DateFormat): string {
  const yyyy = String(parts.year);
  const mm = pad(parts.month ?? 1);
  const dd = pad(parts.day ?? 1);
  switch (format) {
    case 'YYYY-MM-DD':
      return `${yyyy}-${mm}-${dd}`;
    case 'YYYY-MM':
      return `${yyyy}-${mm}`;
    case 'MM/DD/YYYY':
      return `${mm}/${dd}/${yyyy}`;
    case 'DD/MM/YYYY':
      return `${dd}/${mm}/${yyyy}`;
    case 'MM/YYYY':
      return `${mm}/${yyyy}`;
    case 'YYYY':
      return yyyy;
  }
}

const FORMAT_TOKENS: DateFormat[] = ['YYYY-MM-DD', 'MM/DD/YYYY', 'DD/MM/YYYY', 'YYYY-MM', 'MM/YYYY', 'YYYY'];

/**
 * Infer the layout a field expects from a hint such as a placeholder
 * ("mm/dd/yyyy"), a data-date-format attribute, or a `pattern` regex.
 */
export function inferDateFormat(hint: string | undefined): DateFormat | undefined {
  if (!hint) return undefined;
  const upper = hint.trim().toUpperCase();

  for (const format of FORMAT_TOKENS) {
    if (upper === format || upper.includes(format)) return format;
  }

  // Common `pattern` attribute spellings
  const compact = hint.replace(/\s+/g, '');
  if (compact === '\\d{4}-\\d{2}-\\d{2}' || compact === '[0-9]{4}-[0-9]{2}-[0-9]{2}') return 'YYYY-MM-DD';
  if (compact === '\\d{2}/\\d{2}/\\d{4}' || compact === '[0-9]{2}/[0-9]{2}/[0-9]{4}') return 'MM/DD/YYYY';
  if (compact === '\\d{4}-\\d{2}' || compact === '[0-9]{4}-[0-9]{2}') return 'YYYY-MM';
  if (compact === '\\d{2}/\\d{4}' || compact === '[0-9]{2}/[0-9]{4}') return 'MM/YYYY';
  return undefined;
}
