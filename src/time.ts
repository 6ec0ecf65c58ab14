// src/time.ts
import { fromUnixTime, isValid, parse, parseISO } from 'date-fns';

// cycler exports write local wall-clock time in one of these layouts
const LAYOUTS = [
  'yyyy/MM/dd HH:mm:ss',
  'yyyy/MM/dd HH:mm:ss.SSS',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm:ss.SSS',
  'yyyy/M/d H:mm:ss',
  'dd.MM.yyyy HH:mm:ss',
];

const epochPattern = /^\d+(?:\.\d+)?$/;

/** Epoch seconds, ISO8601 or one of the cycler layouts; null when unparseable */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const raw = value.trim();
  if (!raw) return null;

  if (epochPattern.test(raw)) {
    const d = fromUnixTime(Number(raw));
    return isValid(d) ? d : null;
  }

  const iso = parseISO(raw);
  if (isValid(iso)) return iso;

  for (const layout of LAYOUTS) {
    const d = parse(raw, layout, new Date(0));
    if (isValid(d)) return d;
  }
  return null;
}
