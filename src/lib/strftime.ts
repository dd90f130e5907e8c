import { format, getDay } from 'date-fns';

type Conversion = (date: Date) => string;

const fmt = (pattern: string): Conversion => (date) => format(date, pattern);

// strftime conversion -> date-fns rendering (local time zone)
const CONVERSIONS: Record<string, Conversion | undefined> = {
  Y: fmt('yyyy'),
  y: fmt('yy'),
  m: fmt('MM'),
  d: fmt('dd'),
  H: fmt('HH'),
  I: fmt('hh'),
  M: fmt('mm'),
  S: fmt('ss'),
  p: fmt('a'),
  f: (date) => `${format(date, 'SSS')}000`,
  j: (date) => format(date, 'DDD', { useAdditionalDayOfYearTokens: true }),
  a: fmt('EEE'),
  A: fmt('EEEE'),
  b: fmt('MMM'),
  B: fmt('MMMM'),
  w: (date) => String(getDay(date)),
  z: fmt('xx'),
  F: fmt('yyyy-MM-dd'),
  T: fmt('HH:mm:ss'),
  D: fmt('MM/dd/yy'),
  R: fmt('HH:mm'),
};

export type DirectiveResult =
  | { ok: true; value: string }
  | { ok: false; error: string };

/**
 * Expand a strftime-style pattern. Text outside `%x` conversions is copied
 * as-is; an unknown conversion or a dangling `%` makes the whole pattern
 * invalid.
 */
export function formatDirective(pattern: string, date: Date): DirectiveResult {
  if (Number.isNaN(date.getTime())) {
    return { ok: false, error: 'Invalid timestamp' };
  }

  let out = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch !== '%') {
      out += ch;
      continue;
    }

    if (i + 1 >= pattern.length) {
      return { ok: false, error: `Dangling '%' in "${pattern}"` };
    }
    const code = pattern[++i];

    if (code === '%') {
      out += '%';
      continue;
    }

    const conversion = CONVERSIONS[code];
    if (!conversion) {
      return { ok: false, error: `Unknown directive %${code} in "${pattern}"` };
    }
    out += conversion(date);
  }

  return { ok: true, value: out };
}

export function isValidDirective(pattern: string): boolean {
  return formatDirective(pattern, new Date(0)).ok;
}
