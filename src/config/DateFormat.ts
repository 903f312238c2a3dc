/**
 * strftime-style date patterns (as in append_date_format) on top of date-fns.
 *
 * Supported directives: %Y %y %m %d %H %I %M %S %f %j %p %b %B %a %A %%
 * Everything else in the pattern is literal text.
 */

import { UTCDate } from '@date-fns/utc';
import { format } from 'date-fns';
import { UserError } from '../errors/ComponentErrors.js';

const STRFTIME_TO_DATEFNS: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'MM',
  d: 'dd',
  H: 'HH',
  I: 'hh',
  M: 'mm',
  S: 'ss',
  // microseconds; Date only carries milliseconds
  f: "SSS'000'",
  j: 'DDD',
  p: 'a',
  b: 'MMM',
  B: 'MMMM',
  a: 'EEE',
  A: 'EEEE',
};

function quoteLiteral(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Translate a strftime pattern to a date-fns pattern.
 * @throws UserError on a directive with no date-fns counterpart
 */
export function convertStrftimePattern(pattern: string): string {
  let result = '';
  let literal = '';

  const flushLiteral = (): void => {
    if (literal) {
      result += quoteLiteral(literal);
      literal = '';
    }
  };

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    const next = pattern[i + 1];
    if (char !== '%' || next === undefined) {
      literal += char ?? '';
      continue;
    }

    i++;
    if (next === '%') {
      literal += '%';
      continue;
    }

    const token = STRFTIME_TO_DATEFNS[next];
    if (!token) {
      throw new UserError(`Unsupported date format directive "%${next}" in "${pattern}"`);
    }
    flushLiteral();
    result += token;
  }
  flushLiteral();

  return result;
}

/**
 * Format `date` in UTC with a strftime pattern.
 */
export function formatUtcTimestamp(pattern: string, date: Date): string {
  return format(new UTCDate(date.getTime()), convertStrftimePattern(pattern), {
    useAdditionalDayOfYearTokens: true,
  });
}
