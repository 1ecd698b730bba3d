import { parse, format, isValid } from 'date-fns';
import { clean } from '../utils/text';

interface DateGrammar {
  pattern: RegExp;
  format: string;
}

// Tried in order, first match wins
const DATE_GRAMMARS: DateGrammar[] = [
  // 26 Sep 2025 11:56
  { pattern: /^\d{1,2} [A-Za-z]{3} \d{4} \d{1,2}:\d{2}$/, format: 'd MMM yyyy H:mm' },
  // 26 Sep 11:56 2025
  { pattern: /^\d{1,2} [A-Za-z]{3} \d{1,2}:\d{2} \d{4}$/, format: 'd MMM H:mm yyyy' },
  // 26 Sep 11:56 (year taken from the reference date)
  { pattern: /^\d{1,2} [A-Za-z]{3} \d{1,2}:\d{2}$/, format: 'd MMM H:mm' },
];

export const UNPARSEABLE_DATE = '';

/**
 * Convert an alert's date/time text to YYYY-MM-DD.
 * Returns UNPARSEABLE_DATE when no known format matches.
 */
export function normalizeDate(raw: string | null | undefined, now: Date = new Date()): string {
  const stripped = clean(clean(raw).replace(/\(SGT\)/g, '').replace(/SGT/g, ''));

  for (const grammar of DATE_GRAMMARS) {
    if (!grammar.pattern.test(stripped)) continue;

    const parsed = parse(stripped, grammar.format, now);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }

  return UNPARSEABLE_DATE;
}
