/**
 * Date grammars used to recognise date-valued object keys
 */

import type { DateFormatName } from "../../types/config.js";

/**
 * A date grammar. Layout tokens: YYYY (four-digit year), MM (month, one or
 * two digits), DD (day, one or two digits), MMMM (full English month name);
 * whitespace matches any run of whitespace, everything else is literal.
 */
export interface DateGrammar {
  name: DateFormatName;
  layout: string;
  example: string;
}

export interface CompiledDateGrammar extends DateGrammar {
  regex: RegExp;
}

/**
 * Built-in grammars in priority order. A segment matching several grammars
 * takes the first one listed.
 */
export const DATE_GRAMMARS: readonly DateGrammar[] = [
  { name: "yyyy-mm-dd", layout: "YYYY-MM-DD", example: "2021-11-08" },
  { name: "dd-mm-yyyy", layout: "DD-MM-YYYY", example: "08-11-2021" },
  { name: "yyyy/mm/dd", layout: "YYYY/MM/DD", example: "2021/11/08" },
  { name: "dd/mm/yyyy", layout: "DD/MM/YYYY", example: "08/11/2021" },
  { name: "yyyymmdd", layout: "YYYYMMDD", example: "20211108" },
  { name: "ddmmyyyy", layout: "DDMMYYYY", example: "08112021" },
  { name: "month dd, yyyy", layout: "MMMM DD, YYYY", example: "November 08, 2021" },
  { name: "dd month yyyy", layout: "DD MMMM YYYY", example: "08 November 2021" },
  { name: "yyyy-mm", layout: "YYYY-MM", example: "2021-11" },
  { name: "mm-yyyy", layout: "MM-YYYY", example: "11-2021" },
];

export const DATE_FORMAT_NAMES: readonly DateFormatName[] = DATE_GRAMMARS.map(
  (grammar) => grammar.name,
);

const MONTH_NAMES = [
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

// Two-digit alternatives first, as the leftmost alternative wins
const LAYOUT_TOKENS: [string, string][] = [
  ["YYYY", "(?<year>\\d{4})"],
  ["MMMM", `(?<monthName>${MONTH_NAMES.join("|")})`],
  ["MM", "(?<month>1[0-2]|0[1-9]|[1-9])"],
  ["DD", "(?<day>3[01]|[12]\\d|0[1-9]|[1-9])"],
];

function escapeLiteral(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function findToken(layout: string, index: number): [string, string] | undefined {
  return LAYOUT_TOKENS.find(([token]) => layout.startsWith(token, index));
}

/**
 * Compile a grammar layout into a start-anchored, case-insensitive regex
 */
export function compileLayout(layout: string): RegExp {
  let source = "^";
  let i = 0;

  while (i < layout.length) {
    const token = findToken(layout, i);
    const char = layout.charAt(i);

    if (token) {
      source += token[1];
      i += token[0].length;
    } else if (/\s/.test(char)) {
      source += "\\s+";
      while (i < layout.length && /\s/.test(layout.charAt(i))) i++;
    } else {
      source += escapeLiteral(char);
      i++;
    }
  }

  return new RegExp(source, "i");
}

export function compileGrammar(grammar: DateGrammar): CompiledDateGrammar {
  return { ...grammar, regex: compileLayout(grammar.layout) };
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Test a key against a compiled grammar.
 *
 * The match must consume the whole key without backtracking into a shorter
 * alternative, and the resulting date must exist on the calendar.
 */
export function matchesGrammar(key: string, grammar: CompiledDateGrammar): boolean {
  const match = grammar.regex.exec(key);
  if (!match || match[0].length !== key.length) {
    return false;
  }

  const groups = match.groups ?? {};
  const year = Number(groups.year);
  const month = groups.monthName
    ? MONTH_NAMES.indexOf(groups.monthName.toLowerCase()) + 1
    : Number(groups.month ?? 1);
  const day = Number(groups.day ?? 1);

  if (year < 1) {
    return false;
  }
  return day <= daysInMonth(year, month);
}
