/**
 * Relative date phrase resolution.
 *
 * Turns phrases such as "this week" or "last month" found in a question into
 * start-of-period timestamps (UTC) that can be embedded in Cypher datetime() literals.
 */

export type Period = "week" | "month" | "year";
export type Relative = "this" | "last";

export type ResolvedPeriod = {
  relative: Relative;
  /** ISO-8601 UTC timestamp without offset, e.g. 2024-05-06T00:00:00 */
  start: string;
};

export type DateFilterSet = Partial<Record<Period, ResolvedPeriod>>;

export type DatePhraseRule = {
  phrase: string;
  period: Period;
  relative: Relative;
  resolve: (now: Date) => Date;
};

export const DEFAULT_TIMESTAMP = "2023-01-01T00:00:00";

const PERIOD_ORDER: Period[] = ["week", "month", "year"];

function startOfWeek(now: Date): Date {
  const daysSinceMonday = (now.getUTCDay() + 6) % 7;
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - daysSinceMonday));
}

function startOfMonth(now: Date, offset = 0): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + offset, 1));
}

function startOfYear(now: Date, offset = 0): Date {
  return new Date(Date.UTC(now.getUTCFullYear() + offset, 0, 1));
}

// Evaluated top to bottom; a later rule overwrites an earlier one for the same period,
// so "last X" takes precedence over "this X".
export const DATE_PHRASE_RULES: readonly DatePhraseRule[] = [
  { phrase: "this week", period: "week", relative: "this", resolve: (now) => startOfWeek(now) },
  {
    phrase: "last week",
    period: "week",
    relative: "last",
    resolve: (now) => {
      const monday = startOfWeek(now);
      return new Date(monday.getTime() - 7 * 24 * 60 * 60 * 1000);
    },
  },
  { phrase: "this month", period: "month", relative: "this", resolve: (now) => startOfMonth(now) },
  { phrase: "last month", period: "month", relative: "last", resolve: (now) => startOfMonth(now, -1) },
  { phrase: "this year", period: "year", relative: "this", resolve: (now) => startOfYear(now) },
  { phrase: "last year", period: "year", relative: "last", resolve: (now) => startOfYear(now, -1) },
];

export function formatTimestamp(d: Date): string {
  return d.toISOString().slice(0, 19);
}

export function resolveDateFilters(question: string, now: Date = new Date()): DateFilterSet {
  const text = question.toLowerCase();
  const filters: DateFilterSet = {};
  for (const rule of DATE_PHRASE_RULES) {
    if (!text.includes(rule.phrase)) continue;
    filters[rule.period] = { relative: rule.relative, start: formatTimestamp(rule.resolve(now)) };
  }
  return filters;
}

export function buildDateFilterClause(filters: DateFilterSet, field = "p.timestamp"): string {
  const conditions: string[] = [];
  for (const period of PERIOD_ORDER) {
    const resolved = filters[period];
    if (resolved) conditions.push(`${field} >= datetime('${resolved.start}')`);
  }
  if (conditions.length === 0) return "";
  return ` AND (${conditions.join(" OR ")})`;
}

export function periodStart(filters: DateFilterSet, period: Period): string {
  return filters[period]?.start ?? DEFAULT_TIMESTAMP;
}
