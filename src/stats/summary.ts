/**
 * Verdict statistics
 * Distributions over fixed rating domains and the most common categories
 */

import { RATINGS, SENTIMENTS, type AnalysisRecord } from '../classify/index.js';
import { capitalize, percentage } from '../utils/index.js';

/**
 * Count and share of one value
 */
export interface DistributionEntry<T extends string = string> {
  value: T;
  count: number;
  percentage: number;
}

/**
 * Summary of a set of analysis records
 */
export interface AnalysisSummary {
  total: number;
  sentiment: DistributionEntry[];
  understanding: DistributionEntry[];
  performance: DistributionEntry[];
  topCategories: DistributionEntry[];
  categoryOccurrences: number;
}

export const TOP_CATEGORY_LIMIT = 5;

/**
 * Count values over a fixed domain; percentages are of `total`
 */
export function distribution<T extends string>(
  values: string[],
  domain: readonly T[],
  total: number
): DistributionEntry<T>[] {
  return domain.map(value => {
    const count = values.filter(v => v === value).length;
    return { value, count, percentage: percentage(count, total) };
  });
}

/**
 * Most frequent categories across all records.
 * Ties keep the order categories were first seen.
 */
export function topCategories(
  records: AnalysisRecord[],
  limit = TOP_CATEGORY_LIMIT
): { entries: DistributionEntry[]; occurrences: number } {
  const counts = new Map<string, number>();
  let occurrences = 0;

  for (const record of records) {
    for (const category of record.llm_classification.categories) {
      counts.set(category, (counts.get(category) ?? 0) + 1);
      occurrences++;
    }
  }

  const entries = Array.from(counts, ([value, count]) => ({
    value,
    count,
    percentage: percentage(count, occurrences),
  }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);

  return { entries, occurrences };
}

/**
 * Summarize analysis records
 */
export function summarize(records: AnalysisRecord[]): AnalysisSummary {
  const total = records.length;
  const verdicts = records.map(r => r.llm_classification);
  const categories = topCategories(records);

  return {
    total,
    sentiment: distribution(verdicts.map(v => v.overall_sentiment), SENTIMENTS, total),
    understanding: distribution(verdicts.map(v => v.bot_understanding), RATINGS, total),
    performance: distribution(verdicts.map(v => v.bot_performance), RATINGS, total),
    topCategories: categories.entries,
    categoryOccurrences: categories.occurrences,
  };
}

function formatEntries(entries: DistributionEntry[], label: (value: string) => string): string[] {
  return entries.map(e => `  • ${label(e.value)}: ${e.count} (${e.percentage.toFixed(1)}%)`);
}

/**
 * Render a summary as the text block printed after a run
 */
export function formatSummary(summary: AnalysisSummary): string {
  return [
    'Analysis Summary:',
    '─'.repeat(50),
    'Sentiment Distribution:',
    ...formatEntries(summary.sentiment, capitalize),
    '',
    'Bot Understanding Distribution:',
    ...formatEntries(summary.understanding, capitalize),
    '',
    'Bot Performance Distribution:',
    ...formatEntries(summary.performance, capitalize),
    '',
    `Top ${TOP_CATEGORY_LIMIT} Categories:`,
    ...formatEntries(summary.topCategories, value => value),
  ].join('\n');
}
