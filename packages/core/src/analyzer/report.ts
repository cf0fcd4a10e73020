import { Card, formatCards } from '../cards/Card.js';
import {
  HAND_CATEGORIES,
  HAND_CATEGORY_CODES,
  HAND_CATEGORY_NAMES,
  HandCategory,
  ProbabilityDistribution
} from '../evaluator/HandCategory.js';
import type { OddsResult } from '../simulator/types.js';
import {
  AnalyzeOptions,
  CommunitySlot,
  DEFAULT_CALL_COST,
  analyzeOdds,
  computeExpectedValue
} from './OddsAnalyzer.js';

/**
 * One line of a distribution table
 */
export interface DistributionRow {
  category: HandCategory;
  code: string;
  name: string;
  probability: number;
}

/**
 * Everything a presentation layer shows for one request
 */
export interface OddsReport {
  holeCards: readonly Card[];
  community: readonly CommunitySlot[];
  potSize: number;
  cost: number;
  result: OddsResult;
  expectedValue: number;
}

export interface ReportOptions extends AnalyzeOptions {
  cost?: number;
}

/**
 * Run the analysis and compute the EV in one step.
 */
export function buildOddsReport(
  holeCards: readonly Card[],
  community: readonly CommunitySlot[],
  potSize: number,
  options: ReportOptions = {}
): OddsReport {
  const cost = options.cost ?? DEFAULT_CALL_COST;
  const result = analyzeOdds(holeCards, community, options);
  return {
    holeCards,
    community,
    potSize,
    cost,
    result,
    expectedValue: computeExpectedValue(result.distribution, potSize, cost)
  };
}

/**
 * Rows in category order, worst to best
 */
export function formatDistribution(distribution: ProbabilityDistribution): DistributionRow[] {
  return HAND_CATEGORIES.map(category => ({
    category,
    code: HAND_CATEGORY_CODES[category],
    name: HAND_CATEGORY_NAMES[category],
    probability: distribution[category]
  }));
}

/**
 * Wire form of a report, shared by the CLI's JSON output and the HTTP API
 */
export interface OddsReportJSON {
  holeCards: string[];
  board: (string | null)[];
  method: OddsResult['method'];
  missingCount: number;
  samples: number;
  distribution: DistributionRow[];
  potSize: number;
  cost: number;
  expectedValue: number;
}

export function serializeOddsReport(report: OddsReport): OddsReportJSON {
  return {
    holeCards: report.holeCards.map(c => c.toString()),
    board: report.community.map(slot => (slot ? slot.toString() : null)),
    method: report.result.method,
    missingCount: report.result.missingCount,
    samples: report.result.samples,
    distribution: formatDistribution(report.result.distribution),
    potSize: report.potSize,
    cost: report.cost,
    expectedValue: report.expectedValue
  };
}

/** "12.34%" */
export function formatPercentage(probability: number): string {
  return `${(probability * 100).toFixed(2)}%`;
}

/** "$40.00", "-$5.50" */
export function formatMoney(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  return `${sign}$${Math.abs(amount).toFixed(2)}`;
}

/** Community slots as notation, pending slots shown as "?" */
export function formatBoard(community: readonly CommunitySlot[]): string {
  return community.map(slot => (slot ? slot.toString() : '?')).join(' ');
}

/**
 * Plain-text table for terminals
 */
export function formatReportTable(report: OddsReport): string[] {
  const lines: string[] = [];
  const nameWidth = Math.max(...HAND_CATEGORIES.map(c => HAND_CATEGORY_NAMES[c].length));

  lines.push(`Hole cards: ${formatCards(report.holeCards)}`);
  lines.push(`Board:      ${report.community.length > 0 ? formatBoard(report.community) : '(none)'}`);
  lines.push(`Method:     ${report.result.method} (${report.result.samples.toLocaleString('en-US')} samples)`);
  lines.push('');

  for (const row of formatDistribution(report.result.distribution)) {
    lines.push(`  ${row.name.padEnd(nameWidth)}  ${formatPercentage(row.probability).padStart(7)}`);
  }

  lines.push('');
  lines.push(`Pot: ${formatMoney(report.potSize)}  Call cost: ${formatMoney(report.cost)}`);
  lines.push(`Expected value: ${formatMoney(report.expectedValue)}`);
  return lines;
}

/**
 * Generate a standalone HTML report for one request
 */
export function generateHTMLReport(report: OddsReport): string {
  const html: string[] = [];
  const { result } = report;

  html.push(`<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Poker Odds Report</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 20px; }
    table { border-collapse: collapse; width: 100%; margin-top: 10px; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: center; }
    th { background-color: #f2f2f2; }
    .meta { color: #666; font-size: 0.9em; margin-bottom: 20px; }
    .ev { font-size: 1.5em; font-weight: bold; }
  </style>
</head>
<body>
  <h1>Poker Odds Report</h1>
`);

  html.push('  <div class="meta">');
  html.push(`    Hole cards: ${formatCards(report.holeCards)} | Board: ${formatBoard(report.community) || '(none)'}`);
  html.push(`    | Method: ${result.method} | Samples: ${result.samples.toLocaleString('en-US')}`);
  html.push('  </div>');

  html.push('  <table>');
  html.push('    <tr>');
  html.push('      <th>Hand</th>');
  html.push('      <th>Code</th>');
  html.push('      <th>Probability</th>');
  html.push('    </tr>');

  formatDistribution(result.distribution).forEach(row => {
    html.push('    <tr>');
    html.push(`      <th>${row.name}</th>`);
    html.push(`      <td>${row.code}</td>`);
    html.push(`      <td>${formatPercentage(row.probability)}</td>`);
    html.push('    </tr>');
  });

  html.push('  </table>');

  html.push(`  <p>Pot: ${formatMoney(report.potSize)} | Call cost: ${formatMoney(report.cost)}</p>`);
  html.push(`  <p class="ev">Expected value: ${formatMoney(report.expectedValue)}</p>`);
  html.push(`</body>
</html>`);

  return html.join('\n');
}
