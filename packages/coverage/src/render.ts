/**
 * Text rendering of a daily coverage report.
 */

import { formatLocalTime, formatMinorUnits, type DailyReport, type SpendCoverage } from '@jarsync/types';

export interface ReportRenderer {
  render(report: DailyReport): string | Promise<string>;
}

const NO_DESCRIPTION = '(no description)';

/**
 * Markdown renderer. Output is a pure function of the report.
 */
export class MarkdownReportRenderer implements ReportRenderer {
  render(report: DailyReport): string {
    const money = (amount: number): string => formatMinorUnits(amount, report.currency);
    const time = (epochSeconds: number): string => formatLocalTime(epochSeconds, report.timezone);
    const earnLabels = new Map(report.earns.map((earn) => [earn.txId, labelOf(earn.description)]));

    const lines: string[] = [
      `## Daily coverage report: ${report.date} (${report.timezone})`,
      '',
      `**Spent:** ${money(report.totals.spendTotal)}`,
      `**Earned:** ${money(report.totals.earnTotal)}`,
      `**Net:** ${money(report.totals.net)}`,
      '',
      '### Spends',
    ];

    if (report.spends.length === 0) {
      lines.push('_No spends._');
    }
    for (const spend of report.spends) {
      lines.push(...renderSpend(spend, money, time, earnLabels));
    }

    lines.push('', '### Earnings');
    if (report.earns.length === 0) {
      lines.push('_No earnings._');
    }
    for (const earn of report.earns) {
      lines.push(
        `- 💰 ${time(earn.time)} ${labelOf(earn.description)}: ${money(earn.amount)} ` +
          `(allocated ${money(earn.allocated)}, left ${money(earn.remaining)})`
      );
    }

    const notes = collectNotes(report);
    if (notes.length > 0) {
      lines.push('', '### Notes', ...notes.map((note) => `- ${note}`));
    }

    return `${lines.join('\n')}\n`;
  }
}

function renderSpend(
  spend: SpendCoverage,
  money: (amount: number) => string,
  time: (epochSeconds: number) => string,
  earnLabels: Map<string, string>
): string[] {
  const mark = spend.covered ? '✅' : '❌';
  const lines = [`- ${mark} ${time(spend.time)} ${labelOf(spend.description)}: ${money(spend.amount)}`];
  if (spend.sources.length > 0) {
    const sources = spend.sources
      .map((source) => `${earnLabels.get(source.txId) ?? source.txId} (${money(source.amount)})`)
      .join(', ');
    lines.push(`  - Covered by: ${sources}`);
  }
  if (!spend.covered) {
    const reason = spend.reason === 'insufficient_income' ? ' (insufficient income)' : '';
    lines.push(`  - Uncovered: ${money(spend.uncoveredAmount)}${reason}`);
  }
  return lines;
}

function collectNotes(report: DailyReport): string[] {
  const notes: string[] = [];
  const uncovered = report.spends.filter((spend) => !spend.covered).length;
  if (uncovered > 0) {
    notes.push(`${uncovered} of ${report.spends.length} spends not fully covered.`);
  }
  if (report.holdsExcluded > 0) {
    notes.push(
      report.holdsExcluded === 1
        ? '1 pending transaction excluded.'
        : `${report.holdsExcluded} pending transactions excluded.`
    );
  }
  return notes;
}

function labelOf(description: string): string {
  const trimmed = description.trim();
  return trimmed === '' ? NO_DESCRIPTION : trimmed;
}
