/**
 * Terminal and Markdown rendering of verdicts. Everything here returns text;
 * callers decide where it goes.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { ParseError, errorMessage } from '../errors.js';
import type {
  Insights,
  InsightItem,
  Verdict,
  VerdictCounts,
  VerdictSet,
  VerdictStatus,
} from '../types/verdicts.js';

export interface RenderOptions {
  /** ANSI colors; off unless asked for */
  color?: boolean;
}

const plain = new Chalk({ level: 0 });

function painter(options: RenderOptions): ChalkInstance {
  return options.color ? chalk : plain;
}

const TERMINAL_ICONS: Record<VerdictStatus, string> = { PASS: '+', FAIL: 'x', SKIP: '-' };
const MARKDOWN_ICONS: Record<VerdictStatus, string> = { PASS: '✅', FAIL: '❌', SKIP: '⏭️' };

export function countVerdicts(verdicts: readonly Verdict[]): VerdictCounts {
  return {
    pass: verdicts.filter(v => v.status === 'PASS').length,
    fail: verdicts.filter(v => v.status === 'FAIL').length,
    skip: verdicts.filter(v => v.status === 'SKIP').length,
  };
}

/**
 * Group verdicts by category, in order of first appearance
 */
export function groupByCategory(verdicts: readonly Verdict[]): Array<[string, Verdict[]]> {
  const groups = new Map<string, Verdict[]>();
  for (const verdict of verdicts) {
    const group = groups.get(verdict.category);
    if (group) group.push(verdict);
    else groups.set(verdict.category, [verdict]);
  }
  return Array.from(groups.entries());
}

export function formatVerdicts(set: VerdictSet, options: RenderOptions = {}): string {
  const c = painter(options);
  const statusColor: Record<VerdictStatus, (text: string) => string> = {
    PASS: c.green,
    FAIL: c.red,
    SKIP: c.dim,
  };
  const lines: string[] = [];

  for (const [category, group] of groupByCategory(set.verdicts)) {
    lines.push(c.bold(category));
    for (const v of group) {
      const head = `  [${TERMINAL_ICONS[v.status]}] ${statusColor[v.status](v.status)}: ${v.rule}`;
      lines.push(v.status === 'FAIL' && v.reasoning ? `${head} — ${v.reasoning}` : head);
    }
  }

  const counts = countVerdicts(set.verdicts);
  lines.push('', `  ${counts.pass}/${set.verdicts.length} passed`);
  return lines.join('\n');
}

export function formatInsights(insights: Insights, options: RenderOptions = {}): string {
  const c = painter(options);
  const lines = [c.bold('\n--- Session Insights ---\n')];

  const section = (title: string, items: readonly InsightItem[]) => {
    if (items.length === 0) return;
    lines.push(title);
    for (const item of items) {
      lines.push(`  - ${item.text}`);
      if (item.evidence) lines.push(c.dim(`    Evidence: ${item.evidence}`));
    }
    lines.push('');
  };

  section('What went well:', insights.whatWentWell);
  section('What to improve:', insights.whatToImprove);
  section('Notable:', insights.notable);

  return lines.join('\n');
}

/**
 * Error line for the terminal. An unparseable model response is shown in full
 * after the message.
 */
export function formatError(err: unknown, options: RenderOptions = {}): string {
  const c = painter(options);
  const lines = [c.red(`Error: ${errorMessage(err)}`)];
  if (err instanceof ParseError && err.raw.trim()) {
    lines.push(c.dim('Raw response:'), err.raw);
  }
  return lines.join('\n');
}

export interface ReportEntry {
  label: string;
  result: VerdictSet;
}

/**
 * Markdown report for a batch of sessions, in the order given
 */
export function formatReportMarkdown(entries: readonly ReportEntry[]): string {
  const lines = ['# ai-lint Compliance Report', ''];
  const totals: VerdictCounts = { pass: 0, fail: 0, skip: 0 };

  for (const { label, result } of entries) {
    const counts = countVerdicts(result.verdicts);
    lines.push(`## ${label}`, '');

    for (const [category, group] of groupByCategory(result.verdicts)) {
      lines.push(`### ${category}`, '');
      for (const v of group) {
        lines.push(`- ${MARKDOWN_ICONS[v.status]} **${v.status}**: ${v.rule}`);
        if (v.reasoning) lines.push(`  - ${v.reasoning}`);
      }
      lines.push('');
    }

    totals.pass += counts.pass;
    totals.fail += counts.fail;
    totals.skip += counts.skip;

    lines.push(`**Score: ${counts.pass} passed, ${counts.fail} failed, ${counts.skip} skipped**`, '');
    if (result.summary) lines.push(`> ${result.summary}`, '');
    lines.push('---', '');
  }

  lines.push(
    '## Overall',
    `- Sessions checked: ${entries.length}`,
    `- Total: ${totals.pass} passed, ${totals.fail} failed, ${totals.skip} skipped`,
    '',
  );

  return lines.join('\n');
}

export function defaultReportFileName(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `ai-lint-report-${date}-${time}.md`;
}
