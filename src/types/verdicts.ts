/**
 * Types for compliance verdicts and session insights
 */

export const VERDICT_STATUSES = ['PASS', 'FAIL', 'SKIP'] as const;

export type VerdictStatus = (typeof VERDICT_STATUSES)[number];

export const DEFAULT_CATEGORY = 'General';

export interface Verdict {
  readonly rule: string;
  readonly status: VerdictStatus;
  readonly reasoning: string;
  readonly category: string;
}

export interface InsightItem {
  readonly text: string;
  readonly evidence: string;
}

export interface Insights {
  readonly whatWentWell: readonly InsightItem[];
  readonly whatToImprove: readonly InsightItem[];
  readonly notable: readonly InsightItem[];
}

export interface VerdictSet {
  readonly verdicts: readonly Verdict[];
  readonly summary: string;
  readonly insights?: Insights;
}

export interface VerdictCounts {
  pass: number;
  fail: number;
  skip: number;
}
