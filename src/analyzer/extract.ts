/**
 * Recovers structured verdicts and insights from free-form model output.
 *
 * The response nominally contains JSON but may be wrapped in a CLI status
 * envelope, fenced, preceded by prose, or followed by commentary. Recovery is
 * an ordered chain of strategies; each either returns a value that passes the
 * caller's shape check or defers to the next one.
 */

import { ParseError } from '../errors.js';
import { createLogger } from '../logger.js';
import { isRecord, truncate } from '../util.js';
import {
  DEFAULT_CATEGORY,
  VERDICT_STATUSES,
  type InsightItem,
  type Insights,
  type Verdict,
  type VerdictSet,
  type VerdictStatus,
} from '../types/verdicts.js';

const log = createLogger('extract');

/** Converts a parsed JSON value to T, or null when the shape does not fit */
export type Shape<T> = (value: unknown) => T | null;

export type Strategy = <T>(text: string, shape: Shape<T>) => T | null;

// --- Envelope ---

/**
 * `claude -p --output-format json` wraps the answer as `{ ..., "result": "<text>" }`
 */
export function unwrapEnvelope(raw: string): string {
  const parsed = tryParse(raw.trim());
  if (parsed.ok && isRecord(parsed.value) && typeof parsed.value.result === 'string') {
    return parsed.value.result;
  }
  return raw;
}

// --- Strategies ---

const JSON_FENCE = /```json[^\S\n]*\n?([\s\S]*?)```/gi;

export const fromJsonFence: Strategy = (text, shape) => {
  for (const match of text.matchAll(JSON_FENCE)) {
    const value = parseAs(match[1].trim(), shape);
    if (value !== null) return value;
  }
  return null;
};

export const fromWholeText: Strategy = (text, shape) => parseAs(text, shape);

export const fromBalancedSpan: Strategy = (text, shape) => {
  for (const span of balancedSpans(text)) {
    const value = parseAs(span, shape);
    if (value !== null) return value;
  }
  return null;
};

export const STRATEGIES: readonly Strategy[] = [fromJsonFence, fromWholeText, fromBalancedSpan];

/**
 * Yields every balanced `{...}` / `[...]` span, in order of its opening
 * bracket. Brackets inside JSON strings are ignored.
 */
export function* balancedSpans(text: string): Generator<string> {
  const closes = new Map<number, number>();

  for (let start = 0; start < text.length; start++) {
    const opener = text[start];
    if (opener !== '{' && opener !== '[') continue;

    if (!closes.has(start)) matchFrom(text, start, closes);
    const end = closes.get(start) ?? -1;
    if (end !== -1) yield text.slice(start, end + 1);
  }
}

const CLOSERS: Record<string, string> = { '{': '}', '[': ']' };

/**
 * Match brackets from `start`, recording the close index (-1 when there is
 * none) of every opener met outside a string. A nested opener gets the same
 * match a scan starting at it would find, so each one is scanned once.
 */
function matchFrom(text: string, start: number, closes: Map<number, number>): void {
  const open: number[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      open.push(i);
    } else if (ch === '}' || ch === ']') {
      const top = open.pop();
      if (top === undefined) return;
      if (CLOSERS[text[top]] !== ch) {
        closes.set(top, -1);
        break;
      }
      closes.set(top, i);
      if (open.length === 0) return;
    }
  }

  for (const index of open) closes.set(index, -1);
}

/**
 * Run the recovery chain; throws ParseError carrying the raw response
 */
export function recoverPayload<T>(raw: string, shape: Shape<T>, what = 'JSON'): T {
  const text = unwrapEnvelope(raw).trim();

  for (const strategy of STRATEGIES) {
    const value = strategy(text, shape);
    if (value !== null) return value;
  }

  throw new ParseError(
    `Failed to parse model response as ${what}: ${truncate(text.replace(/\s+/g, ' '), 120)}`,
    raw,
  );
}

// --- Verdicts ---

export interface ExtractOptions {
  /** Policy section names; other categories fall back to the default */
  knownCategories?: readonly string[];
  onWarning?: (message: string) => void;
}

export function extractVerdicts(raw: string, options: ExtractOptions = {}): VerdictSet {
  return recoverPayload(raw, value => toVerdictSet(value, options), 'compliance verdicts');
}

export function toVerdictSet(value: unknown, options: ExtractOptions = {}): VerdictSet | null {
  if (!isRecord(value) || !Array.isArray(value.verdicts)) return null;

  const warn = options.onWarning ?? log.warn;
  const verdicts: Verdict[] = [];

  value.verdicts.forEach((item: unknown, index: number) => {
    const verdict = toVerdict(item, options.knownCategories);
    if (typeof verdict === 'string') {
      warn(`Dropping verdict #${index + 1}: ${verdict}`);
    } else {
      verdicts.push(verdict);
    }
  });

  const insights = toInsights(value);
  return Object.freeze({
    verdicts: Object.freeze(verdicts),
    summary: typeof value.summary === 'string' ? value.summary : '',
    ...(insights ? { insights } : {}),
  });
}

/** A normalized verdict, or the reason it was rejected */
function toVerdict(item: unknown, knownCategories?: readonly string[]): Verdict | string {
  if (!isRecord(item)) return 'not an object';

  const rule = firstString(item.rule, item.name)?.trim();
  if (!rule) return 'missing rule name';

  const status = normalizeStatus(firstString(item.verdict, item.status));
  if (!status) {
    return `unknown status ${JSON.stringify(item.verdict ?? item.status ?? null)} for "${rule}"`;
  }

  return Object.freeze({
    rule,
    status,
    reasoning: typeof item.reasoning === 'string' ? item.reasoning : '',
    category: normalizeCategory(item.category, knownCategories),
  });
}

export function normalizeStatus(value: string | undefined): VerdictStatus | null {
  const upper = value?.trim().toUpperCase();
  return VERDICT_STATUSES.find(s => s === upper) ?? null;
}

function normalizeCategory(value: unknown, knownCategories?: readonly string[]): string {
  const category = typeof value === 'string' ? value.trim() : '';
  if (!category) return DEFAULT_CATEGORY;
  if (!knownCategories || knownCategories.length === 0) return category;

  const lower = category.toLowerCase();
  return knownCategories.find(known => known.toLowerCase() === lower) ?? DEFAULT_CATEGORY;
}

/**
 * Canonical JSON for a verdict set; extracting it again gives an equal set
 */
export function serializeVerdictSet(set: VerdictSet): string {
  return JSON.stringify(
    {
      verdicts: set.verdicts.map(v => ({
        category: v.category,
        rule: v.rule,
        verdict: v.status,
        reasoning: v.reasoning,
      })),
      summary: set.summary,
      ...(set.insights ? serializeInsights(set.insights) : {}),
    },
    null,
    2,
  );
}

function serializeInsights(insights: Insights) {
  return {
    what_went_well: insights.whatWentWell.map(i => ({ pattern: i.text, evidence: i.evidence })),
    what_to_improve: insights.whatToImprove.map(i => ({ pattern: i.text, evidence: i.evidence })),
    notable: insights.notable.map(i => ({ observation: i.text, evidence: i.evidence })),
  };
}

// --- Insights ---

const INSIGHT_KEYS = ['what_went_well', 'what_to_improve', 'notable'] as const;

export function extractInsights(raw: string): Insights {
  return recoverPayload(raw, toInsights, 'session insights');
}

export function toInsights(value: unknown): Insights | null {
  if (!isRecord(value) || !INSIGHT_KEYS.some(key => key in value)) return null;

  return Object.freeze({
    whatWentWell: toInsightItems(value.what_went_well),
    whatToImprove: toInsightItems(value.what_to_improve),
    notable: toInsightItems(value.notable),
  });
}

function toInsightItems(value: unknown): readonly InsightItem[] {
  if (typeof value === 'string') {
    return value.trim() ? [{ text: value.trim(), evidence: '' }] : [];
  }
  if (!Array.isArray(value)) return [];

  const items: InsightItem[] = [];
  for (const item of value) {
    if (typeof item === 'string' && item.trim()) {
      items.push({ text: item.trim(), evidence: '' });
      continue;
    }
    if (!isRecord(item)) continue;
    const text = firstString(item.pattern, item.observation, item.text);
    if (!text) continue;
    items.push({ text, evidence: typeof item.evidence === 'string' ? item.evidence : '' });
  }
  return Object.freeze(items);
}

// --- Helpers ---

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function parseAs<T>(text: string, shape: Shape<T>): T | null {
  if (!text) return null;
  const parsed = tryParse(text);
  return parsed.ok ? shape(parsed.value) : null;
}

function firstString(...values: unknown[]): string | undefined {
  return values.find((v): v is string => typeof v === 'string');
}
