/**
 * Compliance check of one or more sessions against a policy
 */

import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { formatTranscript, parseTranscript, sessionLabel } from '../scanner/transcript-parser.js';
import type { Session, SessionDescriptor } from '../types/session.js';
import type { Insights, VerdictSet } from '../types/verdicts.js';
import type { ModelInvoker } from './claude-cli.js';
import { extractInsights, extractVerdicts } from './extract.js';
import {
  COMPLIANCE_SYSTEM_PROMPT,
  INSIGHTS_POLICY_LABEL,
  INSIGHTS_SYSTEM_PROMPT,
} from './prompts.js';

const log = createLogger('check');

export const DEFAULT_MAX_TURNS = 200;

export interface CheckOptions {
  /** Run the insights pass alongside the compliance pass */
  insights?: boolean;
  /** Policy section names used to validate verdict categories */
  knownCategories?: readonly string[];
}

/**
 * Run the compliance pass (and optionally the insights pass, concurrently).
 * A failed compliance pass rejects; a failed insights pass only loses the insights.
 */
export async function runCheck(
  transcript: string,
  policy: string,
  invoker: ModelInvoker,
  options: CheckOptions = {},
): Promise<VerdictSet> {
  const compliance = invoker
    .invoke({ system: COMPLIANCE_SYSTEM_PROMPT, policy, transcript })
    .then(raw => extractVerdicts(raw, { knownCategories: options.knownCategories }));

  const insights: Promise<Insights | undefined> = options.insights
    ? invoker
        .invoke({
          system: INSIGHTS_SYSTEM_PROMPT,
          policy,
          policyLabel: INSIGHTS_POLICY_LABEL,
          transcript,
        })
        .then(extractInsights)
    : Promise.resolve(undefined);

  const [verdicts, extra] = await Promise.allSettled([compliance, insights]);

  if (verdicts.status === 'rejected') throw verdicts.reason;
  if (extra.status === 'rejected') {
    log.warn(`Insights unavailable: ${errorMessage(extra.reason)}`);
    return verdicts.value;
  }
  return extra.value ? withInsights(verdicts.value, extra.value) : verdicts.value;
}

export function withInsights(set: VerdictSet, insights: Insights): VerdictSet {
  return Object.freeze({ ...set, insights });
}

export type SessionCheckResult =
  | { status: 'checked'; label: string; session: Session; result: VerdictSet }
  | { status: 'empty'; label: string; session: Session }
  | { status: 'failed'; label: string; descriptor: SessionDescriptor; error: unknown };

export interface BatchOptions extends CheckOptions {
  concurrency?: number;
  maxTurns?: number;
  /** Called as each session finishes, in completion order */
  onSettled?: (result: SessionCheckResult, index: number) => void;
}

/**
 * Check several sessions independently. Results keep the order of
 * `descriptors` whatever order the checks finish in.
 */
export async function checkSessions(
  descriptors: readonly SessionDescriptor[],
  policy: string,
  invoker: ModelInvoker,
  options: BatchOptions = {},
): Promise<SessionCheckResult[]> {
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const results = new Array<SessionCheckResult>(descriptors.length);
  let next = 0;

  const worker = async () => {
    while (next < descriptors.length) {
      const index = next++;
      const result = await checkSession(descriptors[index], policy, invoker, options);
      results[index] = result;
      options.onSettled?.(result, index);
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, descriptors.length) }, () => worker()),
  );
  return results;
}

export async function checkSession(
  descriptor: SessionDescriptor,
  policy: string,
  invoker: ModelInvoker,
  options: BatchOptions = {},
): Promise<SessionCheckResult> {
  let session: Session;
  try {
    session = await parseTranscript(descriptor, { maxTurns: options.maxTurns ?? DEFAULT_MAX_TURNS });
  } catch (error) {
    return { status: 'failed', label: `${descriptor.project} | ${descriptor.id}`, descriptor, error };
  }

  const label = sessionLabel(session);
  if (session.turns.length === 0) {
    return { status: 'empty', label, session };
  }

  try {
    const result = await runCheck(formatTranscript(session), policy, invoker, {
      insights: options.insights,
      knownCategories: options.knownCategories,
    });
    return { status: 'checked', label, session, result };
  } catch (error) {
    return { status: 'failed', label, descriptor, error };
  }
}
