import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { checkSessions, runCheck, type SessionCheckResult } from '../../src/analyzer/check.js';
import type { ModelInvoker, ModelRequest } from '../../src/analyzer/claude-cli.js';
import {
  COMPLIANCE_SYSTEM_PROMPT,
  INSIGHTS_POLICY_LABEL,
  INSIGHTS_SYSTEM_PROMPT,
} from '../../src/analyzer/prompts.js';
import { InvocationError } from '../../src/errors.js';
import { descriptorFor, makeTempDir, removeDir, userLine, writeTranscript } from '../helpers/fixtures.js';

const VERDICTS_RAW = JSON.stringify({
  verdicts: [{ rule: 'No secrets', verdict: 'PASS', category: 'security' }],
  summary: 'fine',
});

const INSIGHTS_RAW = JSON.stringify({
  what_went_well: ['Focused'],
  what_to_improve: [],
  notable: [],
});

function fakeInvoker(respond: (request: ModelRequest) => Promise<string>) {
  const invoke = vi.fn(respond);
  const invoker: ModelInvoker = { invoke };
  return { invoker, invoke };
}

const byPass = async (request: ModelRequest) =>
  request.system === COMPLIANCE_SYSTEM_PROMPT ? VERDICTS_RAW : INSIGHTS_RAW;

describe('runCheck', () => {
  it('runs only the compliance pass by default', async () => {
    const { invoker, invoke } = fakeInvoker(byPass);

    const result = await runCheck('T', 'P', invoker);

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(invoke).toHaveBeenCalledWith({ system: COMPLIANCE_SYSTEM_PROMPT, policy: 'P', transcript: 'T' });
    expect(result).toEqual({
      verdicts: [{ rule: 'No secrets', status: 'PASS', reasoning: '', category: 'security' }],
      summary: 'fine',
    });
    expect(result.insights).toBeUndefined();
  });

  it('attaches insights when asked', async () => {
    const { invoker, invoke } = fakeInvoker(byPass);

    const result = await runCheck('T', 'P', invoker, { insights: true });

    expect(invoke).toHaveBeenCalledWith({
      system: INSIGHTS_SYSTEM_PROMPT,
      policy: 'P',
      policyLabel: INSIGHTS_POLICY_LABEL,
      transcript: 'T',
    });
    expect(result.insights).toEqual({
      whatWentWell: [{ text: 'Focused', evidence: '' }],
      whatToImprove: [],
      notable: [],
    });
  });

  it('starts both passes before either finishes', async () => {
    const resolvers: Array<(raw: string) => void> = [];
    const { invoker, invoke } = fakeInvoker(
      () => new Promise<string>(resolve => resolvers.push(resolve)),
    );

    const pending = runCheck('T', 'P', invoker, { insights: true });

    expect(invoke).toHaveBeenCalledTimes(2);
    resolvers[1](INSIGHTS_RAW);
    resolvers[0](VERDICTS_RAW);
    const result = await pending;
    expect(result.verdicts).toHaveLength(1);
    expect(result.insights?.whatWentWell).toHaveLength(1);
  });

  it('keeps the verdicts when the insights pass fails', async () => {
    const { invoker } = fakeInvoker(async request => {
      if (request.system === INSIGHTS_SYSTEM_PROMPT) {
        throw new InvocationError('timeout', 'claude -p timed out after 120 seconds');
      }
      return VERDICTS_RAW;
    });

    const result = await runCheck('T', 'P', invoker, { insights: true });

    expect(result.verdicts).toHaveLength(1);
    expect(result.insights).toBeUndefined();
  });

  it('keeps the verdicts when the insights response cannot be parsed', async () => {
    const { invoker } = fakeInvoker(async request =>
      request.system === INSIGHTS_SYSTEM_PROMPT ? 'no idea' : VERDICTS_RAW,
    );

    const result = await runCheck('T', 'P', invoker, { insights: true });

    expect(result.insights).toBeUndefined();
  });

  it('rejects when the compliance pass fails', async () => {
    const { invoker } = fakeInvoker(async request => {
      if (request.system === COMPLIANCE_SYSTEM_PROMPT) {
        throw new InvocationError('exit', 'claude -p failed (exit code 1):\nboom', 'boom');
      }
      return INSIGHTS_RAW;
    });

    await expect(runCheck('T', 'P', invoker, { insights: true })).rejects.toBeInstanceOf(InvocationError);
  });

  it('maps categories onto known policy sections', async () => {
    const { invoker } = fakeInvoker(byPass);

    const result = await runCheck('T', 'P', invoker, { knownCategories: ['Security'] });

    expect(result.verdicts[0].category).toBe('Security');
  });
});

describe('checkSessions', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  async function session(id: string, lines: string[]) {
    const path = await writeTranscript(root, `proj/${id}.jsonl`, lines);
    return descriptorFor(path, id, 'proj');
  }

  it('keeps input order when later sessions finish first', async () => {
    const slow = await session('s1', [userLine('first task')]);
    const fast = await session('s2', [userLine('second task')]);
    const { invoker } = fakeInvoker(async request => {
      if (request.transcript.includes('first task')) {
        await new Promise(resolve => setTimeout(resolve, 30));
      }
      return VERDICTS_RAW;
    });
    const settled: number[] = [];

    const results = await checkSessions([slow, fast], 'P', invoker, {
      concurrency: 2,
      onSettled: (_result, index) => settled.push(index),
    });

    expect(settled).toEqual([1, 0]);
    expect(results.map(r => r.label)).toEqual([
      '2026-02-20 10:00 | proj | "first task"',
      '2026-02-20 10:00 | proj | "second task"',
    ]);
    expect(results.map(r => r.status)).toEqual(['checked', 'checked']);
  });

  it('reports empty and failed sessions without stopping the batch', async () => {
    const empty = await session('s1', []);
    const broken = await session('s2', [userLine('broken task')]);
    const ok = await session('s3', [userLine('good task')]);
    const { invoker, invoke } = fakeInvoker(async request => {
      if (request.transcript.includes('broken task')) {
        throw new InvocationError('exit', 'claude -p failed (exit code 2):\n', '');
      }
      return VERDICTS_RAW;
    });

    const results = await checkSessions([empty, broken, ok], 'P', invoker);

    expect(results.map(r => r.status)).toEqual(['empty', 'failed', 'checked']);
    expect(results[0].label).toBe('proj');
    const failed: SessionCheckResult = results[1];
    expect(failed.status === 'failed' && failed.error).toBeInstanceOf(InvocationError);
    expect(invoke).toHaveBeenCalledTimes(2);
  });

  it('sends the rendered transcript to the model', async () => {
    const descriptor = await session('abc', [userLine('hello', { cwd: '/work' })]);
    const { invoker, invoke } = fakeInvoker(byPass);

    await checkSessions([descriptor], 'P', invoker);

    expect(invoke.mock.calls[0][0].transcript).toBe(
      [
        '# Session: abc',
        'Project: proj',
        'Working directory: /work',
        'Started: 2026-02-20T10:00:00.000Z',
        'Turns: 1',
        '',
        '--- USER ---',
        'hello',
        '',
      ].join('\n'),
    );
  });
});
