import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { promises as fs } from 'fs';
import { join } from 'path';
import { spawn, type ChildProcess } from 'child_process';
import { ClaudeCliInvoker, isClaudeInstalled } from '../../src/analyzer/claude-cli.js';
import { buildPrompt } from '../../src/analyzer/prompts.js';
import { InvocationError } from '../../src/errors.js';
import { makeTempDir, removeDir } from '../helpers/fixtures.js';

vi.mock('child_process', () => ({ spawn: vi.fn() }));

/** Stand-in for a spawned `claude` process */
class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly stdin = new PassThrough();
  stdinText = '';
  readonly kill = vi.fn((_signal?: NodeJS.Signals) => {
    setImmediate(() => this.emit('close', null));
    return true;
  });

  constructor() {
    super();
    this.stdin.on('data', (chunk: Buffer) => {
      this.stdinText += chunk.toString('utf8');
    });
  }

  finish(code: number, stdout = '', stderr = ''): void {
    setImmediate(() => {
      if (stdout) this.stdout.write(stdout);
      if (stderr) this.stderr.write(stderr);
      this.stdout.end();
      this.stderr.end();
      setImmediate(() => this.emit('close', code));
    });
  }
}

const REQUEST = { system: 'S', policy: 'P', transcript: 'T' };

describe('ClaudeCliInvoker', () => {
  let dir: string;
  let binary: string;
  let child: FakeChild | undefined;

  function onSpawn(behave: (child: FakeChild) => void): void {
    vi.mocked(spawn).mockImplementation(() => {
      const fake = new FakeChild();
      child = fake;
      behave(fake);
      return fake as unknown as ChildProcess;
    });
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    binary = join(dir, 'claude');
    await fs.writeFile(binary, '#!/bin/sh\n', { mode: 0o755 });
    child = undefined;
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('sends the prompt on stdin and returns stdout', async () => {
    onSpawn(c => c.finish(0, '{"result":"ok"}'));
    const invoker = new ClaudeCliInvoker({ binary, model: 'test-model', timeoutMs: 5000 });

    const out = await invoker.invoke(REQUEST);

    expect(out).toBe('{"result":"ok"}');
    expect(spawn).toHaveBeenCalledWith(
      binary,
      [
        '-p',
        '--model',
        'test-model',
        '--output-format',
        'json',
        '--no-session-persistence',
        '--settings',
        '{"disableAllHooks":true}',
      ],
      expect.objectContaining({ shell: false }),
    );
    expect(child?.stdinText).toBe(buildPrompt(REQUEST));
    expect(child?.stdinText).toBe('S\n\n---\nPOLICY:\nP\n\n---\nTRANSCRIPT:\nT');
  });

  it('passes the prompt as the last argument in argument mode', async () => {
    onSpawn(c => c.finish(0, 'done'));
    const invoker = new ClaudeCliInvoker({ binary, model: 'm', timeoutMs: 5000, inputMode: 'argument' });

    await invoker.invoke(REQUEST);

    const args = vi.mocked(spawn).mock.calls[0][1];
    expect(args?.[args.length - 1]).toBe(buildPrompt(REQUEST));
    expect(child?.stdinText).toBe('');
  });

  it('fails with the exit status and stderr on a non-zero exit', async () => {
    onSpawn(c => c.finish(1, '', 'boom'));
    const invoker = new ClaudeCliInvoker({ binary, model: 'm', timeoutMs: 5000 });

    await expect(invoker.invoke(REQUEST)).rejects.toMatchObject({
      reason: 'exit',
      stderr: 'boom',
      message: `${binary} -p failed (exit code 1):\nboom`,
    });
  });

  it('fails without spawning when the executable is missing', async () => {
    onSpawn(c => c.finish(0, 'unused'));
    const invoker = new ClaudeCliInvoker({ binary: join(dir, 'nope'), model: 'm', timeoutMs: 5000 });

    await expect(invoker.invoke(REQUEST)).rejects.toMatchObject({ reason: 'missing-executable' });
    expect(spawn).not.toHaveBeenCalled();
  });

  it('maps a spawn ENOENT to a missing executable', async () => {
    onSpawn(c => {
      setImmediate(() => c.emit('error', Object.assign(new Error(`spawn ${binary} ENOENT`), { code: 'ENOENT' })));
    });
    const invoker = new ClaudeCliInvoker({ binary, model: 'm', timeoutMs: 5000 });

    const error = await invoker.invoke(REQUEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InvocationError);
    expect(error).toMatchObject({ reason: 'missing-executable' });
  });

  it('kills the process and fails when it runs past the timeout', async () => {
    onSpawn(() => undefined);
    const invoker = new ClaudeCliInvoker({ binary, model: 'm', timeoutMs: 20 });

    await expect(invoker.invoke(REQUEST)).rejects.toMatchObject({ reason: 'timeout' });
    expect(child?.kill).toHaveBeenCalledWith('SIGKILL');
  });

  it('fails when the CLI reports an error in its envelope', async () => {
    onSpawn(c =>
      c.finish(0, JSON.stringify({ type: 'result', is_error: true, result: 'Credit balance is too low' })),
    );
    const invoker = new ClaudeCliInvoker({ binary, model: 'm', timeoutMs: 5000 });

    await expect(invoker.invoke(REQUEST)).rejects.toMatchObject({
      reason: 'exit',
      message: 'claude reported an error: Credit balance is too low',
    });
  });
});

describe('isClaudeInstalled', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('finds an executable on PATH', async () => {
    await fs.writeFile(join(dir, 'claude'), '#!/bin/sh\n', { mode: 0o755 });

    expect(await isClaudeInstalled('claude', { PATH: dir })).toBe(true);
    expect(await isClaudeInstalled('claude', { PATH: '' })).toBe(false);
  });

  it('ignores files without an execute bit and directories', async () => {
    await fs.writeFile(join(dir, 'claude'), 'text', { mode: 0o644 });
    await fs.mkdir(join(dir, 'other'));

    expect(await isClaudeInstalled(join(dir, 'claude'))).toBe(false);
    expect(await isClaudeInstalled(join(dir, 'other'))).toBe(false);
  });
});
