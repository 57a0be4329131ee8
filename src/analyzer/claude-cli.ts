/**
 * Runs the locally installed `claude` CLI in print mode. The prompt goes in
 * on stdin so long transcripts don't hit argument length limits.
 */

import { spawn } from 'child_process';
import { constants, promises as fs } from 'fs';
import { delimiter, join } from 'path';
import { InvocationError, isErrnoException } from '../errors.js';
import { createLogger } from '../logger.js';
import { isRecord, truncate } from '../util.js';
import { buildPrompt, type PromptParts } from './prompts.js';

const log = createLogger('claude');

export const INSTALL_HINT = 'Install Claude Code: curl -fsSL https://claude.ai/install.sh | bash';

export type ModelRequest = PromptParts;

export interface ModelInvoker {
  invoke(request: ModelRequest): Promise<string>;
}

export type InputMode = 'stdin' | 'argument';

export interface ClaudeCliOptions {
  binary: string;
  model: string;
  timeoutMs: number;
  inputMode?: InputMode;
  env?: NodeJS.ProcessEnv;
}

export class ClaudeCliInvoker implements ModelInvoker {
  constructor(private readonly options: ClaudeCliOptions) {}

  buildArgs(prompt: string): string[] {
    const args = [
      '-p',
      '--model',
      this.options.model,
      '--output-format',
      'json',
      '--no-session-persistence',
      '--settings',
      JSON.stringify({ disableAllHooks: true }),
    ];
    if (this.options.inputMode === 'argument') args.push(prompt);
    return args;
  }

  async invoke(request: ModelRequest): Promise<string> {
    const { binary } = this.options;
    const env = this.options.env ?? process.env;

    if (!(await isClaudeInstalled(binary, env))) {
      throw new InvocationError('missing-executable', `'${binary}' CLI not found. ${INSTALL_HINT}`);
    }

    const prompt = buildPrompt(request);
    log.debug(`Invoking ${binary} (${prompt.length} chars, ${this.options.inputMode ?? 'stdin'})`);
    const stdout = await this.run(prompt);

    assertNotErrorEnvelope(stdout);
    return stdout;
  }

  private run(prompt: string): Promise<string> {
    const { binary, timeoutMs } = this.options;
    const viaStdin = this.options.inputMode !== 'argument';

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        outcome();
      };

      const child = spawn(binary, this.buildArgs(prompt), {
        env: this.options.env ?? process.env,
        windowsHide: true,
        shell: false,
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));
      const stderrText = () => Buffer.concat(stderrChunks).toString('utf8');

      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, timeoutMs);

      child.on('error', err => {
        settle(() => {
          if (isErrnoException(err) && err.code === 'ENOENT') {
            reject(new InvocationError('missing-executable', `'${binary}' CLI not found. ${INSTALL_HINT}`, '', { cause: err }));
          } else {
            reject(new InvocationError('exit', `Failed to start ${binary}: ${err.message}`, stderrText(), { cause: err }));
          }
        });
      });

      child.on('close', code => {
        settle(() => {
          if (timedOut) {
            reject(new InvocationError('timeout', `${binary} -p timed out after ${Math.round(timeoutMs / 1000)} seconds`, stderrText()));
          } else if (code !== 0) {
            reject(new InvocationError('exit', `${binary} -p failed (exit code ${code}):\n${stderrText()}`, stderrText()));
          } else {
            resolve(Buffer.concat(stdoutChunks).toString('utf8'));
          }
        });
      });

      // The child may exit before reading everything we write
      child.stdin.on('error', err => log.debug(`stdin closed early: ${err.message}`));
      if (viaStdin) child.stdin.write(prompt);
      child.stdin.end();
    });
  }
}

function assertNotErrorEnvelope(stdout: string): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout.trim());
  } catch {
    return;
  }
  if (isRecord(parsed) && parsed.is_error === true) {
    const detail = typeof parsed.result === 'string' ? parsed.result : JSON.stringify(parsed);
    throw new InvocationError('exit', `claude reported an error: ${truncate(detail, 500)}`);
  }
}

/**
 * Whether `binary` resolves to an executable file, searching PATH when it is a bare name
 */
export async function isClaudeInstalled(
  binary = 'claude',
  env: NodeJS.ProcessEnv = process.env,
): Promise<boolean> {
  const candidates = binary.includes('/') || binary.includes('\\')
    ? [binary]
    : (env.PATH ?? '')
        .split(delimiter)
        .filter(Boolean)
        .flatMap(dir => executableNames(binary, env).map(name => join(dir, name)));

  for (const candidate of candidates) {
    try {
      await fs.access(candidate, constants.X_OK);
      const stat = await fs.stat(candidate);
      if (stat.isFile()) return true;
    } catch {
      continue;
    }
  }
  return false;
}

function executableNames(binary: string, env: NodeJS.ProcessEnv): string[] {
  if (process.platform !== 'win32') return [binary];
  const extensions = (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean);
  return [binary, ...extensions.map(ext => binary + ext.toLowerCase())];
}
