#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { closeSync, openSync, promises as fs, writeSync } from 'fs';
import { resolveConfig, type AiLintConfig } from './config.js';
import { AiLintError, NotFoundError, errorMessage } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';
import { findLatestSession, findSession, listSessions } from './scanner/session-store.js';
import { formatTranscript, parseTranscript, previewLabels } from './scanner/transcript-parser.js';
import { ClaudeCliInvoker, INSTALL_HINT, isClaudeInstalled } from './analyzer/claude-cli.js';
import { DEFAULT_MAX_TURNS, checkSessions, runCheck } from './analyzer/check.js';
import {
  countVerdicts,
  defaultReportFileName,
  formatError,
  formatInsights,
  formatReportMarkdown,
  formatVerdicts,
  type ReportEntry,
} from './reporter/index.js';
import {
  PERSONAS,
  installPolicy,
  openPolicyInEditor,
  policyExists,
  policySections,
  readPolicy,
} from './policy/store.js';
import { installHook, isHookInstalled, uninstallHook } from './hooks/session-end.js';
import { choose, chooseIndex, confirm } from './prompt.js';
import type { SessionDescriptor } from './types/session.js';

const VERSION = '0.4.0';
const PICKER_SIZE = 20;

const log = createLogger('cli');

interface CheckCommandOptions {
  last?: boolean;
  session?: string;
  quiet?: boolean;
  insights: boolean;
  tty?: boolean;
  maxTurns: number;
}

interface ReportCommandOptions {
  count: number;
  output?: string;
  concurrency: number;
}

interface Output {
  print(text?: string): void;
  close(): void;
}

/**
 * Claude swallows hook stdout, so --tty writes straight to the terminal
 */
function openOutput(tty: boolean): Output {
  if (tty) {
    try {
      const fd = openSync('/dev/tty', 'w');
      return {
        print: (text = '') => writeSync(fd, text + '\n'),
        close: () => closeSync(fd),
      };
    } catch (err) {
      log.debug(`Cannot open /dev/tty, using stdout: ${errorMessage(err)}`);
    }
  }
  return {
    print: (text = '') => console.log(text),
    close: () => undefined,
  };
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function createInvoker(config: AiLintConfig): ClaudeCliInvoker {
  return new ClaudeCliInvoker({
    binary: config.claudeBinary,
    model: config.model,
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Map failures to a message and exit code instead of a stack trace
 */
function reportError(err: unknown): void {
  console.error(formatError(err, { color: chalk.level > 0 }));
  if (!(err instanceof AiLintError) && err instanceof Error && err.stack) log.debug(err.stack);
  process.exitCode = err instanceof AiLintError ? err.exitCode : 1;
}

async function pickSession(config: AiLintConfig): Promise<SessionDescriptor> {
  const sessions = await listSessions(config.projectsDir);
  if (sessions.length === 0) {
    throw new NotFoundError(`No sessions found in ${config.projectsDir}`);
  }

  const display = sessions.slice(0, PICKER_SIZE);
  const labels = await previewLabels(display);

  console.log('Recent sessions:\n');
  labels.forEach((label, i) => {
    console.log(`  ${String(i + 1).padStart(2)}. ${label}`);
  });
  console.log();

  const index = await chooseIndex('Choose a session', display.length);
  return display[index - 1];
}

const program = new Command();

program
  .name('ai-lint')
  .description('Check AI coding sessions against your own rules')
  .version(VERSION)
  .option('--verbose', 'Show debug logging')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts().verbose) setLogLevel('debug');
  });

program
  .command('init')
  .description('Setup wizard: choose a persona, create the policy, install the hook')
  .action(async () => {
    try {
      const config = resolveConfig();
      console.log('Welcome to ai-lint!\n');

      if (await isClaudeInstalled(config.claudeBinary)) {
        console.log(`${chalk.green('[ok]')} claude CLI found`);
      } else {
        console.log(`${chalk.red('[!!]')} claude CLI not found`);
        console.log(`     ${INSTALL_HINT}`);
        console.log('     ai-lint needs the claude CLI to analyze sessions.\n');
      }

      console.log('Who are you?\n');
      console.log('  1. self — Individual developer checking your own habits');
      console.log('  2. team — Team lead enforcing shared guidelines');
      console.log();

      const choice = await choose('Choose a persona', ['1', '2', ...Object.keys(PERSONAS)]);
      const persona = choice === '1' ? 'self' : choice === '2' ? 'team' : choice;

      if ((await policyExists(config.policyFile)) &&
          !(await confirm('Policy already exists. Overwrite?', false))) {
        console.log('Keeping existing policy.');
      } else {
        await installPolicy(persona, config.policyFile);
        console.log(`Installed '${persona}' policy to ${config.policyFile}`);
      }

      if (await isHookInstalled(config.claudeSettingsFile)) {
        console.log(`${chalk.green('[ok]')} SessionEnd hook already installed`);
      } else if (await confirm('\nInstall a SessionEnd hook to auto-check after each session?', true)) {
        await installHook(config.claudeSettingsFile);
        console.log(`Installed SessionEnd hook in ${config.claudeSettingsFile}`);
      } else {
        console.log("Skipped hook installation. You can add it later with 'ai-lint hook install'.");
      }

      console.log("\nDone! Run 'ai-lint check' to check a session, or 'ai-lint policy' to edit your rules.");
    } catch (err) {
      reportError(err);
    }
  });

program
  .command('check')
  .description('Pick a session and check it against your policy')
  .option('--last', 'Check the most recent session without prompting')
  .option('--session <id>', 'Check the session with this ID (or ID prefix)')
  .option('--quiet', 'Minimal output (for hook usage)')
  .option('--no-insights', 'Skip session insights')
  .option('--tty', 'Write output to /dev/tty instead of stdout')
  .option('--max-turns <n>', 'Maximum turns to send to the model', positiveInt, DEFAULT_MAX_TURNS)
  .action(async (opts: CheckCommandOptions) => {
    const out = openOutput(Boolean(opts.tty));
    try {
      const config = resolveConfig();
      const policy = await readPolicy(config.policyFile);

      const descriptor: SessionDescriptor = opts.session
        ? await findSession(config.projectsDir, opts.session)
        : opts.last
          ? await findLatestSession(config.projectsDir)
          : await pickSession(config);

      if (!opts.quiet) out.print(chalk.dim(`Parsing session ${descriptor.id.slice(0, 8)}...`));
      const session = await parseTranscript(descriptor, { maxTurns: opts.maxTurns });

      if (session.turns.length === 0) {
        out.print('Session has no messages.');
        return;
      }

      const withInsights = !opts.quiet && opts.insights;
      if (!opts.quiet) {
        out.print(chalk.dim(`Checking ${session.turns.length} turns against policy...`));
      }

      const spinner = opts.quiet || opts.tty ? null : ora('Analyzing with claude...').start();
      const result = await runCheck(formatTranscript(session), policy, createInvoker(config), {
        insights: withInsights,
        knownCategories: policySections(policy),
      }).finally(() => spinner?.stop());

      const color = !opts.tty && chalk.level > 0;
      out.print(formatVerdicts(result, { color }));
      if (result.insights) out.print(formatInsights(result.insights, { color }));
    } catch (err) {
      reportError(err);
    } finally {
      out.close();
    }
  });

program
  .command('report')
  .description('Check multiple recent sessions and write a Markdown report')
  .option('-n, --count <n>', 'Number of recent sessions to check', positiveInt, 5)
  .option('-o, --output <file>', 'Write the report to this file')
  .option('--concurrency <n>', 'Sessions to check in parallel', positiveInt, 1)
  .action(async (opts: ReportCommandOptions) => {
    try {
      const config = resolveConfig();
      const policy = await readPolicy(config.policyFile);

      const sessions = await listSessions(config.projectsDir);
      if (sessions.length === 0) {
        throw new NotFoundError(`No sessions found in ${config.projectsDir}`);
      }

      const toCheck = sessions.slice(0, opts.count);
      let completed = 0;
      const spinner = ora(`Checking ${toCheck.length} session(s)...`).start();

      const results = await checkSessions(toCheck, policy, createInvoker(config), {
        concurrency: opts.concurrency,
        knownCategories: policySections(policy),
        onSettled: () => {
          completed++;
          spinner.text = `[${completed}/${toCheck.length}] Checking sessions...`;
        },
      });
      spinner.stop();

      const entries: ReportEntry[] = [];
      let failures = 0;
      for (const [i, r] of results.entries()) {
        const prefix = chalk.dim(`[${i + 1}/${results.length}]`);
        if (r.status === 'checked') {
          const counts = countVerdicts(r.result.verdicts);
          console.log(`${prefix} ${r.label}\n  -> ${chalk.green(`${counts.pass} passed`)}, ${chalk.red(`${counts.fail} failed`)}`);
          entries.push({ label: r.label, result: r.result });
        } else if (r.status === 'empty') {
          console.log(`${prefix} ${r.label}\n  -> ${chalk.dim('no messages, skipped')}`);
        } else {
          failures++;
          console.log(`${prefix} ${r.label}\n  -> ${chalk.red(`Error: ${errorMessage(r.error)}`)}`);
        }
      }

      if (entries.length === 0) {
        console.log(chalk.yellow('No sessions had messages to check.'));
        if (failures > 0) process.exitCode = 1;
        return;
      }

      console.log(`\nChecked ${entries.length} sessions.`);
      const totalFail = entries.reduce((sum, e) => sum + countVerdicts(e.result.verdicts).fail, 0);
      if (totalFail === 0) {
        console.log(chalk.green('All clear — no policy violations found.'));
      } else {
        console.log(chalk.yellow(`Found ${totalFail} total violation(s) across sessions.`));
      }

      const outfile = opts.output ?? defaultReportFileName();
      await fs.writeFile(outfile, formatReportMarkdown(entries), 'utf-8');
      console.log(chalk.dim(`\nReport saved to ${outfile}`));
    } catch (err) {
      reportError(err);
    }
  });

program
  .command('policy')
  .description('Open your policy file in your editor')
  .action(async () => {
    try {
      const config = resolveConfig();
      process.exitCode = await openPolicyInEditor(config.policyFile);
    } catch (err) {
      reportError(err);
    }
  });

const hook = program.command('hook').description('Manage the SessionEnd hook');

hook
  .command('install')
  .description("Install the SessionEnd hook in Claude's settings.json")
  .action(async () => {
    try {
      const config = resolveConfig();
      const outcome = await installHook(config.claudeSettingsFile);
      console.log(
        outcome === 'updated'
          ? `Updated ai-lint SessionEnd hook in ${config.claudeSettingsFile}`
          : `Installed SessionEnd hook in ${config.claudeSettingsFile}`,
      );
    } catch (err) {
      reportError(err);
    }
  });

hook
  .command('uninstall')
  .description('Remove the SessionEnd hook')
  .action(async () => {
    try {
      const config = resolveConfig();
      const outcome = await uninstallHook(config.claudeSettingsFile);
      console.log(outcome === 'removed' ? 'Removed ai-lint SessionEnd hook.' : 'ai-lint hook is not installed.');
    } catch (err) {
      reportError(err);
    }
  });

await program.parseAsync();
