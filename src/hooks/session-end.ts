/**
 * Installs and removes the SessionEnd hook in Claude's settings.json that
 * runs a check after every session
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { ConfigError, isErrnoException } from '../errors.js';
import { isRecord } from '../util.js';

// Hook stdout is swallowed by Claude, hence --tty
export const HOOK_COMMAND = 'ai-lint check --last --quiet --tty';

const HOOK_EVENT = 'SessionEnd';

export const HOOK_ENTRY = {
  matcher: '',
  hooks: [{ type: 'command', command: HOOK_COMMAND }],
};

export type ClaudeSettings = Record<string, unknown>;

export async function readSettings(settingsFile: string): Promise<ClaudeSettings> {
  let content: string;
  try {
    content = await fs.readFile(settingsFile, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`${settingsFile} is not valid JSON`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${settingsFile} does not contain a JSON object`);
  }
  return parsed;
}

export async function writeSettings(settingsFile: string, settings: ClaudeSettings): Promise<void> {
  await fs.mkdir(dirname(settingsFile), { recursive: true });
  const tempFile = `${settingsFile}.tmp`;
  await fs.writeFile(tempFile, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  await fs.rename(tempFile, settingsFile);
}

/** Matches the current command and older variants without --tty */
export function isAiLintCommand(command: unknown): boolean {
  return typeof command === 'string' && command.includes('ai-lint check');
}

function entryRunsAiLint(entry: unknown): boolean {
  return isRecord(entry) && Array.isArray(entry.hooks) &&
    entry.hooks.some(hook => isRecord(hook) && isAiLintCommand(hook.command));
}

function hooksOf(settings: ClaudeSettings, settingsFile: string): Record<string, unknown> {
  if (settings.hooks === undefined) return {};
  if (!isRecord(settings.hooks)) {
    throw new ConfigError(`"hooks" in ${settingsFile} is not an object`);
  }
  return settings.hooks;
}

function sessionEndEntries(hooks: Record<string, unknown>): unknown[] {
  const entries = hooks[HOOK_EVENT];
  return Array.isArray(entries) ? entries : [];
}

export async function isHookInstalled(settingsFile: string): Promise<boolean> {
  const settings = await readSettings(settingsFile);
  return sessionEndEntries(hooksOf(settings, settingsFile)).some(entryRunsAiLint);
}

/**
 * Add the hook, replacing any older ai-lint hook. Other settings are kept.
 */
export async function installHook(settingsFile: string): Promise<'installed' | 'updated'> {
  const settings = await readSettings(settingsFile);
  const hooks = hooksOf(settings, settingsFile);
  const existing = sessionEndEntries(hooks);
  const kept = existing.filter(entry => !entryRunsAiLint(entry));

  await writeSettings(settingsFile, {
    ...settings,
    hooks: { ...hooks, [HOOK_EVENT]: [...kept, HOOK_ENTRY] },
  });
  return kept.length !== existing.length ? 'updated' : 'installed';
}

export async function uninstallHook(settingsFile: string): Promise<'removed' | 'not-installed'> {
  const settings = await readSettings(settingsFile);
  const hooks = hooksOf(settings, settingsFile);
  const existing = sessionEndEntries(hooks);
  const kept = existing.filter(entry => !entryRunsAiLint(entry));

  if (kept.length === existing.length) return 'not-installed';

  await writeSettings(settingsFile, {
    ...settings,
    hooks: { ...hooks, [HOOK_EVENT]: kept },
  });
  return 'removed';
}
