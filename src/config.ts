/**
 * Resolves filesystem locations and invocation settings from the environment
 */

import { homedir } from 'os';
import { join } from 'path';
import { ConfigError } from './errors.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
export const DEFAULT_TIMEOUT_MS = 120_000;

export interface AiLintConfig {
  /** One subdirectory of transcripts per project */
  projectsDir: string;
  configDir: string;
  policyFile: string;
  claudeSettingsFile: string;
  claudeBinary: string;
  model: string;
  timeoutMs: number;
}

export type Env = Record<string, string | undefined>;

export function resolveConfig(env: Env = process.env, home: string = homedir()): AiLintConfig {
  const configDir = env.AI_LINT_HOME || join(home, '.ai-lint');

  return {
    projectsDir: env.AI_LINT_PROJECTS_DIR || join(home, '.claude', 'projects'),
    configDir,
    policyFile: join(configDir, 'policy.md'),
    claudeSettingsFile: env.CLAUDE_SETTINGS_FILE || join(home, '.claude', 'settings.json'),
    claudeBinary: env.AI_LINT_CLAUDE_BIN || 'claude',
    model: env.AI_LINT_MODEL || DEFAULT_MODEL,
    timeoutMs: parsePositiveInt('AI_LINT_TIMEOUT_MS', env.AI_LINT_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
  };
}

export function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
