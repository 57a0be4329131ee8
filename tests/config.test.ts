import { describe, expect, it } from 'vitest';
import { join } from 'path';
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS, parsePositiveInt, resolveConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('resolveConfig', () => {
  const home = join('/home', 'dev');

  it('defaults everything under the home directory', () => {
    expect(resolveConfig({}, home)).toEqual({
      projectsDir: join(home, '.claude', 'projects'),
      configDir: join(home, '.ai-lint'),
      policyFile: join(home, '.ai-lint', 'policy.md'),
      claudeSettingsFile: join(home, '.claude', 'settings.json'),
      claudeBinary: 'claude',
      model: DEFAULT_MODEL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  });

  it('reads overrides from the environment', () => {
    const config = resolveConfig(
      {
        AI_LINT_PROJECTS_DIR: '/data/projects',
        AI_LINT_HOME: '/data/ai-lint',
        CLAUDE_SETTINGS_FILE: '/data/settings.json',
        AI_LINT_CLAUDE_BIN: '/opt/claude',
        AI_LINT_MODEL: 'test-model',
        AI_LINT_TIMEOUT_MS: '5000',
      },
      home,
    );

    expect(config).toEqual({
      projectsDir: '/data/projects',
      configDir: '/data/ai-lint',
      policyFile: join('/data/ai-lint', 'policy.md'),
      claudeSettingsFile: '/data/settings.json',
      claudeBinary: '/opt/claude',
      model: 'test-model',
      timeoutMs: 5000,
    });
  });

  it('ignores empty overrides', () => {
    expect(resolveConfig({ AI_LINT_MODEL: '', AI_LINT_TIMEOUT_MS: '' }, home)).toMatchObject({
      model: DEFAULT_MODEL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  });
});

describe('parsePositiveInt', () => {
  it('rejects values that are not positive integers', () => {
    expect(() => parsePositiveInt('N', 'abc', 1)).toThrow(ConfigError);
    expect(() => parsePositiveInt('N', '0', 1)).toThrow('N must be a positive integer, got "0"');
    expect(() => parsePositiveInt('N', '1.5', 1)).toThrow(ConfigError);
  });

  it('falls back when unset', () => {
    expect(parsePositiveInt('N', undefined, 7)).toBe(7);
    expect(parsePositiveInt('N', '12', 7)).toBe(12);
  });
});
