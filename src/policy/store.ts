/**
 * Policy file management: install from a persona template, read, edit
 */

import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError, NotFoundError, isErrnoException } from '../errors.js';

export const TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

export const PERSONAS = {
  self: 'policy-self.md',
  team: 'policy-team.md',
} as const;

export type Persona = keyof typeof PERSONAS;

export function isPersona(value: string): value is Persona {
  return Object.prototype.hasOwnProperty.call(PERSONAS, value);
}

export async function policyExists(policyFile: string): Promise<boolean> {
  try {
    return (await fs.stat(policyFile)).isFile();
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return false;
    throw err;
  }
}

export async function readPolicy(policyFile: string): Promise<string> {
  try {
    return await fs.readFile(policyFile, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new NotFoundError(`No policy found at ${policyFile}. Run 'ai-lint init' to create one.`);
    }
    throw err;
  }
}

/**
 * Copy the persona's template over the policy file, creating its directory
 */
export async function installPolicy(
  persona: string,
  policyFile: string,
  templatesDir: string = TEMPLATES_DIR,
): Promise<void> {
  if (!isPersona(persona)) {
    throw new ConfigError(
      `Unknown persona: ${persona}. Choose from: ${Object.keys(PERSONAS).join(', ')}`,
    );
  }
  await fs.mkdir(dirname(policyFile), { recursive: true });
  await fs.copyFile(join(templatesDir, PERSONAS[persona]), policyFile);
}

/**
 * Names of the policy's `## ` sections, which double as verdict categories
 */
export function policySections(policy: string): string[] {
  const sections: string[] = [];
  for (const line of policy.split(/\r?\n/)) {
    const match = line.match(/^##\s+(.+?)\s*#*\s*$/);
    if (match && !sections.includes(match[1])) sections.push(match[1]);
  }
  return sections;
}

export function resolveEditor(env: NodeJS.ProcessEnv = process.env): string {
  return env.EDITOR || env.VISUAL || 'nano';
}

/**
 * Open the policy in the user's editor and wait for it to exit
 */
export async function openPolicyInEditor(
  policyFile: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (!(await policyExists(policyFile))) {
    throw new NotFoundError(`No policy found at ${policyFile}. Run 'ai-lint init' to create one.`);
  }

  const editor = resolveEditor(env);
  return new Promise((resolve, reject) => {
    const child = spawn(editor, [policyFile], { stdio: 'inherit', env });
    child.on('error', err => reject(new ConfigError(`Could not start editor "${editor}": ${err.message}`, { cause: err })));
    child.on('close', code => resolve(code ?? 1));
  });
}
